import type { FastifyInstance } from "fastify";

import { getActor } from "../middleware/auth.js";
import { validate } from "../middleware/validate.middleware.js";
import { watchlistParamsSchema, type WatchlistParams } from "../schemas/watchlist.schema.js";
import { addToWatchlist, listWatchlist, removeFromWatchlist } from "../services/watchlist.service.js";
import { presentListingSummary, sendFailure } from "./presenters.js";

export async function watchlistRoutes(app: FastifyInstance) {
  app.addHook("preHandler", app.authenticate);

  app.get("/", async (req) => {
    const actor = getActor(req);
    const rows = await listWatchlist(app.db, actor.userId);
    return { ok: true, data: rows.map(presentListingSummary) };
  });

  app.put<{ Params: WatchlistParams }>(
    "/:listingId",
    { preHandler: validate({ params: watchlistParamsSchema }) },
    async (req, reply) => {
      const actor = getActor(req);
      const result = await addToWatchlist(app.db, { userId: actor.userId, listingId: req.params.listingId });
      if (!result.ok) return sendFailure(reply, result);

      return { ok: true, data: { listingId: req.params.listingId, watching: true, changed: result.changed } };
    }
  );

  app.delete<{ Params: WatchlistParams }>(
    "/:listingId",
    { preHandler: validate({ params: watchlistParamsSchema }) },
    async (req, reply) => {
      const actor = getActor(req);
      const result = await removeFromWatchlist(app.db, { userId: actor.userId, listingId: req.params.listingId });
      if (!result.ok) return sendFailure(reply, result);

      return { ok: true, data: { listingId: req.params.listingId, watching: false, changed: result.changed } };
    }
  );
}
