import type { FastifyInstance } from "fastify";

import { getActor } from "../middleware/auth.js";
import { validate } from "../middleware/validate.middleware.js";
import { idParamsSchema, type IdParams } from "../schemas/common.schema.js";
import {
  createListingSchema,
  listListingsQuerySchema,
  placeBidSchema,
  type CreateListingBody,
  type ListListingsQuery,
  type PlaceBidBody,
} from "../schemas/listings.schema.js";
import { createCommentSchema, type CreateCommentBody } from "../schemas/comments.schema.js";

import { createListing, getListingDetail, listAllListings } from "../services/listings.service.js";
import { listBids, placeBid } from "../services/bidding.service.js";
import { closeAuction } from "../services/auction_close.service.js";
import { addComment, listComments } from "../services/comments.service.js";
import { formatMoney } from "../shared/utils/money.js";

import {
  presentBid,
  presentComment,
  presentListing,
  presentListingSummary,
  sendFailure,
} from "./presenters.js";

export async function listingRoutes(app: FastifyInstance) {
  // LIST
  app.get<{ Querystring: ListListingsQuery }>(
    "/",
    { preHandler: validate({ query: listListingsQuerySchema }) },
    async (req) => {
      const { limit, offset, categoryId, active } = req.query;
      const rows = await listAllListings(app.db, { limit, offset, categoryId, active });

      return { ok: true, data: rows.map(presentListingSummary), paging: { limit, offset } };
    }
  );

  // CREATE
  app.post<{ Body: CreateListingBody }>(
    "/",
    { preHandler: [app.authenticate, validate({ body: createListingSchema })] },
    async (req, reply) => {
      const actor = getActor(req);
      const body = req.body;

      const { listing, category } = await createListing(app.db, actor.userId, {
        title: body.title,
        description: body.description,
        startingBidCents: body.startingBid,
        imageUrl: body.imageUrl ?? null,
        category: body.category,
      });

      req.log.info({ listingId: listing.id, ownerId: actor.userId }, "listing published");
      return reply.code(201).send({
        ok: true,
        data: { ...presentListing(listing), category: category.name },
      });
    }
  );

  // GET ONE (watch flag only for a logged-in viewer)
  app.get<{ Params: IdParams }>(
    "/:id",
    { preHandler: [app.optionalAuthenticate, validate({ params: idParamsSchema })] },
    async (req, reply) => {
      const detail = await getListingDetail(app.db, req.params.id, req.actor?.userId ?? null);
      if (!detail) {
        return sendFailure(reply, { error: "LISTING_NOT_FOUND", message: "Listing not found" });
      }

      return {
        ok: true,
        data: {
          ...presentListingSummary(detail.listing),
          comments: detail.comments.map(presentComment),
          watching: detail.watching,
        },
      };
    }
  );

  // BID
  app.post<{ Params: IdParams; Body: PlaceBidBody }>(
    "/:id/bids",
    {
      preHandler: [app.authenticate, validate({ params: idParamsSchema, body: placeBidSchema })],
    },
    async (req, reply) => {
      const actor = getActor(req);
      const result = await placeBid(app.db, {
        listingId: req.params.id,
        bidderId: actor.userId,
        valueCents: req.body.bid,
      });

      if (!result.ok) {
        req.log.info({ listingId: req.params.id, reason: result.error }, "bid rejected");
        return sendFailure(reply, result);
      }

      req.log.info({ listingId: req.params.id, bidId: result.bid.id }, "bid placed");
      return reply.code(201).send({
        ok: true,
        data: {
          bid: presentBid(result.bid),
          currentPrice: formatMoney(result.currentPriceCents),
        },
      });
    }
  );

  // BID HISTORY
  app.get<{ Params: IdParams }>(
    "/:id/bids",
    { preHandler: validate({ params: idParamsSchema }) },
    async (req, reply) => {
      const bids = await listBids(app.db, req.params.id);
      if (!bids) {
        return sendFailure(reply, { error: "LISTING_NOT_FOUND", message: "Listing not found" });
      }
      return { ok: true, data: bids.map(presentBid) };
    }
  );

  // CLOSE (owner only)
  app.post<{ Params: IdParams }>(
    "/:id/close",
    { preHandler: [app.authenticate, validate({ params: idParamsSchema })] },
    async (req, reply) => {
      const actor = getActor(req);
      const result = await closeAuction(app.db, { listingId: req.params.id, actorUserId: actor.userId });

      if (!result.ok) return sendFailure(reply, result);

      req.log.info(
        { listingId: result.listing.id, winnerId: result.listing.winnerId },
        "auction closed"
      );
      return {
        ok: true,
        data: {
          ...presentListing(result.listing),
          winningBid: presentBid(result.winningBid),
        },
      };
    }
  );

  // COMMENTS
  app.get<{ Params: IdParams }>(
    "/:id/comments",
    { preHandler: validate({ params: idParamsSchema }) },
    async (req, reply) => {
      const result = await listComments(app.db, req.params.id);
      if (!result.ok) return sendFailure(reply, result);
      return { ok: true, data: result.comments.map(presentComment) };
    }
  );

  app.post<{ Params: IdParams; Body: CreateCommentBody }>(
    "/:id/comments",
    {
      preHandler: [app.authenticate, validate({ params: idParamsSchema, body: createCommentSchema })],
    },
    async (req, reply) => {
      const actor = getActor(req);
      const result = await addComment(app.db, {
        listingId: req.params.id,
        userId: actor.userId,
        title: req.body.title,
        message: req.body.message,
      });

      if (!result.ok) return sendFailure(reply, result);
      return reply.code(201).send({ ok: true, data: presentComment(result.comment) });
    }
  );
}
