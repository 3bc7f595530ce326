// src/plugins/jwt.ts
import fp from "fastify-plugin";
import fastifyJwt from "@fastify/jwt";

import { requireAuth, optionalAuth } from "../middleware/auth.js";

export type JwtPayload = {
  sub: string;
  username: string;
};

export default fp<{ secret: string; expiresIn: string }>(async (app, opts) => {
  await app.register(fastifyJwt, {
    secret: opts.secret,
    sign: { expiresIn: opts.expiresIn },
  });

  app.decorateRequest("actor", null);

  /**
   * Strict auth guard for protected routes:
   * - JWT required
   * - sets req.actor
   */
  app.decorate("authenticate", requireAuth);

  /**
   * Optional auth for routes that also work logged-out
   * (listing detail shows the watch flag only to a known viewer).
   */
  app.decorate("optionalAuthenticate", optionalAuth);
});
