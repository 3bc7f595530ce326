// src/app.ts
import Fastify, { type FastifyInstance } from "fastify";

import type { Db } from "./db/stores.js";
import { loggerOptions } from "./shared/utils/logger.js";

import { registerCors } from "./plugins/cors.js";
import registerJwt from "./plugins/jwt.js";
import { registerSecurity } from "./plugins/security.js";

import { registerErrorHandler } from "./middleware/error.middleware.js";
import { registerRateLimit } from "./middleware/rateLimit.middleware.js";

import { registerRoutes } from "./routes/index.js";

export type BuildAppOptions = {
  db: Db;
  jwtSecret: string;
  jwtExpiresIn?: string;
  production?: boolean;
  rateLimitMax?: number;
  /** false silences request logging (tests) */
  logger?: boolean;
};

export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: opts.logger === false ? false : loggerOptions });

  // 1) Error handler early
  registerErrorHandler(app);

  // 2) Persistence, shared by every route
  app.decorate("db", opts.db);

  // 3) Core plugins
  await app.register(registerCors, { origin: true });
  await app.register(registerSecurity, { production: opts.production ?? false });
  await app.register(registerJwt, { secret: opts.jwtSecret, expiresIn: opts.jwtExpiresIn ?? "7d" });

  // 4) Global rate limit
  await app.register(registerRateLimit, { max: opts.rateLimitMax ?? 200, timeWindow: "1 minute" });

  // 5) Routes
  await app.register(registerRoutes);

  return app;
}
