// src/routes/index.ts
import type { FastifyInstance } from "fastify";

import { APP } from "../config/constants/app.constants.js";
import { healthRoutes } from "./health.js";
import { authRoutes } from "./auth.js";
import { categoryRoutes } from "./categories.js";
import { listingRoutes } from "./listings.js";
import { watchlistRoutes } from "./watchlist.js";

export async function routes(app: FastifyInstance) {
  // ROOT (UNVERSIONED) ROUTES
  await app.register(healthRoutes); // /health

  // VERSIONED API ROUTES  => /v1/...
  await app.register(
    async function v1(v1) {
      await v1.register(authRoutes, { prefix: "/auth" });
      await v1.register(categoryRoutes, { prefix: "/categories" });
      await v1.register(listingRoutes, { prefix: "/listings" });
      await v1.register(watchlistRoutes, { prefix: "/watchlist" });
    },
    { prefix: APP.API_PREFIX }
  );
}

export const registerRoutes = routes;
