import type { FastifyInstance } from "fastify";
import { APP } from "../config/constants/app.constants.js";

export async function healthRoutes(app: FastifyInstance) {
  app.get("/health", async () => {
    return { ok: true, service: APP.NAME, time: new Date().toISOString() };
  });
}
