import type { FastifyInstance } from "fastify";
import { listAllCategories } from "../services/listings.service.js";
import { presentCategory } from "./presenters.js";

export async function categoryRoutes(app: FastifyInstance) {
  app.get("/", async () => {
    const categories = await listAllCategories(app.db);
    return { ok: true, data: categories.map(presentCategory) };
  });
}
