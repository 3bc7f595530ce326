import fp from "fastify-plugin";
import cors from "@fastify/cors";

export const registerCors = fp<{ origin: boolean | string[] }>(async (app, opts) => {
  await app.register(cors, {
    origin: opts.origin,
    credentials: true,
  });
});
