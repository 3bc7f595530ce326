import fp from "fastify-plugin";
import rateLimit from "@fastify/rate-limit";

export const registerRateLimit = fp<{ max: number; timeWindow: string }>(async (app, opts) => {
  await app.register(rateLimit, {
    global: true,
    max: opts.max,
    timeWindow: opts.timeWindow,
  });
});
