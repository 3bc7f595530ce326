// src/server.ts
import { env } from "./config/env.js";
import { closePool } from "./config/database.js";
import { pgDb } from "./db/pg_db.js";
import { buildApp } from "./app.js";
import { logger } from "./shared/utils/logger.js";

async function start() {
  const app = await buildApp({
    db: pgDb,
    jwtSecret: env.jwtSecret,
    jwtExpiresIn: env.jwtExpiresIn,
    production: env.nodeEnv === "production",
    rateLimitMax: env.rateLimitMax,
  });

  // Graceful shutdown
  app.addHook("onClose", async () => {
    await closePool();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: env.port, host: env.host });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, "server failed to start");
  process.exit(1);
});
