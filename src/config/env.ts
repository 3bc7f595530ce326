import "dotenv/config";
import { APP } from "./constants/app.constants.js";

function must(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: Number(process.env.PORT ?? APP.DEFAULT_PORT),
  host: process.env.HOST ?? "0.0.0.0",

  databaseUrl: must("DATABASE_URL"),
  db: {
    max: Number(process.env.DB_POOL_MAX ?? 10),
    idleTimeoutMillis: Number(process.env.DB_IDLE_TIMEOUT_MS ?? 30_000),
    statementTimeout: Number(process.env.DB_STATEMENT_TIMEOUT_MS ?? 15_000),
  },

  jwtSecret: must("JWT_SECRET"),
  jwtExpiresIn: process.env.JWT_EXPIRES_IN ?? "7d",

  rateLimitMax: Number(process.env.RATE_LIMIT_MAX ?? 200),
} as const;
