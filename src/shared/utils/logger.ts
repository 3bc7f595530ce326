import pino from "pino";

/**
 * Shared by the standalone logger and by Fastify's request logger so both
 * redact the same fields.
 */
export const loggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.body.password",
      "req.body.confirmation",
      "password",
      "passwordHash",
    ],
    remove: true,
  },
};

export const logger = pino(loggerOptions);
