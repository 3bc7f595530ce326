import type { FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { AppError } from "../shared/errors/app_error.js";

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler(async (err, req, reply) => {
    if (err instanceof AppError) {
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(typeof err.details === "undefined" ? {} : { details: err.details }),
      });
    }

    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: "VALIDATION_ERROR",
        message: "Validation error",
        details: err.flatten(),
      });
    }

    const status = err.statusCode ?? 500;

    if (status >= 500) {
      req.log.error({ err }, "Unhandled error");
      return reply.status(500).send({
        ok: false,
        error: "INTERNAL_ERROR",
        message: "Something went wrong",
      });
    }

    // framework-level client errors: bad JSON, rate limit, payload too large
    req.log.warn({ err }, "Request rejected");
    return reply.status(status).send({
      ok: false,
      error: err.code || "BAD_REQUEST",
      message: err.message,
    });
  });

  app.setNotFoundHandler(async (req, reply) => {
    return reply.status(404).send({
      ok: false,
      error: "NOT_FOUND",
      message: `Route ${req.method} ${req.url} not found`,
    });
  });
}
