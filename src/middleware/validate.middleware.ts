import type { FastifyRequest } from "fastify";
import type { ZodTypeAny } from "zod";
import { AppError } from "../shared/errors/app_error.js";

type Schemas = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

function parse(schema: ZodTypeAny, value: unknown): unknown {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw AppError.validation(parsed.error.flatten());
  return parsed.data;
}

/**
 * Replaces body/query/params with the parsed (and transformed) values,
 * so route generics should name the schemas' output types.
 *
 * Usage:
 * app.post<{ Body: PlaceBidBody }>("/path", { preHandler: validate({ body: placeBidSchema }) }, ...)
 */
export function validate(schemas: Schemas) {
  return async (req: FastifyRequest) => {
    if (schemas.params) req.params = parse(schemas.params, req.params);
    if (schemas.query) req.query = parse(schemas.query, req.query);
    if (schemas.body) req.body = parse(schemas.body, req.body);
  };
}
