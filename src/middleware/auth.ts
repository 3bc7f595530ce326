// src/middleware/auth.ts
import type { FastifyRequest } from "fastify";
import { AppError } from "../shared/errors/app_error.js";
import type { JwtPayload } from "../plugins/jwt.js";

/**
 * Resolved identity attached to req.actor. Services take it as an
 * explicit argument; nothing reads it from ambient state.
 */
export type AuthUser = {
  userId: string;
  username: string;
};

function getBearerToken(req: FastifyRequest): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [type, token] = header.trim().split(/\s+/);
  if (type?.toLowerCase() !== "bearer" || !token) return null;

  return token.trim();
}

function normalizeJwtPayload(raw: Partial<JwtPayload>): AuthUser | null {
  const userId = String(raw.sub ?? "").trim();
  const username = String(raw.username ?? "").trim();

  if (!userId || !username) return null;
  return { userId, username };
}

async function verify(req: FastifyRequest): Promise<AuthUser> {
  let raw: JwtPayload;
  try {
    raw = await req.jwtVerify<JwtPayload>();
  } catch {
    throw AppError.unauthorized("Invalid or missing token");
  }

  const user = normalizeJwtPayload(raw);
  if (!user) throw AppError.unauthorized("Invalid token payload");
  return user;
}

/** Must be logged in (valid JWT). */
export async function requireAuth(req: FastifyRequest) {
  req.actor = await verify(req);
}

/**
 * Optional auth: without a bearer token the request continues anonymously;
 * a token that is present must still be valid.
 */
export async function optionalAuth(req: FastifyRequest) {
  if (!getBearerToken(req)) return;
  req.actor = await verify(req);
}

export function getActor(req: FastifyRequest): AuthUser {
  if (!req.actor) throw AppError.unauthorized();
  return req.actor;
}
