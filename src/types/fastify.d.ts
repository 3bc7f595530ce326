// src/types/fastify.d.ts
import "fastify";
import "@fastify/jwt";
import type { Db } from "../db/stores.js";
import type { AuthUser } from "../middleware/auth.js";
import type { JwtPayload } from "../plugins/jwt.js";

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload; // what req.jwtVerify() sets internally
  }
}

declare module "fastify" {
  interface FastifyInstance {
    /**
     * Decorated by src/plugins/jwt.ts
     */
    authenticate: (req: FastifyRequest) => Promise<void>;
    optionalAuthenticate: (req: FastifyRequest) => Promise<void>;

    /**
     * Decorated by src/app.ts
     */
    db: Db;
  }

  interface FastifyRequest {
    /**
     * Identity set by middleware/auth.ts; null on anonymous requests.
     */
    actor: AuthUser | null;
  }
}

export {};
