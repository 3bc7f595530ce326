// src/routes/auth.ts
import type { FastifyInstance } from "fastify";

import { validate } from "../middleware/validate.middleware.js";
import { getActor } from "../middleware/auth.js";
import { loginSchema, registerSchema, type LoginBody, type RegisterBody } from "../schemas/auth.schema.js";
import { authenticate, getProfile, registerUser } from "../services/auth.service.js";
import { AppError } from "../shared/errors/app_error.js";
import { presentUser, sendFailure } from "./presenters.js";

export async function authRoutes(app: FastifyInstance) {
  // Register
  app.post<{ Body: RegisterBody }>(
    "/register",
    { preHandler: validate({ body: registerSchema }) },
    async (req, reply) => {
      const result = await registerUser(app.db, req.body);
      if (!result.ok) return sendFailure(reply, result);

      const token = app.jwt.sign({ sub: result.user.id, username: result.user.username });
      req.log.info({ userId: result.user.id }, "user registered");

      return reply.code(201).send({ ok: true, token, user: presentUser(result.user) });
    }
  );

  // Login
  app.post<{ Body: LoginBody }>(
    "/login",
    { preHandler: validate({ body: loginSchema }) },
    async (req, reply) => {
      const user = await authenticate(app.db, req.body);
      if (!user) throw AppError.unauthorized("Invalid username and/or password");

      const token = app.jwt.sign({ sub: user.id, username: user.username });
      return reply.send({ ok: true, token, user: presentUser(user) });
    }
  );

  // Tokens are stateless; logging out is the client dropping its token.

  // Me
  app.get("/me", { preHandler: [app.authenticate] }, async (req) => {
    const actor = getActor(req);
    const user = await getProfile(app.db, actor.userId);
    if (!user) throw AppError.unauthorized("Account no longer exists");

    return { ok: true, data: presentUser(user) };
  });
}
