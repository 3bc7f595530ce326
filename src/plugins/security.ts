// src/plugins/security.ts
import fp from "fastify-plugin";
import helmet from "@fastify/helmet";

export const registerSecurity = fp<{ production: boolean }>(async (app, opts) => {
  const isProd = opts.production;

  await app.register(helmet, {
    // JSON-only API: no documents to apply a CSP to outside production
    contentSecurityPolicy: isProd ? undefined : false,

    crossOriginResourcePolicy: isProd ? { policy: "same-site" } : false,

    referrerPolicy: { policy: "no-referrer" },
    hsts: isProd ? { maxAge: 15552000, includeSubDomains: true, preload: true } : false,

    frameguard: { action: "deny" },
  });
});
