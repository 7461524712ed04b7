import type { SupabaseClient } from "@supabase/supabase-js";
import Fastify from "fastify";
import { httpStatusFor, isAeroDataError } from "./lib/errors";
import { logger as defaultLogger, type Logger } from "./lib/logger";
import convertRoutes from "./routes/convert";
import statusRoutes from "./routes/status";

export interface BuildAppOptions {
  /** directory client for the status routes; null when not configured */
  client?: SupabaseClient | null;
  logger?: Logger;
}

export function buildApp(opts: BuildAppOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? defaultLogger });

  app.setErrorHandler((err, req, reply) => {
    if (isAeroDataError(err)) {
      req.log.info({ code: err.code }, err.message);
      return reply.code(httpStatusFor(err)).send({ error: err.code, message: err.message });
    }
    // malformed JSON, unsupported content type, oversized body
    if (err.statusCode && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: "Invalid request", message: err.message });
    }
    req.log.error(err);
    return reply.code(500).send({ error: "internal_error" });
  });

  app.get("/health", async () => ({ ok: true }));

  app.register(convertRoutes, { prefix: "/api/v1" });
  app.register(statusRoutes, { prefix: "/api/v1", client: opts.client ?? null });

  return app;
}
