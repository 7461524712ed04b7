import type { SupabaseClient } from "@supabase/supabase-js";
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getLastUpdate } from "../db/supa";

export interface StatusRoutesOptions {
  client: SupabaseClient | null;
}

const LastUpdateQuery = z.object({
  category: z.string().trim().min(1).default("airports"),
});

export default async function statusRoutes(app: FastifyInstance, opts: StatusRoutesOptions) {
  // GET /api/v1/status/last-update?category=airports
  app.get("/status/last-update", async (req, reply) => {
    const parsed = LastUpdateQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request", details: parsed.error.format() });
    }
    if (!opts.client) {
      return reply.code(503).send({ error: "directory_not_configured" });
    }

    const ts = await getLastUpdate(opts.client, parsed.data.category);
    return {
      category: parsed.data.category,
      last_update: ts ? ts.toISOString() : null,
    };
  });
}
