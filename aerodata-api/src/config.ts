import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const Env = z.object({
  API_PORT: z.coerce.number().int().positive().default(8081),
  SUPABASE_URL: z.string().url().optional().or(z.literal("").transform(() => undefined)),
  SUPABASE_KEY: z.string().optional().or(z.literal("").transform(() => undefined)),
  SEARCH_RADIUS_M: z.coerce.number().positive().default(5000),
  UPDATE_RADIUS_M: z.coerce.number().positive().default(2000),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(10),
});

const env = Env.parse(process.env);

export const PORT = env.API_PORT;

export const SUPABASE_URL = env.SUPABASE_URL;
export const SUPABASE_KEY = env.SUPABASE_KEY;

// Defaults for the reconciliation form; each request may override them
export const SEARCH_RADIUS_M = env.SEARCH_RADIUS_M;
export const UPDATE_RADIUS_M = env.UPDATE_RADIUS_M;

export const MAX_UPLOAD_BYTES = env.MAX_UPLOAD_MB * 1024 * 1024;

export const CONFIG = {
  PORT,
  SUPABASE_URL,
  SUPABASE_KEY,
  SEARCH_RADIUS_M,
  UPDATE_RADIUS_M,
  MAX_UPLOAD_BYTES,
};
