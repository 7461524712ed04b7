import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const Env = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default("0.0.0.0"),
  SUPABASE_URL: z.string().url().optional().or(z.literal("").transform(() => undefined)),
  SUPABASE_KEY: z.string().optional().or(z.literal("").transform(() => undefined)),
});

const env = Env.parse(process.env);

export const PORT = env.PORT;
export const HOST = env.HOST;

// Directory access is optional: without credentials only the converters work
export const SUPABASE_URL = env.SUPABASE_URL;
export const SUPABASE_KEY = env.SUPABASE_KEY;

export const CONFIG = {
  PORT,
  HOST,
  SUPABASE_URL,
  SUPABASE_KEY,
};
