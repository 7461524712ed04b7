import pino from "pino";

// Shared by the Fastify service, the Express API and the reconciliation engine.
export const logger = pino({
  name: "aerodata",
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info"),
});

export type Logger = typeof logger;
