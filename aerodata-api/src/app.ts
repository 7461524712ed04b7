import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import swaggerUi from "swagger-ui-express";
import { httpStatusFor, isAeroDataError, logger, type AirportDirectory, type CountryLookup } from "aero-parser";
import { CONFIG } from "./config";
import openapiDocument from "./openapi";
import { createCupRouter } from "./routes/cup";

export interface AppOptions {
  /** null when the directory is not configured; /v1/cup/update then answers 503 */
  directory: AirportDirectory | null;
  countries: CountryLookup;
  searchRadius?: number;
  updateRadius?: number;
  maxUploadBytes?: number;
}

export function createApp(opts: AppOptions) {
  const app = express();

  // base middlewares
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // health
  app.get("/", (_req, res) => res.json({ ok: true, service: "aerodata-api" }));
  app.get("/v1/health", (_req, res) => res.json({ ok: true, directory: opts.directory !== null }));

  app.use(
    "/v1/cup",
    createCupRouter({
      directory: opts.directory,
      countries: opts.countries,
      searchRadius: opts.searchRadius ?? CONFIG.SEARCH_RADIUS_M,
      updateRadius: opts.updateRadius ?? CONFIG.UPDATE_RADIUS_M,
      maxUploadBytes: opts.maxUploadBytes ?? CONFIG.MAX_UPLOAD_BYTES,
    })
  );

  app.get("/openapi.json", (_req, res) => res.json(openapiDocument));
  app.use(
    "/docs",
    swaggerUi.serve,
    swaggerUi.setup(openapiDocument, {
      explorer: true,
      swaggerOptions: { displayRequestDuration: true, docExpansion: "none" },
    })
  );

  // 404 JSON
  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "not_found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isAeroDataError(err)) {
      res.status(httpStatusFor(err)).json({ ok: false, error: err.code, message: err.message });
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ ok: false, error: err.code.toLowerCase(), message: err.message });
      return;
    }
    // body-parser: malformed JSON
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: "invalid_json" });
      return;
    }
    logger.error({ err }, "unhandled error");
    res.status(500).json({ ok: false, error: "internal_error" });
  });

  return app;
}
