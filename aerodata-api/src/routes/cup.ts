import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import {
  DEFAULT_CUP_FILE_NAME,
  logger,
  parseCup,
  serializeCup,
  updateAirportsInCup,
  type AirportDirectory,
  type CountryLookup,
} from "aero-parser";

export interface CupRouterOptions {
  directory: AirportDirectory | null;
  countries: CountryLookup;
  searchRadius: number;
  updateRadius: number;
  maxUploadBytes: number;
}

// multipart fields arrive as strings; checkboxes may send "on"
const Flag = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0", "on", "off"]).transform((v) => v === "true" || v === "1" || v === "on"),
]);

const UpdateForm = z.object({
  search_radius: z.coerce.number().positive().optional(),
  update_radius: z.coerce.number().positive().optional(),
  update_locations: Flag.optional(),
  delete_closed: Flag.optional(),
  add_new: Flag.optional(),
});

/** `alps.cup` -> `alps-updated.cup` */
export function updatedFileName(fileName: string): string {
  return `${fileName.replace(/\.cup$/i, "")}-updated.cup`;
}

export function createCupRouter(opts: CupRouterOptions) {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: opts.maxUploadBytes } });

  // ---- update ----
  router.post("/update", upload.single("file"), async (req, res, next) => {
    try {
      if (!req.file) {
        res.status(400).json({ ok: false, error: "file_required" });
        return;
      }

      const form = UpdateForm.safeParse(req.body ?? {});
      if (!form.success) {
        res.status(400).json({ ok: false, error: "invalid_request", details: form.error.format() });
        return;
      }
      if (!opts.directory) {
        res.status(503).json({ ok: false, error: "directory_not_configured" });
        return;
      }

      const fileName = req.file.originalname || DEFAULT_CUP_FILE_NAME;
      const cup = parseCup(req.file.buffer, { countries: opts.countries, fileName });

      const result = await updateAirportsInCup(cup, {
        directory: opts.directory,
        countries: opts.countries,
        fileName,
        searchRadius: form.data.search_radius ?? opts.searchRadius,
        updateRadius: form.data.update_radius ?? opts.updateRadius,
        updateLocations: form.data.update_locations,
        deleteClosed: form.data.delete_closed,
        addNew: form.data.add_new,
      });

      logger.info({ file: fileName, size: req.file.size }, "cup file updated");
      res.json({
        ok: true,
        file_name: updatedFileName(fileName),
        cup: serializeCup(result.file),
        report: result.report,
        counts: result.counts,
      });
    } catch (e) {
      next(e);
    }
  });

  // ---- inspect ----
  router.post("/inspect", upload.single("file"), (req, res, next) => {
    try {
      if (!req.file) {
        res.status(400).json({ ok: false, error: "file_required" });
        return;
      }

      const fileName = req.file.originalname || DEFAULT_CUP_FILE_NAME;
      const cup = parseCup(req.file.buffer, { countries: opts.countries, fileName });

      res.json({
        ok: true,
        file_name: fileName,
        counts: {
          waypoints: cup.size,
          landables: cup.landables().length,
          airports: cup.airports().length,
          outlandings: cup.outlandings().length,
          task_lines: cup.tasks.length,
        },
        bounding_box: cup.boundingBox(),
        waypoints: cup.waypoints.map((w) => w.toJSON()),
      });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
