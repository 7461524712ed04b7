import { bbox, multiPoint } from "@turf/turf";
import { z } from "zod";
import type { CountryLookup } from "../lib/countries";
import { ApplicationError, QueryError, ValidationError } from "../lib/errors";
import { logger as defaultLogger, type Logger } from "../lib/logger";
import type { Distance } from "../models/cup";
import {
  NOT_ADDABLE_TYPES,
  directoryAirportToWaypoint,
  isClosed,
  type AirportDirectory,
  type DirectoryAirport,
  type NearestMatch,
} from "../models/directory";
import { toPosition } from "../models/geo";
import type { Waypoint } from "../models/waypoint";
import type { CupFile } from "./cup";

/** Upper bound on points per directory query. */
export const BATCH_SIZE = 500;
export const BUCKET_STEP_M = 500;

export const ReconcileFlags = z.object({
  searchRadius: z.number().positive().default(5000),
  updateRadius: z.number().positive().default(2000),
  updateLocations: z.boolean().default(true),
  deleteClosed: z.boolean().default(false),
  addNew: z.boolean().default(false),
});

export type ReconcileFlags = z.output<typeof ReconcileFlags>;

export interface ReconcileOptions extends z.input<typeof ReconcileFlags> {
  directory: AirportDirectory;
  countries: CountryLookup;
  fileName?: string | null;
  /** report timestamp, defaults to the current time */
  now?: Date;
  logger?: Logger;
}

export interface UpdatedOutcome {
  /** snapshot taken before the directory values were applied */
  before: Waypoint;
  /** the waypoint as it is in the result file */
  after: Waypoint;
  sourceId: string;
  distance: number;
}

export interface DeletedOutcome {
  waypoint: Waypoint;
  candidate: Waypoint;
  sourceId: string;
  distance: number;
}

export interface NotUpdatedOutcome {
  waypoint: Waypoint;
  candidate: Waypoint;
  sourceId: string;
  distance: number;
  /** "distance": candidate beyond the update radius; "closed": closed and deletion not requested */
  reason: "distance" | "closed";
}

export interface ReconcileOutcomes {
  updated: UpdatedOutcome[];
  added: Waypoint[];
  deleted: DeletedOutcome[];
  notUpdated: NotUpdatedOutcome[];
  notFound: Waypoint[];
}

export interface ReconcileCounts {
  totalWaypointsBefore: number;
  totalAirportsBefore: number;
  totalWaypointsAfter: number;
  totalAirportsAfter: number;
  updated: number;
  added: number;
  deleted: number;
  notFound: number;
  notUpdated: number;
  /** updated airports per distance bucket, keyed `distance_lte_<m>m` */
  distanceBuckets: Record<string, number>;
}

export interface ReconcileResult {
  file: CupFile;
  report: string;
  counts: ReconcileCounts;
  outcomes: ReconcileOutcomes;
}

interface DistanceBucket {
  limit: number;
  key: string;
}

/** 500 m steps below the update radius, then the update radius itself. */
export function distanceBuckets(updateRadius: number): DistanceBucket[] {
  const limits: number[] = [];
  for (let d = BUCKET_STEP_M; d < updateRadius; d += BUCKET_STEP_M) limits.push(d);
  limits.push(updateRadius);
  return limits.map((limit) => ({ limit, key: `distance_lte_${limit}m` }));
}

function parseFlags(options: ReconcileOptions): ReconcileFlags {
  const parsed = ReconcileFlags.safeParse({
    searchRadius: options.searchRadius,
    updateRadius: options.updateRadius,
    updateLocations: options.updateLocations,
    deleteClosed: options.deleteClosed,
    addNew: options.addNew,
  });
  if (!parsed.success) {
    throw new ApplicationError(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  }
  if (parsed.data.updateRadius > parsed.data.searchRadius) {
    throw new ApplicationError(
      `Update radius (${parsed.data.updateRadius}m) must not exceed the search radius (${parsed.data.searchRadius}m)`
    );
  }
  return parsed.data;
}

function candidateWaypoint(airport: DirectoryAirport, countries: CountryLookup): Waypoint {
  try {
    return directoryAirportToWaypoint(airport, countries);
  } catch (e) {
    if (e instanceof ValidationError) {
      throw new QueryError(`airport '${airport.name}' (${airport.sourceId}) is invalid: ${e.message}`, "directory", { cause: e });
    }
    throw e;
  }
}

function keepUnit(value: Readonly<Distance>, current: Readonly<Distance> | null): Distance {
  return { meters: value.meters, unit: current?.unit ?? value.unit };
}

/** Copies the non-empty directory values onto `target`, keeping its distance units. */
function applyDirectoryValues(target: Waypoint, source: Waypoint, updateLocations: boolean) {
  if (updateLocations) target.setCoordinates(source.lat, source.lon);
  if (source.elev) target.setElev(keepUnit(source.elev, target.elev));
  if (source.style) target.setStyle(source.style);
  if (source.rwdir) target.setRunwayDirection(source.rwdir);
  if (source.rwlen) target.setRunwayLength(keepUnit(source.rwlen, target.rwlen));
  if (source.rwwidth) target.setRunwayWidth(keepUnit(source.rwwidth, target.rwwidth));
  if (source.freq) target.setFreq(source.freq);
}

/**
 * Matches the airports of `input` against the directory and returns an updated
 * copy of the file plus a report. `input` itself is never modified.
 */
export async function updateAirportsInCup(input: CupFile, options: ReconcileOptions): Promise<ReconcileResult> {
  const flags = parseFlags(options);
  const { directory, countries } = options;
  const fileName = options.fileName ?? input.fileName;
  const log = (options.logger ?? defaultLogger).child({ file: fileName ?? undefined });

  const file = input.clone();
  const airports = file.airports();
  const totalWaypointsBefore = file.size;
  const totalAirportsBefore = airports.length;

  const buckets = distanceBuckets(flags.updateRadius);
  const bucketCounts: Record<string, number> = Object.fromEntries(buckets.map((b) => [b.key, 0]));
  const outcomes: ReconcileOutcomes = { updated: [], added: [], deleted: [], notUpdated: [], notFound: [] };
  // directory ids already used by this file, across all batches
  const seenIds = new Set<string>();

  for (let i = 0; i < airports.length; i += BATCH_SIZE) {
    const batch = airports.slice(i, i + BATCH_SIZE);
    const points = batch.map((w) => w.getPoint());

    const matches = await directory.nearestBulk(points, flags.searchRadius);
    const byIndex = new Map<number, NearestMatch>(matches.map((m) => [m.pointIndex, m]));
    log.debug({ from: i, size: batch.length, matches: matches.filter((m) => m.airport).length }, "nearest batch");

    batch.forEach((waypoint, idx) => {
      const match = byIndex.get(idx + 1);
      if (!match || !match.airport || match.distance == null) {
        outcomes.notFound.push(waypoint);
        return;
      }

      const airport = match.airport;
      const distance = match.distance;
      const candidate = candidateWaypoint(airport, countries);

      if (distance > flags.updateRadius) {
        outcomes.notUpdated.push({ waypoint, candidate, sourceId: airport.sourceId, distance, reason: "distance" });
        return;
      }

      seenIds.add(airport.sourceId);

      if (!isClosed(airport)) {
        const before = waypoint.clone();
        applyDirectoryValues(waypoint, candidate, flags.updateLocations);
        outcomes.updated.push({ before, after: waypoint, sourceId: airport.sourceId, distance });
        const bucket = buckets.find((b) => distance <= b.limit);
        if (bucket) bucketCounts[bucket.key] += 1;
      } else if (flags.deleteClosed) {
        file.remove(waypoint);
        outcomes.deleted.push({ waypoint, candidate, sourceId: airport.sourceId, distance });
      } else {
        outcomes.notUpdated.push({ waypoint, candidate, sourceId: airport.sourceId, distance, reason: "closed" });
      }
    });

    if (flags.addNew) {
      const [minLon, minLat, maxLon, maxLat] = bbox(multiPoint(points.map(toPosition)));
      const found = await directory.inBoundingBox(
        { minLat, minLon, maxLat, maxLon },
        { excludeIds: [...seenIds], excludeTypes: NOT_ADDABLE_TYPES }
      );
      for (const airport of found) {
        if (seenIds.has(airport.sourceId)) continue;
        const waypoint = candidateWaypoint(airport, countries);
        file.add(waypoint);
        seenIds.add(airport.sourceId);
        outcomes.added.push(waypoint);
      }
      log.debug({ from: i, added: found.length }, "bbox batch");
    }
  }

  const counts: ReconcileCounts = {
    totalWaypointsBefore,
    totalAirportsBefore,
    totalWaypointsAfter: file.size,
    totalAirportsAfter: file.airports().length,
    updated: outcomes.updated.length,
    added: outcomes.added.length,
    deleted: outcomes.deleted.length,
    notFound: outcomes.notFound.length,
    notUpdated: outcomes.notUpdated.length,
    distanceBuckets: bucketCounts,
  };

  log.info(
    { updated: counts.updated, added: counts.added, deleted: counts.deleted, notFound: counts.notFound, notUpdated: counts.notUpdated },
    "airports reconciled"
  );

  const report = generateReport({
    fileName,
    counts,
    outcomes,
    searchRadius: flags.searchRadius,
    updateRadius: flags.updateRadius,
    now: options.now ?? new Date(),
  });

  return { file, report, counts, outcomes };
}

// ────────────────────────────────────────────────────────────────────────────────
// Report

export interface ReportInput {
  fileName: string | null | undefined;
  counts: ReconcileCounts;
  outcomes: ReconcileOutcomes;
  searchRadius: number;
  updateRadius: number;
  now: Date;
}

const BANNER = "#".repeat(60);

/** Six significant digits, always with a decimal part: 46 -> "46.0", 14.1234567 -> "14.1235". */
export function formatCoordinate(value: number): string {
  const text = String(Number(value.toPrecision(6)));
  return /[.e]/.test(text) ? text : `${text}.0`;
}

/** `2024-05-01T10:30+00:00` */
export function formatUtcMinutes(date: Date): string {
  return `${date.toISOString().slice(0, 16)}+00:00`;
}

function position(w: Waypoint): string {
  return `${formatCoordinate(w.lat)}, ${formatCoordinate(w.lon)}`;
}

export function generateReport(input: ReportInput): string {
  const { counts: c, outcomes: o } = input;

  let report = [
    "",
    BANNER,
    `Report for: ${input.fileName || "Unknown File Name"}`,
    `Updated on: ${formatUtcMinutes(input.now)}`,
    BANNER,
    "",
    "# General",
    "Before the update the file had:",
    `${c.totalWaypointsBefore} total waypoints`,
    `${c.totalAirportsBefore} airports`,
    "",
    `We search for candidates in the airport directory with a radius of ${input.searchRadius}m around the point of the`,
    "airport stored in the CUP file. The airport is updated if the distance between the point of the",
    `airport and the found airport in the directory is less than the update radius of: ${input.updateRadius}m`,
    "",
    "After update the file has:",
    `${c.totalWaypointsAfter} total waypoints`,
    `${c.totalAirportsAfter} airports`,
    "",
    `${c.updated} Airports were updated,`,
    `${c.added} were added,`,
    `${c.deleted} were deleted,`,
    `${c.notFound} were not found in the directory and,`,
    `${c.notUpdated} were already up to date.`,
    "",
    "",
  ].join("\n");

  if (o.updated.length > 0) {
    report += "# List of updated airports:\n";
    for (const item of o.updated) {
      report += `Old: ${item.before.toString()}\n`;
      report += `New: ${item.after.toString()}\n`;
      report += `Dst: ${item.distance.toFixed(0)}m\n\n`;
    }
  }

  if (o.added.length > 0) {
    report += "# List of added airports:\n";
    for (const w of o.added) report += `${w.name}: ${position(w)}\n`;
    report += "\n";
  }

  if (o.deleted.length > 0) {
    report += "# List of deleted airports:\n";
    for (const item of o.deleted) {
      report += `${item.waypoint.name}: ${position(item.waypoint)} Closed. Dst: ${item.distance.toFixed(0)}m\n`;
    }
    report += "\n";
  }

  if (o.notUpdated.length > 0) {
    report += "\n# List of airports that were not updated:\n";
    for (const item of o.notUpdated) {
      report += `Apt in CUP:\t${item.waypoint.toString()}\n`;
      report += `Candidate:\t${item.candidate.toString()}\n`;
      report +=
        item.reason === "closed"
          ? `Dst:\t\t${item.distance.toFixed(0)}m, closed\n\n`
          : `Dst:\t\t${item.distance.toFixed(0)}m > ${input.updateRadius}\n\n`;
    }
  }

  if (o.notFound.length > 0) {
    report += "\n# List of airports that were not found in the directory:\n";
    for (const w of o.notFound) report += `${w.name}: ${position(w)}\n`;
  }

  return report;
}
