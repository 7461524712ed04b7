import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import wk from "wellknown";
import { Geometry as WkxGeometry, Point as WkxPoint } from "wkx";
import { z } from "zod";
import { CountryTable } from "../lib/countries";
import { QueryError, errorMessage } from "../lib/errors";
import {
  toAirportType,
  type AirportDirectory,
  type BoundingBoxQuery,
  type DirectoryAirport,
  type NearestMatch,
} from "../models/directory";
import type { BoundingBox, LonLat } from "../models/geo";

export const NEAREST_BULK_RPC = "get_nearby_airports_bulk";
export const BBOX_RPC = "get_airports_in_bbox";

export function createDirectoryClient(url?: string, key?: string): SupabaseClient | null {
  if (!url || !key) return null;
  return createClient(url, key, { auth: { persistSession: false } });
}

// ────────────────────────────────────────────────────────────────────────────────
// Row schemas

const GeoJsonPoint = z.object({
  type: z.literal("Point"),
  coordinates: z.array(z.number()).min(2),
});

const AirportRow = z.object({
  id: z.number().int().nullish(),
  source_id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  code: z.string().nullish(),
  country: z.string(),
  location: z.union([z.string(), GeoJsonPoint]),
  elev: z.number().nullish(),
  style: z.number().int().nullish(),
  apt_type: z.number().int().nullish(),
  rw_dir: z.number().nullish(),
  rw_len: z.number().nullish(),
  rw_width: z.number().nullish(),
  freq: z.union([z.string(), z.number().transform(String)]).nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

type AirportRow = z.infer<typeof AirportRow>;

// Unmatched points come back with id/distance null and no airport columns
const NearestRow = z
  .object({
    point_index: z.number().int().positive(),
    id: z.number().int().nullish(),
    distance: z.number().nullish(),
  })
  .passthrough();

const CountryRow = z.object({
  iso2: z.string().length(2),
  name: z.string(),
  iso3: z.string().nullish(),
  local_name: z.string().nullish(),
  region: z.string().nullish(),
});

// ────────────────────────────────────────────────────────────────────────────────
// Point geometry: hex (E)WKB from PostGIS, WKT/EWKT, or a GeoJSON Point

const HEX = /^[0-9a-f]+$/i;

export function parsePointLocation(location: string | z.infer<typeof GeoJsonPoint>): LonLat | null {
  if (typeof location !== "string") {
    const [lon, lat] = location.coordinates;
    return { lon, lat };
  }

  const text = location.trim();
  if (HEX.test(text) && text.length % 2 === 0) {
    const geom = WkxGeometry.parse(Buffer.from(text, "hex"));
    return geom instanceof WkxPoint ? { lon: geom.x, lat: geom.y } : null;
  }

  const parsed = GeoJsonPoint.safeParse(wk.parse(text));
  if (!parsed.success) return null;
  const [lon, lat] = parsed.data.coordinates;
  return { lon, lat };
}

function toDirectoryAirport(row: AirportRow, operation: string): DirectoryAirport {
  let point: LonLat | null;
  try {
    point = parsePointLocation(row.location);
  } catch (e) {
    throw new QueryError(`unreadable location for '${row.name}': ${errorMessage(e)}`, operation, { cause: e });
  }
  if (!point) throw new QueryError(`location of '${row.name}' is not a point`, operation);

  return {
    id: row.id ?? null,
    sourceId: row.source_id,
    name: row.name,
    code: row.code ?? null,
    country: row.country,
    lat: point.lat,
    lon: point.lon,
    elev: row.elev ?? null,
    style: row.style ?? null,
    aptType: toAirportType(row.apt_type),
    rwDir: row.rw_dir ?? null,
    rwLen: row.rw_len ?? null,
    rwWidth: row.rw_width ?? null,
    freq: row.freq ?? null,
    createdAt: row.created_at ?? null,
    updatedAt: row.updated_at ?? null,
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

/** Validates the bulk nearest-neighbour RPC result. */
export function parseNearestResponse(data: unknown): NearestMatch[] {
  const rows = z.array(NearestRow).safeParse(data ?? []);
  if (!rows.success) throw new QueryError(describeIssues(rows.error), NEAREST_BULK_RPC);

  return rows.data.map((row) => {
    if (row.id == null || row.distance == null) {
      return { pointIndex: row.point_index, airport: null, distance: null };
    }
    const airport = AirportRow.safeParse(row);
    if (!airport.success) {
      throw new QueryError(`point ${row.point_index}: ${describeIssues(airport.error)}`, NEAREST_BULK_RPC);
    }
    return {
      pointIndex: row.point_index,
      airport: toDirectoryAirport(airport.data, NEAREST_BULK_RPC),
      distance: row.distance,
    };
  });
}

export function parseBboxResponse(data: unknown): DirectoryAirport[] {
  const rows = z.array(AirportRow).safeParse(data ?? []);
  if (!rows.success) throw new QueryError(describeIssues(rows.error), BBOX_RPC);
  return rows.data.map((row) => toDirectoryAirport(row, BBOX_RPC));
}

// ────────────────────────────────────────────────────────────────────────────────

/** The slice of `SupabaseClient` the directory calls. */
export interface RpcClient {
  rpc(fn: string, params?: Record<string, unknown>): PromiseLike<{ data: unknown; error: { message: string } | null }>;
}

/** AirportDirectory backed by the PostGIS functions of the Supabase project. */
export class SupabaseAirportDirectory implements AirportDirectory {
  constructor(private readonly client: RpcClient) {}

  async nearestBulk(points: LonLat[], thresholdMeters: number): Promise<NearestMatch[]> {
    const { data, error } = await this.client.rpc(NEAREST_BULK_RPC, {
      points: points.map((p) => ({ lon: p.lon, lat: p.lat })),
      threshold: thresholdMeters,
    });
    if (error) throw new QueryError(error.message, NEAREST_BULK_RPC, { cause: error });
    return parseNearestResponse(data);
  }

  async inBoundingBox(box: BoundingBox, query: BoundingBoxQuery = {}): Promise<DirectoryAirport[]> {
    const params: Record<string, unknown> = {
      min_lon: box.minLon,
      min_lat: box.minLat,
      max_lon: box.maxLon,
      max_lat: box.maxLat,
    };
    if (query.excludeIds?.length) params.exclude_ids = query.excludeIds;
    if (query.excludeTypes?.length) params.exclude_apt_types = [...query.excludeTypes];

    const { data, error } = await this.client.rpc(BBOX_RPC, params);
    if (error) throw new QueryError(error.message, BBOX_RPC, { cause: error });
    return parseBboxResponse(data);
  }
}

export async function fetchCountries(client: SupabaseClient): Promise<CountryTable> {
  const { data, error } = await client.from("countries").select("iso2,name,iso3,local_name,region");
  if (error) throw new QueryError(error.message, "countries", { cause: error });

  const rows = z.array(CountryRow).safeParse(data ?? []);
  if (!rows.success) throw new QueryError(describeIssues(rows.error), "countries");
  return new CountryTable(rows.data);
}

/** Timestamp of the latest directory import for `category`, or null if there was none. */
export async function getLastUpdate(client: SupabaseClient, category = "airports"): Promise<Date | null> {
  const { data, error } = await client
    .from("updates")
    .select("timestamp")
    .eq("category", category)
    .order("timestamp", { ascending: false })
    .limit(1);
  if (error) throw new QueryError(error.message, "updates", { cause: error });

  const rows = z.array(z.object({ timestamp: z.string() })).safeParse(data ?? []);
  if (!rows.success) throw new QueryError(describeIssues(rows.error), "updates");
  if (rows.data.length === 0) return null;

  const ts = new Date(rows.data[0].timestamp);
  if (Number.isNaN(ts.getTime())) throw new QueryError(`invalid timestamp '${rows.data[0].timestamp}'`, "updates");
  return ts;
}
