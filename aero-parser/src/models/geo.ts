import type { Position } from "geojson";

/** Geographic point in decimal degrees. */
export interface GeoPoint {
  /** latitude in decimal degrees */
  lat: number;
  /** longitude in decimal degrees */
  lon: number;
  /** original token/line that produced this coordinate */
  src?: string;
  /** notation the coordinate was read from */
  notation?: CoordinateNotation;
}

export type CoordinateNotation = "icao" | "eapi" | "aip" | "openair";

/** `{ lon, lat }` as sent to the directory queries. */
export interface LonLat {
  lon: number;
  lat: number;
}

export interface BoundingBox {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}

/** GeoJSON axis order: [lon, lat]. */
export function toPosition(p: LonLat): Position {
  return [p.lon, p.lat];
}
