// Unit and coordinate conversions shared by the CUP codec, the OpenAir converter
// and the freeform coordinate extractor. Everything here is pure.
//
// CUP notation:   5107.830N  / 01410.467E   (DDMM.mmm / DDDMM.mmm)
// OpenAir DMS:    46:19:13.0000N 014:22:12.0000E
// Distances:      504.0m, 1640ft, 1.20nm, 0.75ml  (stored as meters + unit)

import { FormatError, ValidationError } from "../lib/errors";
import { CUP_STYLES, UNIT_TO_M, type Distance, type DistanceUnit } from "../models/cup";

export type Hemisphere = "N" | "S" | "E" | "W";
export type Axis = "lat" | "lon";

export function dmsToDecimal(deg: number, min: number, sec: number): number {
  return deg + min / 60 + sec / 3600;
}

export function applyHemisphere(value: number, hemi: string): number {
  const h = hemi.toUpperCase();
  const sign = h === "S" || h === "W" ? -1 : 1;
  return sign * value;
}

export function isValidLat(lat: number): boolean {
  return Number.isFinite(lat) && lat >= -90 && lat <= 90;
}

export function isValidLon(lon: number): boolean {
  return Number.isFinite(lon) && lon >= -180 && lon <= 180;
}

function hemisphereFor(value: number, axis: Axis): Hemisphere {
  // -0 comes from parsing "0000.000S" and keeps its hemisphere
  const positive = value > 0 || Object.is(value, 0);
  if (axis === "lat") return positive ? "N" : "S";
  return positive ? "E" : "W";
}

function assertInRange(value: number, axis: Axis, raw: unknown) {
  const ok = axis === "lat" ? isValidLat(value) : isValidLon(value);
  if (!ok) {
    const limit = axis === "lat" ? 90 : 180;
    throw new ValidationError(axis, raw, `${axis === "lat" ? "Latitude" : "Longitude"} must be between -${limit} and ${limit} degrees, is: ${String(raw)}`);
  }
}

// ────────────────────────────────────────────────────────────────────────────────
// CUP DDMM.mmm notation

const CUP_LAT_REGEX = /^(\d{2})(\d{2}\.\d{1,3})([NS])$/i;
const CUP_LON_REGEX = /^(\d{3})(\d{2}\.\d{1,3})([EW])$/i;

/**
 * Parses a CUP latitude (`DDMM.mmm{N|S}`) or longitude (`DDDMM.mmm{E|W}`) into
 * decimal degrees. The latitude pattern is tried first. With `expected` set, a
 * string of the other axis is rejected.
 */
export function parseCupCoordinate(coord: string, expected?: Axis): number {
  const text = coord.trim();
  const patterns: Array<[RegExp, Axis]> = [
    [CUP_LAT_REGEX, "lat"],
    [CUP_LON_REGEX, "lon"],
  ];

  for (const [re, axis] of patterns) {
    const m = re.exec(text);
    if (!m) continue;
    if (expected && expected !== axis) {
      throw new FormatError(`Expected a ${expected === "lat" ? "latitude" : "longitude"}, got: ${coord}`, coord);
    }
    const [, deg, min, hemi] = m;
    const minutes = Number(min);
    if (minutes >= 60) {
      throw new FormatError(`Minutes out of range in coordinate: ${coord}`, coord);
    }
    const value = applyHemisphere(dmsToDecimal(Number(deg), minutes, 0), hemi);
    assertInRange(value, axis, coord);
    return value;
  }

  throw new FormatError(`Invalid coordinate format: ${coord}`, coord);
}

function formatCup(value: number, axis: Axis): string {
  assertInRange(value, axis, value);
  const abs = Math.abs(value);
  let deg = Math.trunc(abs);
  let minutes = Math.round((abs - deg) * 60 * 1000) / 1000;
  if (minutes >= 60) {
    deg += 1;
    minutes = 0;
  }
  const degWidth = axis === "lat" ? 2 : 3;
  return `${String(deg).padStart(degWidth, "0")}${minutes.toFixed(3).padStart(6, "0")}${hemisphereFor(value, axis)}`;
}

export function formatCupLatitude(lat: number): string {
  return formatCup(lat, "lat");
}

export function formatCupLongitude(lon: number): string {
  return formatCup(lon, "lon");
}

export function formatCupLatLon(lat: number, lon: number): [string, string] {
  return [formatCupLatitude(lat), formatCupLongitude(lon)];
}

// ────────────────────────────────────────────────────────────────────────────────
// DMS with seconds, as written on OpenAir DP lines

const DMS_PAIR_REGEX =
  /^(\d+):(\d+):(\d+(?:\.\d*)?) ?([NS])[\s,]+(\d+):(\d+):(\d+(?:\.\d*)?) ?([EW])/i;

/**
 * Reads `46:19:13.0000N 014:22:12.0000E` (a space before the hemisphere letter
 * is allowed). Returns null when the text does not match or minutes/seconds
 * are out of range; magnitudes are not checked.
 */
export function matchDmsPair(text: string): { lat: number; lon: number } | null {
  const m = DMS_PAIR_REGEX.exec(text.trim());
  if (!m) return null;
  const [, latD, latM, latS, latH, lonD, lonM, lonS, lonH] = m;
  const parts = [latM, latS, lonM, lonS].map(Number);
  if (parts.some((v) => v >= 60)) return null;
  return {
    lat: applyHemisphere(dmsToDecimal(Number(latD), parts[0], parts[1]), latH),
    lon: applyHemisphere(dmsToDecimal(Number(lonD), parts[2], parts[3]), lonH),
  };
}

/** Like matchDmsPair, but throws FormatError / ValidationError. */
export function parseDmsPair(text: string): { lat: number; lon: number } {
  const res = matchDmsPair(text);
  if (!res) throw new FormatError(`Invalid DMS coordinate: ${text}`, text);
  assertInRange(res.lat, "lat", text);
  assertInRange(res.lon, "lon", text);
  return res;
}

/** `DD:MM:SS.ssss{N|S}` for latitude, `DDD:MM:SS.ssss{E|W}` for longitude. */
export function formatDms(value: number, axis: Axis): string {
  assertInRange(value, axis, value);
  // round once on total seconds so 59.99999" carries into the next minute
  const totalSec = Math.round(Math.abs(value) * 3600 * 10000) / 10000;
  const d = Math.floor(totalSec / 3600);
  const m = Math.floor((totalSec - d * 3600) / 60);
  const s = totalSec - d * 3600 - m * 60;
  const degWidth = axis === "lat" ? 2 : 3;
  return `${String(d).padStart(degWidth, "0")}:${String(m).padStart(2, "0")}:${s.toFixed(4).padStart(7, "0")}${hemisphereFor(value, axis)}`;
}

// ────────────────────────────────────────────────────────────────────────────────
// Distances

const CUP_DISTANCE_REGEX = /^([-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?)(ft|m|nm|ml)$/i;

export function isDistanceUnit(unit: string): unit is DistanceUnit {
  return unit === "m" || unit === "ft" || unit === "nm" || unit === "ml";
}

/**
 * Parses `"504.0m"`, `"1000ft"`, `"1.2nm"`, `"0.5ml"`. An empty string yields the
 * absent sentinel `{ meters: -Infinity, unit: "m" }`.
 */
export function parseDistance(dist: string): Distance {
  const text = dist.trim().toLowerCase();
  if (text === "") return { meters: -Infinity, unit: "m" };

  const m = CUP_DISTANCE_REGEX.exec(text);
  if (!m) throw new FormatError(`Invalid distance format: ${dist}`, dist);

  const [, value, unit] = m;
  if (!isDistanceUnit(unit)) throw new FormatError(`Unsupported unit: ${unit}`, dist);

  return { meters: Number(value) * UNIT_TO_M[unit], unit };
}

/**
 * `toFixed` with exact ties rounded to the even digit, the way printf-style
 * formatting treats them (434.5 -> "434", 0.125 -> "0.12").
 */
export function toFixedHalfEven(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  const expanded = Math.abs(value).toFixed(digits + 60);
  if (expanded.slice(-60) !== "5" + "0".repeat(59)) return rounded;
  const truncated = expanded.slice(0, -60).replace(/\.$/, "");
  const lastDigit = Number(truncated[truncated.length - 1]);
  if (lastDigit % 2 === 1) return rounded;
  return value < 0 ? `-${truncated}` : truncated;
}

export function formatDistance(meters: number | null | undefined, unit: string): string {
  if (meters == null || meters === -Infinity) return "";

  const u = unit.toLowerCase();
  const target: DistanceUnit = isDistanceUnit(u) ? u : "m";
  const value = meters / UNIT_TO_M[target];

  switch (target) {
    case "ft":
      return `${toFixedHalfEven(value, 0)}ft`;
    case "nm":
      return `${toFixedHalfEven(value, 2)}nm`;
    case "ml":
      return `${toFixedHalfEven(value, 2)}ml`;
    case "m":
      // whole tenths are written without decimals
      return (value * 10) % 1 === 0 ? `${toFixedHalfEven(value, 0)}m` : `${toFixedHalfEven(value, 1)}m`;
  }
}

// ────────────────────────────────────────────────────────────────────────────────
// Field validators

const CUP_FREQ_REGEX = /^(118|119|12[0-9]|13[0-6])\.(?:\d{2}[05]|\d{2}|\d)$/;

/** Civil VHF airband, 118.000–136.990 MHz. */
export function isValidFrequency(freq: string): boolean {
  return CUP_FREQ_REGEX.test(freq.trim());
}

export function isValidStyle(style: string | number): boolean {
  if (typeof style === "number") return Number.isInteger(style) && style in CUP_STYLES;
  return /^\d+$/.test(style.trim()) && Number(style) in CUP_STYLES;
}
