// Freeform coordinate extraction.
// Supported notations:
//  1) ICAO compact:  461010N 0144103E            (lat DDMMSS, lon DDDMMSS)
//  2) eAPI spaced:   46 10 29 N 013 39 58 E
//  3) AIP compact:   455404.3N 0153113.7E, 45°54'04.3"N 015°31'13.7"E
//  4) OpenAir DP:    DP 46:19:13N 014:22:12E
// Line parsers return GeoPoint or null; the combinators decide what a miss means.

import type { Feature, FeatureCollection, Geometry, MultiPolygon, Polygon, Position } from "geojson";
import { FormatError } from "../lib/errors";
import type { CoordinateNotation, GeoPoint } from "../models/geo";
import { closeRing } from "./openair";
import { applyHemisphere, dmsToDecimal, isValidLat, isValidLon, matchDmsPair } from "./units";

type LineParser = (line: string) => GeoPoint | null;

const ICAO_PATTERN = String.raw`(\d{2})(\d{2})(\d{2})([NS])\s+(\d{3})(\d{2})(\d{2})([EW])`;
const EAPI_PATTERN = String.raw`(\d+)\s+(\d+)\s+(\d+)\s+([NS])\s+(\d+)\s+(\d+)\s+(\d+)\s+([EW])`;
const AIP_PATTERN = String.raw`(\d{2,3})(\d{2})(\d{2}(?:\.\d+)?)([NS])\s*(\d{2,3})(\d{2})(\d{2}(?:\.\d+)?)([EW])`;

const COMPACT_OPENAIR_REGEX = /^(\d{2})(\d{2})(\d{2})([NS])\s*(\d{3})(\d{2})(\d{2})([EW])/;

// ────────────────────────────────────────────────────────────────────────────────

function stripDmsSymbols(text: string): string {
  return text.replace(/[°º∘′’'″"]/g, "");
}

/** Builds a point from the 8 capture groups shared by every DMS pattern. */
function pointFromGroups(groups: string[], src: string, notation: CoordinateNotation): GeoPoint | null {
  const [latD, latM, latS, latH, lonD, lonM, lonS, lonH] = groups;
  const minSec = [latM, latS, lonM, lonS].map(Number);
  if (minSec.some((v) => v >= 60)) return null;

  const lat = applyHemisphere(dmsToDecimal(Number(latD), minSec[0], minSec[1]), latH);
  const lon = applyHemisphere(dmsToDecimal(Number(lonD), minSec[2], minSec[3]), lonH);
  if (!isValidLat(lat) || !isValidLon(lon)) return null;
  return { lat, lon, src, notation };
}

function matchAnchored(pattern: string, text: string, notation: CoordinateNotation): GeoPoint | null {
  const m = new RegExp(`^${pattern}`).exec(text);
  return m ? pointFromGroups(m.slice(1), m[0], notation) : null;
}

function* matchEverywhere(pattern: string, text: string, notation: CoordinateNotation): Generator<GeoPoint> {
  for (const m of text.matchAll(new RegExp(pattern, "g"))) {
    const point = pointFromGroups(m.slice(1), m[0], notation);
    if (point) yield point;
  }
}

// ────────────────────────────────────────────────────────────────────────────────
// Single-line parsers

export const parseIcaoCompact: LineParser = (line) => matchAnchored(ICAO_PATTERN, line.trim(), "icao");

export const parseEapiLine: LineParser = (line) => matchAnchored(EAPI_PATTERN, line.trim(), "eapi");

/** `455404.3N 0153113.7E`; degree, minute and second symbols are ignored. */
export const parseAipPoint: LineParser = (line) =>
  matchAnchored(AIP_PATTERN, stripDmsSymbols(line.trim()), "aip");

export const parseDpLine: LineParser = (line) => {
  const text = line.trim();
  if (!/^DP\s/i.test(text)) return null;
  const res = matchDmsPair(text.slice(2));
  if (!res || !isValidLat(res.lat) || !isValidLon(res.lon)) return null;
  return { lat: res.lat, lon: res.lon, src: text, notation: "openair" };
};

const LINE_PARSERS: readonly LineParser[] = [parseDpLine, parseIcaoCompact, parseAipPoint, parseEapiLine];

/** First notation that reads the line wins. */
export function parseCoordinateLine(line: string): GeoPoint {
  for (const parse of LINE_PARSERS) {
    const point = parse(line);
    if (point) return point;
  }
  throw new FormatError(`Could not parse line as DP, ICAO, AIP or eAPI coordinate: ${line}`, line);
}

// ────────────────────────────────────────────────────────────────────────────────
// Text blobs

export function findIcaoCoordinates(text: string): GeoPoint[] {
  return [...matchEverywhere(ICAO_PATTERN, text, "icao")];
}

export function findEapiCoordinates(text: string): GeoPoint[] {
  return [...matchEverywhere(EAPI_PATTERN, text, "eapi")];
}

export function findAipCoordinates(text: string): GeoPoint[] {
  return [...matchEverywhere(AIP_PATTERN, stripDmsSymbols(text), "aip")];
}

/**
 * Every ICAO, eAPI and AIP coordinate found in `text`, in that order, without
 * exact duplicates.
 */
export function extractAllCoordinates(text: string): GeoPoint[] {
  const seen = new Set<string>();
  const out: GeoPoint[] = [];
  for (const p of [...findIcaoCoordinates(text), ...findEapiCoordinates(text), ...findAipCoordinates(text)]) {
    const key = `${p.lon},${p.lat}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(p);
  }
  return out;
}

// ────────────────────────────────────────────────────────────────────────────────
// Polygon helpers

function polygonFeature(points: GeoPoint[], name?: string): Feature<Polygon> {
  const ring: Position[] = closeRing(points.map((p) => [p.lon, p.lat]));
  return {
    type: "Feature",
    geometry: { type: "Polygon", coordinates: [ring] },
    properties: name ? { name } : {},
  };
}

export function icaoCoordinatesToPolygon(text: string, name?: string): Feature<Polygon> {
  const points = findIcaoCoordinates(text);
  if (points.length === 0) throw new FormatError("No valid ICAO compact coordinates found", text);
  return polygonFeature(points, name);
}

/** One coordinate per non-empty line, any supported notation. */
export function linesToPolygon(text: string, name?: string): Feature<Polygon> {
  const points = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean)
    .map(parseCoordinateLine);
  if (points.length === 0) throw new FormatError("No coordinates given", text);
  return polygonFeature(points, name);
}

function matchCompactToOpenAir(line: string): string | null {
  const m = COMPACT_OPENAIR_REGEX.exec(line.trim());
  if (!m) return null;
  const [, latD, latM, latS, latH, lonD, lonM, lonS, lonH] = m;
  return `DP ${latD}:${latM}:${latS}${latH} ${lonD}:${lonM}:${lonS}${lonH}`;
}

/** `455210N 0135035E` -> `DP 45:52:10N 013:50:35E` */
export function compactToOpenAir(line: string): string {
  const dp = matchCompactToOpenAir(line);
  if (!dp) throw new FormatError("Line must be in format 455210N 0135035E", line);
  return dp;
}

/** Converts every compact line of `text`; lines in other formats are left out. */
export function batchCompactToOpenAir(text: string): string[] {
  const out: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const dp = matchCompactToOpenAir(line);
    if (dp) out.push(dp);
  }
  return out;
}

function closeGeometryRings(geometry: Geometry): Geometry {
  switch (geometry.type) {
    case "Polygon":
      return { ...geometry, coordinates: geometry.coordinates.map(closeRing) };
    case "MultiPolygon":
      return { ...geometry, coordinates: geometry.coordinates.map((polygon) => polygon.map(closeRing)) };
    default:
      return geometry;
  }
}

export type PolygonInput = FeatureCollection | Polygon | MultiPolygon;

/** Returns a copy in which every Polygon/MultiPolygon ring is closed. */
export function closePolygonRings(geojson: PolygonInput): PolygonInput {
  if (geojson.type === "FeatureCollection") {
    return {
      ...geojson,
      features: geojson.features.map((f) => ({ ...f, geometry: closeGeometryRings(f.geometry) })),
    };
  }
  if (geojson.type === "Polygon") {
    return { ...geojson, coordinates: geojson.coordinates.map(closeRing) };
  }
  return { ...geojson, coordinates: geojson.coordinates.map((polygon) => polygon.map(closeRing)) };
}
