// OpenAir <-> GeoJSON.
//
// Supported OpenAir subset:
//   AC/AN/AY/AF/AG/AL/AH   properties (one value per line)
//   AA                     activation time, repeatable
//   DP lat lon             polygon vertex, 46:19:13.0000N 014:22:12.0000E
//   V X=lat lon + DC nm    circle
// Arcs (DA/DB) and other variables are ignored.

import { degreesToRadians, radiansToDegrees } from "@turf/turf";
import type { Feature, FeatureCollection, Polygon, Position } from "geojson";
import { FormatError } from "../lib/errors";
import { formatDms, parseDmsPair } from "./units";

export type AirspaceProperties = {
  class?: string;
  name?: string;
  type?: string;
  frequency?: string;
  station?: string;
  lower_limit?: string;
  upper_limit?: string;
  activation_times?: string[];
};

type TextProperty = Exclude<keyof AirspaceProperties, "activation_times">;

export type AirspaceGeometry =
  | { kind: "polygon"; coordinates: Position[] }
  | { kind: "circle"; center: { lat: number; lon: number }; radiusNm: number };

export interface Airspace {
  properties: AirspaceProperties;
  geometry: AirspaceGeometry;
}

export type AirspaceFeature = Feature<Polygon, AirspaceProperties>;
export type AirspaceCollection = FeatureCollection<Polygon, AirspaceProperties>;

const PROPERTY_MARKERS: Record<string, TextProperty> = {
  AC: "class",
  AN: "name",
  AY: "type",
  AF: "frequency",
  AG: "station",
  AL: "lower_limit",
  AH: "upper_limit",
};

export const CIRCLE_SAMPLES = 64;

interface ParserState {
  properties: AirspaceProperties;
  coords: Position[];
  activation: string[];
  center: { lat: number; lon: number } | null;
  radiusNm: number | null;
}

function emptyState(): ParserState {
  return { properties: {}, coords: [], activation: [], center: null, radiusNm: null };
}

function finalize(state: ParserState, out: Airspace[]) {
  let geometry: AirspaceGeometry | null = null;
  if (state.coords.length > 0) {
    geometry = { kind: "polygon", coordinates: state.coords };
  } else if (state.center && state.radiusNm != null) {
    geometry = { kind: "circle", center: state.center, radiusNm: state.radiusNm };
  }
  if (!geometry) return;

  const properties: AirspaceProperties = { ...state.properties };
  if (state.activation.length > 0) properties.activation_times = [...state.activation];
  out.push({ properties, geometry });
}

function readLatLon(value: string, lineNo: number): { lat: number; lon: number } {
  try {
    return parseDmsPair(value);
  } catch (e) {
    if (e instanceof FormatError) throw new FormatError(`Line ${lineNo}: ${e.message}`, value, { cause: e });
    throw e;
  }
}

/** Runs the OpenAir state machine over `text`. No state survives between calls. */
export function parseOpenAir(text: string): Airspace[] {
  const airspaces: Airspace[] = [];
  let state = emptyState();

  text.split(/\r?\n/).forEach((rawLine, idx) => {
    const line = rawLine.trim();
    const lineNo = idx + 1;
    if (!line || line.startsWith("*")) return;

    if (line.startsWith("AC")) {
      finalize(state, airspaces);
      state = emptyState();
    }

    const prop = PROPERTY_MARKERS[line.slice(0, 2)];
    if (prop) {
      state.properties[prop] = line.slice(3).trim();
    } else if (line.startsWith("AA")) {
      state.activation.push(line.slice(3).trim());
    } else if (line.startsWith("V X=")) {
      state.center = readLatLon(line.slice(4).trim(), lineNo);
    } else if (line.startsWith("DP")) {
      const { lat, lon } = readLatLon(line.slice(3).trim(), lineNo);
      state.coords.push([lon, lat]);
    } else if (line.startsWith("DC")) {
      const value = line.slice(3).trim();
      const radius = value === "" ? NaN : Number(value);
      if (state.center && Number.isFinite(radius)) state.radiusNm = radius;
    }
  });

  finalize(state, airspaces);
  return airspaces;
}

/**
 * Equirectangular approximation: 1 NM = 1/60 degree of latitude, longitude
 * offsets divided by cos(center latitude). Returns a closed ring.
 */
export function circleToRing(center: { lat: number; lon: number }, radiusNm: number, samples = CIRCLE_SAMPLES): Position[] {
  const lat0 = degreesToRadians(center.lat);
  const lon0 = degreesToRadians(center.lon);
  const radiusDeg = radiusNm / 60;
  const ring: Position[] = [];

  for (let i = 0; i < samples; i++) {
    const angle = (2 * Math.PI * i) / samples;
    const dLat = radiusDeg * Math.cos(angle);
    const dLon = (radiusDeg * Math.sin(angle)) / Math.cos(lat0);
    ring.push([radiansToDegrees(lon0 + degreesToRadians(dLon)), radiansToDegrees(lat0 + degreesToRadians(dLat))]);
  }
  ring.push([...ring[0]]);
  return ring;
}

/** Appends the first position when the ring is open. */
export function closeRing(coords: Position[]): Position[] {
  if (coords.length === 0) return coords;
  const first = coords[0];
  const last = coords[coords.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) return coords;
  return [...coords, [...first]];
}

export function airspaceToFeature(airspace: Airspace): AirspaceFeature {
  const ring =
    airspace.geometry.kind === "polygon"
      ? closeRing(airspace.geometry.coordinates)
      : circleToRing(airspace.geometry.center, airspace.geometry.radiusNm);

  return {
    type: "Feature",
    geometry: { type: "Polygon", coordinates: [ring] },
    properties: airspace.properties,
  };
}

export function openAirToGeoJson(text: string): AirspaceCollection {
  return {
    type: "FeatureCollection",
    features: parseOpenAir(text).map(airspaceToFeature),
  };
}

// ────────────────────────────────────────────────────────────────────────────────
// GeoJSON -> OpenAir

const OUTPUT_ORDER: Array<[string, TextProperty]> = [
  ["AC", "class"],
  ["AY", "type"],
  ["AN", "name"],
  ["AF", "frequency"],
  ["AG", "station"],
  ["AL", "lower_limit"],
  ["AH", "upper_limit"],
];

/**
 * Writes every Polygon feature as one airspace. Other geometry types are
 * skipped. Every ring position becomes a DP line, the closing one included.
 */
export function geoJsonToOpenAir(geojson: FeatureCollection | Feature): string {
  const features = geojson.type === "FeatureCollection" ? geojson.features : [geojson];
  const lines = ["*VERSION: 2.0", "*WRITTEN_BY: aerodata"];

  for (const feature of features) {
    const geometry = feature.geometry;
    if (!geometry || geometry.type !== "Polygon") continue;
    const props: Record<string, unknown> = feature.properties ?? {};

    for (const [marker, key] of OUTPUT_ORDER) {
      const value = props[key];
      if (value != null) lines.push(`${marker} ${String(value)}`);
    }
    const activation = props.activation_times;
    if (Array.isArray(activation)) {
      for (const time of activation) lines.push(`AA ${String(time)}`);
    }

    const ring = geometry.coordinates[0] ?? [];
    for (const [lon, lat] of ring) {
      lines.push(`DP ${formatDms(lat, "lat")} ${formatDms(lon, "lon")}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
