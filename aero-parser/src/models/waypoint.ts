import { randomUUID } from "node:crypto";
import Papa from "papaparse";
import type { CountryLookup } from "../lib/countries";
import { FormatError, ValidationError } from "../lib/errors";
import {
  formatCupLatitude,
  formatCupLongitude,
  formatDistance,
  isValidFrequency,
  isValidLat,
  isValidLon,
  isValidStyle,
  parseCupCoordinate,
  parseDistance,
  type Axis,
} from "../services/units";
import { AIRPORT_STYLES, LANDABLE_STYLES, OUTLANDING_STYLES, type Distance } from "./cup";
import type { LonLat } from "./geo";

export type TextValue = string | null | undefined;
export type NumericValue = string | number | null | undefined;
/** Decimal degrees, or CUP notation (`5107.830N`, `01410.467E`). */
export type CoordinateValue = string | number;
/** A CUP distance string, plain meters, or an already parsed distance. */
export type DistanceValue = string | number | Distance | null | undefined;

/** Raw input for one waypoint, as read from a CUP row or a directory record. */
export interface WaypointFields {
  name: string;
  lat: CoordinateValue;
  lon: CoordinateValue;
  code?: TextValue;
  country?: TextValue;
  elev?: DistanceValue;
  style?: NumericValue;
  rwdir?: NumericValue;
  rwlen?: DistanceValue;
  rwwidth?: DistanceValue;
  freq?: TextValue;
  desc?: TextValue;
  userdata?: TextValue;
  pics?: TextValue;
}

interface WaypointState {
  name: string;
  lat: number;
  lon: number;
  code: string | null;
  country: string | null;
  elev: Distance | null;
  style: number | null;
  rwdir: number | null;
  rwlen: Distance | null;
  rwwidth: Distance | null;
  freq: string | null;
  desc: string | null;
  userdata: string | null;
  pics: string | null;
}

/** JSON shape returned by the HTTP layers; distances keep their CUP text. */
export interface WaypointJson {
  id: string;
  name: string;
  code: string | null;
  country: string | null;
  lat: number;
  lon: number;
  elev: string | null;
  style: number | null;
  rwdir: number | null;
  rwlen: string | null;
  rwwidth: string | null;
  freq: string | null;
  desc: string | null;
  userdata: string | null;
  pics: string | null;
}

export type WaypointResult =
  | { ok: true; waypoint: Waypoint }
  | { ok: false; error: ValidationError };

// ────────────────────────────────────────────────────────────────────────────────
// Field normalizers. Each returns the stored value or throws ValidationError.

function normalizeName(value: unknown): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError("name", value, "Waypoint name must not be empty");
  }
  return value.trim();
}

function normalizeCoordinate(value: CoordinateValue, axis: Axis): number {
  if (typeof value === "number") {
    const ok = axis === "lat" ? isValidLat(value) : isValidLon(value);
    if (!ok) {
      const limit = axis === "lat" ? 90 : 180;
      throw new ValidationError(axis, value, `${axis} must be between -${limit} and ${limit} degrees, is: ${value}`);
    }
    return value;
  }

  if (value.trim() === "") {
    throw new ValidationError(axis, value, "Both lat and lon must be specified");
  }
  try {
    return parseCupCoordinate(value, axis);
  } catch (e) {
    if (e instanceof FormatError) throw new ValidationError(axis, value, e.message, { cause: e });
    throw e;
  }
}

function normalizeText(value: TextValue): string | null {
  if (value == null) return null;
  const text = value.trim();
  return text === "" ? null : text;
}

function normalizeCountry(value: TextValue, countries: CountryLookup): string | null {
  const text = normalizeText(value);
  if (text == null || text === "--") return null;
  if (text.length !== 2) {
    throw new ValidationError("country", value, `Country must be a two-letter ISO code, is: ${text}`);
  }
  const country = countries.getByIso2(text);
  if (!country) throw new ValidationError("country", value, `Unknown country code: ${text}`);
  return country.iso2.toUpperCase();
}

function normalizeDistance(field: string, value: DistanceValue): Distance | null {
  // 0 and "" mean "not set", same as an empty CUP column
  if (value == null || value === "" || value === 0) return null;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ValidationError(field, value);
    return { meters: value, unit: "m" };
  }
  if (typeof value === "object") {
    if (!Number.isFinite(value.meters)) throw new ValidationError(field, value.meters);
    return { meters: value.meters, unit: value.unit };
  }

  try {
    const parsed = parseDistance(value);
    return parsed.meters === -Infinity ? null : parsed;
  } catch (e) {
    if (e instanceof FormatError) throw new ValidationError(field, value, e.message, { cause: e });
    throw e;
  }
}

function normalizeStyle(value: NumericValue): number | null {
  if (value == null || value === 0) return null;
  if (typeof value === "string" && value.trim() === "") return null;
  if (!isValidStyle(value)) throw new ValidationError("style", value, `Unknown waypoint style: ${value}`);
  return Number(value);
}

function normalizeRunwayDirection(value: NumericValue): number | null {
  if (value == null || value === 0) return null;

  let deg: number;
  if (typeof value === "number") {
    deg = value;
  } else {
    const text = value.trim();
    if (text === "") return null;
    if (!/^[+-]?\d+$/.test(text)) {
      throw new ValidationError("rwdir", value, `Runway direction must be whole degrees, is: ${value}`);
    }
    deg = Number(text);
  }

  if (!Number.isInteger(deg) || deg < 0 || deg > 360) {
    throw new ValidationError("rwdir", value, `Runway direction must be between 0 and 360, is: ${value}`);
  }
  return deg;
}

function normalizeFrequency(value: TextValue): string | null {
  const text = normalizeText(value);
  if (text == null) return null;
  if (!isValidFrequency(text)) {
    throw new ValidationError("freq", value, `Frequency must be within 118.000-136.990 MHz, is: ${text}`);
  }
  return text;
}

function buildState(fields: WaypointFields, countries: CountryLookup): WaypointState {
  return {
    name: normalizeName(fields.name),
    lat: normalizeCoordinate(fields.lat, "lat"),
    lon: normalizeCoordinate(fields.lon, "lon"),
    code: normalizeText(fields.code),
    country: normalizeCountry(fields.country, countries),
    elev: normalizeDistance("elev", fields.elev),
    style: normalizeStyle(fields.style),
    rwdir: normalizeRunwayDirection(fields.rwdir),
    rwlen: normalizeDistance("rwlen", fields.rwlen),
    rwwidth: normalizeDistance("rwwidth", fields.rwwidth),
    freq: normalizeFrequency(fields.freq),
    desc: normalizeText(fields.desc),
    userdata: normalizeText(fields.userdata),
    pics: normalizeText(fields.pics),
  };
}

function copyDistance(d: Distance | null): Distance | null {
  return d ? { meters: d.meters, unit: d.unit } : null;
}

function distanceText(d: Distance | null): string {
  return d ? formatDistance(d.meters, d.unit) : "";
}

// ────────────────────────────────────────────────────────────────────────────────

/**
 * One named point of a CUP file. Fields are validated on construction and on
 * every mutator call; a failed call leaves the waypoint untouched.
 *
 * The id is process-local and never written to a file. `clone()` keeps it, so a
 * snapshot taken before an update still correlates with the live waypoint.
 */
export class Waypoint {
  private constructor(
    readonly id: string,
    private state: WaypointState,
    private readonly countries: CountryLookup
  ) {}

  static create(fields: WaypointFields, countries: CountryLookup): Waypoint {
    return new Waypoint(randomUUID(), buildState(fields, countries), countries);
  }

  static tryCreate(fields: WaypointFields, countries: CountryLookup): WaypointResult {
    try {
      return { ok: true, waypoint: Waypoint.create(fields, countries) };
    } catch (e) {
      if (e instanceof ValidationError) return { ok: false, error: e };
      throw e;
    }
  }

  get name() { return this.state.name; }
  get lat() { return this.state.lat; }
  get lon() { return this.state.lon; }
  get code() { return this.state.code; }
  get country() { return this.state.country; }
  get elev(): Readonly<Distance> | null { return this.state.elev; }
  get style() { return this.state.style; }
  get rwdir() { return this.state.rwdir; }
  get rwlen(): Readonly<Distance> | null { return this.state.rwlen; }
  get rwwidth(): Readonly<Distance> | null { return this.state.rwwidth; }
  get freq() { return this.state.freq; }
  get desc() { return this.state.desc; }
  get userdata() { return this.state.userdata; }
  get pics() { return this.state.pics; }

  setName(value: string): void {
    this.state.name = normalizeName(value);
  }

  /** Both values are validated before either is stored. */
  setCoordinates(lat: CoordinateValue, lon: CoordinateValue): void {
    const nextLat = normalizeCoordinate(lat, "lat");
    const nextLon = normalizeCoordinate(lon, "lon");
    this.state.lat = nextLat;
    this.state.lon = nextLon;
  }

  setLat(value: CoordinateValue): void {
    this.setCoordinates(value, this.state.lon);
  }

  setLon(value: CoordinateValue): void {
    this.setCoordinates(this.state.lat, value);
  }

  setCode(value: TextValue): void {
    this.state.code = normalizeText(value);
  }

  setCountry(value: TextValue): void {
    this.state.country = normalizeCountry(value, this.countries);
  }

  setElev(value: DistanceValue): void {
    this.state.elev = normalizeDistance("elev", value);
  }

  setStyle(value: NumericValue): void {
    this.state.style = normalizeStyle(value);
  }

  setRunwayDirection(value: NumericValue): void {
    this.state.rwdir = normalizeRunwayDirection(value);
  }

  setRunwayLength(value: DistanceValue): void {
    this.state.rwlen = normalizeDistance("rwlen", value);
  }

  setRunwayWidth(value: DistanceValue): void {
    this.state.rwwidth = normalizeDistance("rwwidth", value);
  }

  setFreq(value: TextValue): void {
    this.state.freq = normalizeFrequency(value);
  }

  setDesc(value: TextValue): void {
    this.state.desc = normalizeText(value);
  }

  setUserdata(value: TextValue): void {
    this.state.userdata = normalizeText(value);
  }

  setPics(value: TextValue): void {
    this.state.pics = normalizeText(value);
  }

  isAirport(): boolean {
    return this.state.style != null && AIRPORT_STYLES.includes(this.state.style);
  }

  isOutlanding(): boolean {
    return this.state.style != null && OUTLANDING_STYLES.includes(this.state.style);
  }

  isLandable(): boolean {
    return this.state.style != null && LANDABLE_STYLES.includes(this.state.style);
  }

  getPoint(): LonLat {
    return { lon: this.state.lon, lat: this.state.lat };
  }

  /** CUP columns in canonical order, formatted but not quoted. */
  toRow(): string[] {
    const s = this.state;
    return [
      s.name,
      s.code ?? "",
      s.country ?? "",
      formatCupLatitude(s.lat),
      formatCupLongitude(s.lon),
      distanceText(s.elev),
      s.style == null ? "" : String(s.style),
      s.rwdir == null ? "" : String(s.rwdir),
      distanceText(s.rwlen),
      distanceText(s.rwwidth),
      s.freq ?? "",
      s.desc ?? "",
      s.userdata ?? "",
      s.pics ?? "",
    ];
  }

  /** One CUP line, quoting only fields that need it. */
  toString(): string {
    return Papa.unparse([this.toRow()], { delimiter: ",", quoteChar: '"', newline: "\n" });
  }

  toJSON(): WaypointJson {
    const s = this.state;
    return {
      id: this.id,
      name: s.name,
      code: s.code,
      country: s.country,
      lat: s.lat,
      lon: s.lon,
      elev: s.elev ? distanceText(s.elev) : null,
      style: s.style,
      rwdir: s.rwdir,
      rwlen: s.rwlen ? distanceText(s.rwlen) : null,
      rwwidth: s.rwwidth ? distanceText(s.rwwidth) : null,
      freq: s.freq,
      desc: s.desc,
      userdata: s.userdata,
      pics: s.pics,
    };
  }

  clone(): Waypoint {
    const s = this.state;
    return new Waypoint(
      this.id,
      { ...s, elev: copyDistance(s.elev), rwlen: copyDistance(s.rwlen), rwwidth: copyDistance(s.rwwidth) },
      this.countries
    );
  }
}
