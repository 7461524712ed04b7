// CUP waypoint file codec.
//
//   name,code,country,lat,lon,elev,style,rwdir,rwlen,rwwidth,freq,desc,userdata,pics
//   "Bovec",LJBO,SI,4619.883N,01332.867E,435.0m,5,240,850m,30m,123.500,,,
//   -----Related Tasks-----
//   ...task lines, kept verbatim...

import { promises as fs } from "fs";
import * as path from "path";
import { bbox, multiPoint } from "@turf/turf";
import { analyse } from "chardet";
import { decode, encodingExists } from "iconv-lite";
import Papa from "papaparse";
import type { CountryLookup } from "../lib/countries";
import { CodecError } from "../lib/errors";
import { CUP_FIELD_ALIASES, CUP_FIELDS, TASKS_MARKER, TASKS_SEPARATOR, type CupField } from "../models/cup";
import type { BoundingBox } from "../models/geo";
import { Waypoint, type WaypointFields } from "../models/waypoint";

export const DEFAULT_CUP_FILE_NAME = "unknown.cup";

/** Ordered waypoints plus the uninterpreted task block of one CUP file. */
export class CupFile {
  constructor(
    public fileName: string | null = null,
    public waypoints: Waypoint[] = [],
    public tasks: string[] = []
  ) {}

  get size(): number {
    return this.waypoints.length;
  }

  landables(): Waypoint[] {
    return this.waypoints.filter((w) => w.isLandable());
  }

  airports(): Waypoint[] {
    return this.waypoints.filter((w) => w.isAirport());
  }

  outlandings(): Waypoint[] {
    return this.waypoints.filter((w) => w.isOutlanding());
  }

  add(waypoint: Waypoint): void {
    this.waypoints.push(waypoint);
  }

  /** Removes by reference; returns false when the waypoint is not in this file. */
  remove(waypoint: Waypoint): boolean {
    const idx = this.waypoints.indexOf(waypoint);
    if (idx === -1) return false;
    this.waypoints.splice(idx, 1);
    return true;
  }

  boundingBox(): BoundingBox | null {
    if (this.waypoints.length === 0) return null;
    const [minLon, minLat, maxLon, maxLat] = bbox(multiPoint(this.waypoints.map((w) => [w.lon, w.lat])));
    return { minLat, minLon, maxLat, maxLon };
  }

  clone(): CupFile {
    return new CupFile(
      this.fileName,
      this.waypoints.map((w) => w.clone()),
      [...this.tasks]
    );
  }

  toString(): string {
    return serializeCup(this);
  }
}

export interface ParseCupOptions {
  countries: CountryLookup;
  fileName?: string | null;
}

// ────────────────────────────────────────────────────────────────────────────────
// Encoding

const LEGACY_ENCODING = /^(windows-|ISO-)/i;
// tried after the detector's own candidates
const LEGACY_FALLBACKS = ["windows-1250", "windows-1252"];

const CONTROL_OR_REPLACEMENT = /[\u0080-\u009f\ufffd]/gu;
const SYMBOL_AFTER_LETTER = /\p{L}[^\p{L}\p{Nd}\p{Z}\s\x00-\x7f\u2000-\u206f]/gu;
const WORD = /\p{L}+/gu;
const CARON_LETTER = /[ČčŠšŽžŘřĚěŇňĎďŤť]/u;
const GRAVE_VOWEL = /[ÀàÈèÌìÒòÙù]/u;

/**
 * Signs that `text` was decoded with the wrong code page: control or
 * replacement characters, a symbol glued to a letter (`Å¾`, `³ód`), a word
 * mixing Latin with another script (`Љentvid`), and caron letters next to
 * grave vowels, which no language writes together. 0 reads cleanly.
 */
export function decodingMess(text: string): number {
  let mess = (text.match(CONTROL_OR_REPLACEMENT) ?? []).length;
  mess += (text.match(SYMBOL_AFTER_LETTER) ?? []).length;
  for (const [word] of text.matchAll(WORD)) {
    if (/\p{Script=Latin}/u.test(word) && /[^\p{Script=Latin}]/u.test(word)) mess += 1;
  }
  if (CARON_LETTER.test(text) && GRAVE_VOWEL.test(text)) mess += 1;
  return mess;
}

/**
 * Picks the charset of an uploaded file. Non-ASCII bytes that form valid UTF-8
 * are UTF-8. Otherwise the first windows-125x / ISO-8859-x reading without
 * decoding mess wins, then the detector's top guess.
 */
export function detectEncoding(bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes);
  const utf8 = decode(buffer, "utf8");
  if (/[^\x00-\x7f]/.test(utf8) && !utf8.includes("\ufffd")) return "UTF-8";

  const candidates = analyse(bytes);
  const legacy = [...candidates.map((c) => c.name).filter((name) => LEGACY_ENCODING.test(name)), ...LEGACY_FALLBACKS];
  const clean = legacy.find((name) => encodingExists(name) && decodingMess(decode(buffer, name)) === 0);
  return clean ?? candidates[0]?.name ?? "utf8";
}

export function decodeCupBytes(bytes: Uint8Array): string {
  const encoding = detectEncoding(bytes);
  return decode(Buffer.from(bytes), encodingExists(encoding) ? encoding : "utf8");
}

// ────────────────────────────────────────────────────────────────────────────────
// Parsing

function cleanToken(token: string): string {
  return token.trim().replace(/^"+|"+$/g, "").trim();
}

function splitCsvLine(line: string, lineNo: number): string[] {
  const res = Papa.parse<string[]>(line, { delimiter: ",", quoteChar: '"' });
  const quoteError = res.errors.find((e) => e.type === "Quotes");
  if (quoteError) throw new CodecError(quoteError.message, lineNo);
  return (res.data[0] ?? []).map(cleanToken);
}

function mapHeader(tokens: string[]): Map<CupField, number> {
  const columns = new Map<CupField, number>();
  tokens.forEach((token, idx) => {
    const key = token.toLowerCase();
    const field = CUP_FIELDS.find((f) => CUP_FIELD_ALIASES[f].includes(key));
    // first matching column wins, unknown columns are ignored
    if (field && !columns.has(field)) columns.set(field, idx);
  });
  return columns;
}

function rowToFields(tokens: string[], columns: Map<CupField, number>): WaypointFields {
  const get = (field: CupField): string | undefined => {
    const idx = columns.get(field);
    return idx == null ? undefined : tokens[idx];
  };
  return {
    name: get("name") ?? "",
    lat: get("lat") ?? "",
    lon: get("lon") ?? "",
    code: get("code"),
    country: get("country"),
    elev: get("elev"),
    style: get("style"),
    rwdir: get("rwdir"),
    rwlen: get("rwlen"),
    rwwidth: get("rwwidth"),
    freq: get("freq"),
    desc: get("desc"),
    userdata: get("userdata"),
    pics: get("pics"),
  };
}

/**
 * Parses CUP text or raw file bytes. Any row that does not make a valid
 * waypoint fails the whole file with a CodecError carrying the line number.
 */
export function parseCup(input: string | Uint8Array, options: ParseCupOptions): CupFile {
  const text = typeof input === "string" ? input : decodeCupBytes(input);
  const lines = text.split(/\r?\n/);

  if (lines[0].trim() === "") throw new CodecError("File is empty or has no header");

  const columns = mapHeader(splitCsvLine(lines[0], 1));
  for (const required of ["name", "lat", "lon"] as const) {
    if (!columns.has(required)) {
      throw new CodecError(`Header has no '${required}' column`, 1);
    }
  }

  const file = new CupFile(options.fileName ?? null);
  const seen = new Set<string>();

  for (let i = 1; i < lines.length; i++) {
    const raw = lines[i];
    const lineNo = i + 1;

    if (raw.toLowerCase().includes(TASKS_MARKER)) {
      file.tasks = lines.slice(i + 1);
      while (file.tasks.length > 0 && file.tasks[file.tasks.length - 1].trim() === "") file.tasks.pop();
      break;
    }
    if (raw.trim() === "" || raw.startsWith("#")) continue;
    if (seen.has(raw)) continue;
    seen.add(raw);

    const result = Waypoint.tryCreate(rowToFields(splitCsvLine(raw, lineNo), columns), options.countries);
    if (!result.ok) throw new CodecError(result.error.message, lineNo, { cause: result.error });
    file.add(result.waypoint);
  }

  return file;
}

// ────────────────────────────────────────────────────────────────────────────────
// Serialization

export function serializeCup(file: CupFile): string {
  const rows = [CUP_FIELDS.join(","), ...file.waypoints.map((w) => w.toString())];
  let out = rows.join("\n") + "\n" + TASKS_SEPARATOR + "\n";
  if (file.tasks.length > 0) out += file.tasks.join("\n");
  return out;
}

export async function loadCupFile(filePath: string, countries: CountryLookup): Promise<CupFile> {
  const bytes = await fs.readFile(filePath);
  return parseCup(bytes, { countries, fileName: path.basename(filePath) });
}

/** Writes the file and returns the path used. */
export async function dumpCupFile(file: CupFile, filePath?: string): Promise<string> {
  const target = filePath ?? file.fileName ?? DEFAULT_CUP_FILE_NAME;
  await fs.writeFile(target, serializeCup(file), "utf8");
  return target;
}
