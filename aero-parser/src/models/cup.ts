/** Canonical CUP columns, in file order. */
export const CUP_FIELDS = [
  "name",
  "code",
  "country",
  "lat",
  "lon",
  "elev",
  "style",
  "rwdir",
  "rwlen",
  "rwwidth",
  "freq",
  "desc",
  "userdata",
  "pics",
] as const;

export type CupField = (typeof CUP_FIELDS)[number];

/** Header spellings accepted for each canonical column (compared lower-cased). */
export const CUP_FIELD_ALIASES: Record<CupField, readonly string[]> = {
  name: ["name", "waypoint", "wpname"],
  code: ["code", "shortname", "short_name"],
  country: ["country", "cntry"],
  lat: ["lat", "la", "latitude"],
  lon: ["lon", "lo", "long", "longitude"],
  elev: ["elev", "elevation", "alt", "altitude"],
  style: ["style", "type"],
  rwdir: ["rwdir", "rw_dir", "rwy_dir", "runway_direction"],
  rwlen: ["rwlen", "rw_len", "rwy_len", "runway_length"],
  rwwidth: ["rwwidth", "rw_width", "rwy_width", "runway_width"],
  freq: ["freq", "frequency"],
  desc: ["desc", "description"],
  userdata: ["userdata", "user_data"],
  pics: ["pics", "pictures", "user_pictures"],
};

export const CUP_STYLES: Readonly<Record<number, string>> = {
  0: "Unknown",
  1: "Waypoint",
  2: "Airfield (Grass runway)",
  3: "Outlanding",
  4: "Gliding airfield",
  5: "Airfield (Solid runway)",
  6: "Mountain Pass",
  7: "Mountain Top",
  8: "Transmitter Mast",
  9: "VOR",
  10: "NDB",
  11: "Cooling Tower",
  12: "Dam",
  13: "Tunnel",
  14: "Bridge",
  15: "Power Plant",
  16: "Castle",
  17: "Intersection",
  18: "Marker",
  19: "Control/Reporting Point",
  20: "PG Take Off",
  21: "PG Landing Zone",
};

export const AIRPORT_STYLES: readonly number[] = [2, 4, 5];
export const OUTLANDING_STYLES: readonly number[] = [3];
export const LANDABLE_STYLES: readonly number[] = [...AIRPORT_STYLES, ...OUTLANDING_STYLES];

/** Written between the waypoint rows and the task block. */
export const TASKS_SEPARATOR = "-----Related Tasks-----";
/** Matched case-insensitively against each row to find the task block. */
export const TASKS_MARKER = "--related tasks--";

export type DistanceUnit = "m" | "ft" | "nm" | "ml";

/** A length in meters plus the unit it was written in. */
export interface Distance {
  meters: number;
  unit: DistanceUnit;
}

export const FT_2_M = 0.3048;
export const NM_2_M = 1852;
export const ML_2_M = 1609.344;

export const UNIT_TO_M: Readonly<Record<DistanceUnit, number>> = {
  ft: FT_2_M,
  nm: NM_2_M,
  ml: ML_2_M,
  m: 1,
};
