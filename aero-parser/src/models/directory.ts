import type { CountryLookup } from "../lib/countries";
import type { BoundingBox, LonLat } from "./geo";
import { Waypoint } from "./waypoint";

/** Airport classification used by the directory. */
export const AirportType = {
  AIRPORT: 0,
  GLIDER_SITE: 1,
  AIRPORT_CIVIL: 2,
  AIRPORT_INTL: 3,
  HELIPORT_MIL: 4,
  AERODROME_MIL: 5,
  UL_SITE: 6,
  HELIPORT_CIVIL: 7,
  CLOSED: 8,
  AIRPORT_IFR: 9,
  AIRPORT_WATER: 10,
  LANDING_STRIP: 11,
  LANDING_STRIP_AGRIC: 12,
  ALTIPORT: 13,
  UNKNOWN: 999,
} as const;

export type AirportType = (typeof AirportType)[keyof typeof AirportType];

export const AIRPORT_TYPE_NAMES: Readonly<Record<AirportType, string>> = {
  0: "Airport (civil/military)",
  1: "Glider Site",
  2: "Airfield Civil",
  3: "International Airport",
  4: "Heliport Military",
  5: "Military Aerodrome",
  6: "Ultra Light Flying Site",
  7: "Heliport Civil",
  8: "Aerodrome Closed",
  9: "Airport resp. Airfield IFR",
  10: "Airfield Water",
  11: "Landing Strip",
  12: "Agricultural Landing Strip",
  13: "Altiport",
  999: "Unknown",
};

/** Types never offered as new airports for a CUP file. */
export const NOT_ADDABLE_TYPES: readonly AirportType[] = [
  AirportType.AIRPORT_WATER,
  AirportType.CLOSED,
  AirportType.HELIPORT_CIVIL,
  AirportType.HELIPORT_MIL,
  AirportType.UNKNOWN,
];

const KNOWN_TYPES: ReadonlyMap<number, AirportType> = new Map<number, AirportType>(
  Object.values(AirportType).map((t) => [t, t])
);

export function toAirportType(value: number | null | undefined): AirportType {
  if (value == null) return AirportType.UNKNOWN;
  return KNOWN_TYPES.get(value) ?? AirportType.UNKNOWN;
}

/** One airport as the directory returns it. */
export interface DirectoryAirport {
  id: number | null;
  /** id of the record in the directory's upstream source; stable across imports */
  sourceId: string;
  name: string;
  code: string | null;
  /** ISO 3166-1 alpha-2 */
  country: string;
  lat: number;
  lon: number;
  /** meters */
  elev: number | null;
  style: number | null;
  aptType: AirportType;
  rwDir: number | null;
  /** meters */
  rwLen: number | null;
  /** meters */
  rwWidth: number | null;
  freq: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

/**
 * Answer for one queried point. `pointIndex` is 1-based, in the order the points
 * were sent; `airport` and `distance` are null when nothing was in range.
 */
export interface NearestMatch {
  pointIndex: number;
  airport: DirectoryAirport | null;
  /** meters */
  distance: number | null;
}

export interface BoundingBoxQuery {
  excludeIds?: string[];
  excludeTypes?: readonly AirportType[];
}

/** The two queries the reconciliation engine needs from the airport directory. */
export interface AirportDirectory {
  nearestBulk(points: LonLat[], thresholdMeters: number): Promise<NearestMatch[]>;
  inBoundingBox(box: BoundingBox, query?: BoundingBoxQuery): Promise<DirectoryAirport[]>;
}

export function isClosed(airport: DirectoryAirport): boolean {
  return airport.aptType === AirportType.CLOSED;
}

/** Throws ValidationError when the record does not make a valid waypoint. */
export function directoryAirportToWaypoint(airport: DirectoryAirport, countries: CountryLookup): Waypoint {
  return Waypoint.create(
    {
      name: airport.name,
      lat: airport.lat,
      lon: airport.lon,
      code: airport.code,
      country: airport.country,
      elev: airport.elev,
      style: airport.style,
      rwdir: airport.rwDir,
      rwlen: airport.rwLen,
      rwwidth: airport.rwWidth,
      freq: airport.freq,
    },
    countries
  );
}
