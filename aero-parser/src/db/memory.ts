import { distance, point } from "@turf/turf";
import type { AirportDirectory, BoundingBoxQuery, DirectoryAirport, NearestMatch } from "../models/directory";
import type { BoundingBox, LonLat } from "../models/geo";

/**
 * AirportDirectory over a fixed list, with the same matching rules as the
 * PostGIS functions: nearest airport within the threshold, great-circle meters.
 */
export class InMemoryAirportDirectory implements AirportDirectory {
  constructor(private readonly airports: readonly DirectoryAirport[]) {}

  async nearestBulk(points: LonLat[], thresholdMeters: number): Promise<NearestMatch[]> {
    return points.map((p, idx) => {
      let best: NearestMatch = { pointIndex: idx + 1, airport: null, distance: null };
      for (const airport of this.airports) {
        const d = distance(point([p.lon, p.lat]), point([airport.lon, airport.lat]), { units: "meters" });
        if (d > thresholdMeters) continue;
        if (best.distance == null || d < best.distance) best = { pointIndex: idx + 1, airport, distance: d };
      }
      return best;
    });
  }

  async inBoundingBox(box: BoundingBox, query: BoundingBoxQuery = {}): Promise<DirectoryAirport[]> {
    const excludeIds = new Set(query.excludeIds ?? []);
    const excludeTypes = query.excludeTypes ?? [];
    return this.airports.filter(
      (a) =>
        a.lat >= box.minLat &&
        a.lat <= box.maxLat &&
        a.lon >= box.minLon &&
        a.lon <= box.maxLon &&
        !excludeIds.has(a.sourceId) &&
        !excludeTypes.includes(a.aptType)
    );
  }
}
