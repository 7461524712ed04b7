import { describe, expect, it } from "vitest";
import type { FeatureCollection, Polygon } from "geojson";
import { FormatError } from "../lib/errors";
import {
  batchCompactToOpenAir,
  closePolygonRings,
  compactToOpenAir,
  extractAllCoordinates,
  icaoCoordinatesToPolygon,
  linesToPolygon,
  parseAipPoint,
  parseCoordinateLine,
  parseIcaoCompact,
} from "./geo";

describe("line parsers", () => {
  it("reads AIP points with decimal seconds", () => {
    const p = parseAipPoint("455404.3N 0153113.7E");
    expect(p?.lat).toBeCloseTo(45.901194, 6);
    expect(p?.lon).toBeCloseTo(15.520472, 6);
    expect(p?.notation).toBe("aip");
  });

  it("ignores degree, minute and second symbols", () => {
    const p = parseAipPoint(`45°54'04.3"N 015°31'13.7"E`);
    expect(p?.lat).toBeCloseTo(45.901194, 6);
  });

  it("rejects minutes of 60 or more", () => {
    expect(parseIcaoCompact("466010N 0144103E")).toBeNull();
  });

  it.each([
    ["DP 46:19:13N 014:22:12E", "openair", 46.320278, 14.37],
    ["461010N 0144103E", "icao", 46.169444, 14.684167],
    ["455404.3N 0153113.7E", "aip", 45.901194, 15.520472],
    ["46 10 29 N 013 39 58 E", "eapi", 46.174722, 13.666111],
  ])("parseCoordinateLine(%s) uses %s", (line, notation, lat, lon) => {
    const p = parseCoordinateLine(line);
    expect(p.notation).toBe(notation);
    expect(p.lat).toBeCloseTo(lat, 5);
    expect(p.lon).toBeCloseTo(lon, 5);
  });

  it("throws on text in no known notation", () => {
    expect(() => parseCoordinateLine("hello")).toThrow(
      "Could not parse line as DP, ICAO, AIP or eAPI coordinate: hello"
    );
  });
});

describe("extractAllCoordinates", () => {
  it("finds every notation once", () => {
    const text = "Point A 461010N 0144103E, point B 46 10 29 N 013 39 58 E.";
    const points = extractAllCoordinates(text);
    expect(points.map((p) => p.notation)).toEqual(["icao", "eapi"]);
    expect(points[0].src).toBe("461010N 0144103E");
  });

  it("returns nothing for plain text", () => {
    expect(extractAllCoordinates("no coordinates here")).toEqual([]);
  });
});

describe("polygons", () => {
  it("builds a closed polygon from ICAO coordinates", () => {
    const feature = icaoCoordinatesToPolygon("461010N 0144103E 460000N 0140000E", "Area");
    const ring = feature.geometry.coordinates[0];
    expect(feature.properties).toEqual({ name: "Area" });
    expect(ring).toHaveLength(3);
    expect(ring[1]).toEqual([14, 46]);
    expect(ring[2]).toEqual(ring[0]);
  });

  it("fails when no ICAO coordinate is present", () => {
    expect(() => icaoCoordinatesToPolygon("nothing")).toThrow(FormatError);
  });

  it("reads one coordinate per line in mixed notations", () => {
    const feature = linesToPolygon("DP 46:00:00N 014:00:00E\n\n460000N 0143000E\n46 30 00 N 014 30 00 E\n");
    expect(feature.properties).toEqual({});
    expect(feature.geometry.coordinates).toEqual([
      [
        [14, 46],
        [14.5, 46],
        [14.5, 46.5],
        [14, 46],
      ],
    ]);
  });

  it("closes rings without touching the input", () => {
    const open: Polygon = {
      type: "Polygon",
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
        ],
      ],
    };
    expect(closePolygonRings(open)).toEqual({
      type: "Polygon",
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 0],
        ],
      ],
    });
    expect(open.coordinates[0]).toHaveLength(3);
  });

  it("leaves non-polygon features of a collection alone", () => {
    const fc: FeatureCollection = {
      type: "FeatureCollection",
      features: [{ type: "Feature", properties: {}, geometry: { type: "Point", coordinates: [1, 2] } }],
    };
    expect(closePolygonRings(fc)).toEqual(fc);
  });
});

describe("compact to OpenAir", () => {
  it("rewrites a compact pair as a DP line", () => {
    expect(compactToOpenAir("455210N 0135035E")).toBe("DP 45:52:10N 013:50:35E");
  });

  it("rejects other formats", () => {
    expect(() => compactToOpenAir("45 52 10 N")).toThrow("Line must be in format 455210N 0135035E");
  });

  it("converts the compact lines of a batch", () => {
    expect(batchCompactToOpenAir("455210N 0135035E\nnote\n460000N 0140000E")).toEqual([
      "DP 45:52:10N 013:50:35E",
      "DP 46:00:00N 014:00:00E",
    ]);
  });
});
