import { describe, expect, it } from "vitest";
import type { FeatureCollection } from "geojson";
import { FormatError } from "../lib/errors";
import { CIRCLE_SAMPLES, closeRing, geoJsonToOpenAir, openAirToGeoJson, parseOpenAir } from "./openair";

const SAMPLE = `* Sample airspace file
AC D
AN LJUBLJANA CTR
AL GND
AH 4000ft MSL
AA 2024-06-01T08:00Z/2024-06-01T16:00Z
DP 46:00:00N 014:00:00E
DP 46:00:00N 014:30:00E
DP 46:30:00N 014:30:00E

AC R
AN BLED
V X=46:21:00N 014:06:00E
DC 2
`;

describe("openAirToGeoJson", () => {
  it("builds a closed polygon from DP lines", () => {
    const fc = openAirToGeoJson(SAMPLE);
    expect(fc.features).toHaveLength(2);
    expect(fc.features[0].properties).toEqual({
      class: "D",
      name: "LJUBLJANA CTR",
      lower_limit: "GND",
      upper_limit: "4000ft MSL",
      activation_times: ["2024-06-01T08:00Z/2024-06-01T16:00Z"],
    });
    expect(fc.features[0].geometry.coordinates).toEqual([
      [
        [14, 46],
        [14.5, 46],
        [14.5, 46.5],
        [14, 46],
      ],
    ]);
  });

  it("samples a circle into a closed ring", () => {
    const circle = openAirToGeoJson(SAMPLE).features[1];
    const ring = circle.geometry.coordinates[0];
    expect(circle.properties).toEqual({ class: "R", name: "BLED" });
    expect(ring).toHaveLength(CIRCLE_SAMPLES + 1);
    expect(ring[CIRCLE_SAMPLES]).toEqual(ring[0]);
    // first sample is due north, 2 NM = 2/60 degree
    expect(ring[0][0]).toBeCloseTo(14.1, 9);
    expect(ring[0][1]).toBeCloseTo(46.35 + 2 / 60, 9);
  });

  it("skips airspaces without geometry", () => {
    expect(parseOpenAir("AC A\nAN NOWHERE\nDC 5\n")).toEqual([]);
  });

  it("reports the line of a bad coordinate", () => {
    expect(() => parseOpenAir("AC D\nDP 46:00:00N garbage")).toThrow(FormatError);
    expect(() => parseOpenAir("AC D\nDP 46:00:00N garbage")).toThrow(
      "Line 2: Invalid DMS coordinate: 46:00:00N garbage"
    );
  });
});

describe("geoJsonToOpenAir", () => {
  const collection: FeatureCollection = {
    type: "FeatureCollection",
    features: [
      {
        type: "Feature",
        properties: { class: "D", name: "TEST", lower_limit: "GND", upper_limit: "FL95", activation_times: ["NOTAM"] },
        geometry: {
          type: "Polygon",
          coordinates: [
            [
              [14, 46],
              [14.5, 46],
              [14.5, 46.5],
              [14, 46],
            ],
          ],
        },
      },
      { type: "Feature", properties: { name: "POINT" }, geometry: { type: "Point", coordinates: [14, 46] } },
    ],
  };

  it("writes properties and DP lines for polygons only", () => {
    expect(geoJsonToOpenAir(collection)).toBe(
      [
        "*VERSION: 2.0",
        "*WRITTEN_BY: aerodata",
        "AC D",
        "AN TEST",
        "AL GND",
        "AH FL95",
        "AA NOTAM",
        "DP 46:00:00.0000N 014:00:00.0000E",
        "DP 46:00:00.0000N 014:30:00.0000E",
        "DP 46:30:00.0000N 014:30:00.0000E",
        "DP 46:00:00.0000N 014:00:00.0000E",
        "",
      ].join("\n")
    );
  });

  it("reads back what it writes", () => {
    const back = openAirToGeoJson(geoJsonToOpenAir(collection));
    expect(back.features).toHaveLength(1);
    expect(back.features[0].properties).toEqual(collection.features[0].properties);
    expect(back.features[0].geometry).toEqual(collection.features[0].geometry);
  });
});

describe("closeRing", () => {
  it("appends the first position once", () => {
    const open = [
      [0, 0],
      [1, 0],
      [1, 1],
    ];
    const closed = closeRing(open);
    expect(closed).toEqual([...open, [0, 0]]);
    expect(closeRing(closed)).toBe(closed);
    expect(closeRing([])).toEqual([]);
  });
});
