import { describe, expect, it } from "vitest";
import { FormatError, ValidationError } from "../lib/errors";
import {
  formatCupLatitude,
  formatCupLongitude,
  formatDistance,
  formatDms,
  toFixedHalfEven,
  isValidFrequency,
  isValidStyle,
  matchDmsPair,
  parseCupCoordinate,
  parseDistance,
  parseDmsPair,
} from "./units";

describe("parseCupCoordinate", () => {
  it("reads latitude and longitude notation", () => {
    expect(parseCupCoordinate("5107.830N")).toBeCloseTo(51.1305, 9);
    expect(parseCupCoordinate("01410.467E")).toBeCloseTo(14.17445, 9);
  });

  it("applies southern and western hemispheres", () => {
    expect(parseCupCoordinate("5107.830S")).toBeCloseTo(-51.1305, 9);
    expect(parseCupCoordinate("01410.467w")).toBeCloseTo(-14.17445, 9);
  });

  it("rejects a coordinate of the wrong axis", () => {
    expect(() => parseCupCoordinate("5107.830N", "lon")).toThrow(FormatError);
    expect(() => parseCupCoordinate("01410.467E", "lat")).toThrow("Expected a latitude, got: 01410.467E");
  });

  it("rejects minutes of 60 or more", () => {
    expect(() => parseCupCoordinate("5160.000N")).toThrow(FormatError);
  });

  it("rejects values beyond the axis range", () => {
    expect(() => parseCupCoordinate("9130.000N")).toThrow(ValidationError);
  });

  it("rejects unknown notation", () => {
    expect(() => parseCupCoordinate("51.1305")).toThrow("Invalid coordinate format: 51.1305");
  });
});

describe("formatCupLatitude / formatCupLongitude", () => {
  it("writes DDMM.mmm and DDDMM.mmm", () => {
    expect(formatCupLatitude(51.1305)).toBe("5107.830N");
    expect(formatCupLongitude(-14.17445)).toBe("01410.467W");
  });

  it("carries rounded minutes into the degree", () => {
    expect(formatCupLatitude(45.99999999)).toBe("4600.000N");
  });

  it("keeps the southern and western hemisphere at zero", () => {
    expect(formatCupLatitude(parseCupCoordinate("0000.000S"))).toBe("0000.000S");
    expect(formatCupLongitude(parseCupCoordinate("00000.000W"))).toBe("00000.000W");
    expect(formatCupLatitude(0)).toBe("0000.000N");
    expect(formatDms(-0, "lat")).toBe("00:00:00.0000S");
  });

  it("refuses out-of-range values", () => {
    expect(() => formatCupLongitude(181)).toThrow(ValidationError);
  });
});

describe("DMS pairs", () => {
  it("formats both axes with seconds", () => {
    expect(formatDms(46 + 19 / 60 + 13 / 3600, "lat")).toBe("46:19:13.0000N");
    expect(formatDms(14 + 22 / 60 + 12 / 3600, "lon")).toBe("014:22:12.0000E");
    expect(formatDms(-0.5, "lon")).toBe("000:30:00.0000W");
  });

  it("matches a pair with or without a space before the hemisphere", () => {
    const a = matchDmsPair("46:19:13N 014:22:12E");
    const b = matchDmsPair("46:19:13.0000 N, 014:22:12.0000 E");
    expect(a?.lat).toBeCloseTo(46.320278, 5);
    expect(a?.lon).toBeCloseTo(14.37, 9);
    expect(b).toEqual(a);
  });

  it("returns null for out-of-range minutes", () => {
    expect(matchDmsPair("46:60:00N 014:00:00E")).toBeNull();
  });

  it("parseDmsPair throws on bad input", () => {
    expect(() => parseDmsPair("garbage")).toThrow(FormatError);
    expect(() => parseDmsPair("95:00:00N 014:00:00E")).toThrow(ValidationError);
  });
});

describe("distances", () => {
  it("parses each unit into meters", () => {
    expect(parseDistance("504.0m")).toEqual({ meters: 504, unit: "m" });
    expect(parseDistance("1000ft").meters).toBeCloseTo(304.8, 9);
    expect(parseDistance("1.2NM")).toEqual({ meters: 1.2 * 1852, unit: "nm" });
    expect(parseDistance("0.5ml")).toEqual({ meters: 804.672, unit: "ml" });
  });

  it("yields the absent sentinel for an empty string", () => {
    expect(parseDistance("  ")).toEqual({ meters: -Infinity, unit: "m" });
  });

  it("rejects unknown units", () => {
    expect(() => parseDistance("12km")).toThrow("Invalid distance format: 12km");
  });

  it("formats per unit", () => {
    expect(formatDistance(504, "m")).toBe("504m");
    expect(formatDistance(504.37, "m")).toBe("504.4m");
    expect(formatDistance(304.8, "ft")).toBe("1000ft");
    expect(formatDistance(1852, "nm")).toBe("1.00nm");
    expect(formatDistance(100, "km")).toBe("100m");
    expect(formatDistance(-Infinity, "m")).toBe("");
    expect(formatDistance(null, "m")).toBe("");
  });

  it("rounds exact halves to the even digit", () => {
    expect(formatDistance(434.5, "m")).toBe("434m");
    expect(formatDistance(435.5, "m")).toBe("436m");
    expect(formatDistance(504.25, "m")).toBe("504.2m");
    expect(formatDistance(231.5, "nm")).toBe("0.12nm");
  });

  it("rounds values off a tie as toFixed does", () => {
    expect(toFixedHalfEven(504.35, 1)).toBe("504.4");
    expect(toFixedHalfEven(2.5, 0)).toBe("2");
    expect(toFixedHalfEven(-2.5, 0)).toBe("-2");
    expect(toFixedHalfEven(3.5, 0)).toBe("4");
  });
});

describe("field validators", () => {
  it("accepts the VHF airband only", () => {
    expect(isValidFrequency("123.500")).toBe(true);
    expect(isValidFrequency("123.505")).toBe(true);
    expect(isValidFrequency("136.99")).toBe(true);
    expect(isValidFrequency("123.507")).toBe(false);
    expect(isValidFrequency("117.000")).toBe(false);
  });

  it("accepts known styles", () => {
    expect(isValidStyle(5)).toBe(true);
    expect(isValidStyle("21")).toBe(true);
    expect(isValidStyle("22")).toBe(false);
    expect(isValidStyle(2.5)).toBe(false);
    expect(isValidStyle("abc")).toBe(false);
  });
});
