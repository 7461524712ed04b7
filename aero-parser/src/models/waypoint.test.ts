import { describe, expect, it } from "vitest";
import { loadCountries } from "../lib/countries";
import { ValidationError } from "../lib/errors";
import { Waypoint, type WaypointFields } from "./waypoint";

const countries = loadCountries();

const lesce: WaypointFields = {
  name: " Lesce ",
  code: "LJBL",
  country: "si",
  lat: "4621.467N",
  lon: "01410.467E",
  elev: "504.0m",
  style: "5",
  rwdir: "134",
  rwlen: "1180.0m",
  rwwidth: "",
  freq: "123.500",
  desc: "Grass parallel",
};

describe("Waypoint.create", () => {
  it("normalizes every field", () => {
    const w = Waypoint.create(lesce, countries);
    expect(w.name).toBe("Lesce");
    expect(w.country).toBe("SI");
    expect(w.lat).toBeCloseTo(46 + 21.467 / 60, 9);
    expect(w.elev).toEqual({ meters: 504, unit: "m" });
    expect(w.style).toBe(5);
    expect(w.rwdir).toBe(134);
    expect(w.rwwidth).toBeNull();
    expect(w.userdata).toBeNull();
  });

  it("accepts decimal degrees", () => {
    const w = Waypoint.create({ name: "A", lat: 46.5, lon: -14.25 }, countries);
    expect(w.getPoint()).toEqual({ lon: -14.25, lat: 46.5 });
  });

  it("treats '--' and zero values as absent", () => {
    const w = Waypoint.create({ name: "B", lat: 1, lon: 1, country: "--", elev: 0, style: 0, rwdir: 0 }, countries);
    expect(w.country).toBeNull();
    expect(w.elev).toBeNull();
    expect(w.style).toBeNull();
    expect(w.rwdir).toBeNull();
  });

  it.each<[string, Partial<WaypointFields>]>([
    ["name", { name: "   " }],
    ["lat", { lat: "" }],
    ["lat", { lat: "01410.467E" }],
    ["lon", { lon: 200 }],
    ["country", { country: "XYZ" }],
    ["country", { country: "QQ" }],
    ["elev", { elev: "12km" }],
    ["style", { style: 42 }],
    ["rwdir", { rwdir: "12.5" }],
    ["rwdir", { rwdir: 361 }],
    ["freq", { freq: "99.9" }],
  ])("rejects an invalid %s", (field, patch) => {
    const res = Waypoint.tryCreate({ ...lesce, ...patch }, countries);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.field).toBe(field);
  });

  it("reports a missing coordinate", () => {
    expect(() => Waypoint.create({ ...lesce, lon: " " }, countries)).toThrow("Both lat and lon must be specified");
  });
});

describe("Waypoint mutators", () => {
  it("leaves the waypoint untouched when validation fails", () => {
    const w = Waypoint.create(lesce, countries);
    const lat = w.lat;
    expect(() => w.setCoordinates(10, 500)).toThrow(ValidationError);
    expect(w.lat).toBe(lat);
    expect(() => w.setFreq("140.000")).toThrow(ValidationError);
    expect(w.freq).toBe("123.500");
  });

  it("updates single fields", () => {
    const w = Waypoint.create(lesce, countries);
    w.setLat(45);
    w.setElev("1640ft");
    w.setStyle("3");
    w.setCountry("at");
    expect(w.lat).toBe(45);
    expect(w.elev?.unit).toBe("ft");
    expect(w.isOutlanding()).toBe(true);
    expect(w.isAirport()).toBe(false);
    expect(w.isLandable()).toBe(true);
    expect(w.country).toBe("AT");
  });
});

describe("Waypoint serialization", () => {
  it("writes the canonical row", () => {
    const w = Waypoint.create(lesce, countries);
    expect(w.toRow()).toEqual([
      "Lesce",
      "LJBL",
      "SI",
      "4621.467N",
      "01410.467E",
      "504m",
      "5",
      "134",
      "1180m",
      "",
      "123.500",
      "Grass parallel",
      "",
      "",
    ]);
  });

  it("quotes fields containing the delimiter", () => {
    const w = Waypoint.create({ name: "Bled, lake", lat: 46, lon: 14 }, countries);
    expect(w.toString()).toBe('"Bled, lake",,,4600.000N,01400.000E,,,,,,,,,');
  });

  it("keeps distance text in JSON", () => {
    const json = Waypoint.create(lesce, countries).toJSON();
    expect(json.elev).toBe("504m");
    expect(json.rwlen).toBe("1180m");
    expect(json.rwwidth).toBeNull();
  });

  it("clones with the same id and independent state", () => {
    const w = Waypoint.create(lesce, countries);
    const copy = w.clone();
    copy.setName("Renamed");
    copy.setElev(100);
    expect(copy.id).toBe(w.id);
    expect(w.name).toBe("Lesce");
    expect(w.elev).toEqual({ meters: 504, unit: "m" });
  });
});
