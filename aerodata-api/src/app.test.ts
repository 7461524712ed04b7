import request from "supertest";
import { describe, expect, it } from "vitest";
import { AirportType, InMemoryAirportDirectory, loadCountries, type DirectoryAirport } from "aero-parser";
import { createApp } from "./app";
import { updatedFileName } from "./routes/cup";

const countries = loadCountries();

const HEADER = "name,code,country,lat,lon,elev,style,rwdir,rwlen,rwwidth,freq,desc,userdata,pics";
const ALPS = [HEADER, "Lesce,LJBL,SI,4621.000N,01410.000E,1640ft,5,,,,,,,", "Field,,,4620.000N,01400.000E,,3,,,,,,,"].join("\n");

const LESCE_BLED: DirectoryAirport = {
  id: 1,
  sourceId: "a1",
  name: "Lesce-Bled",
  code: "LJBL",
  country: "SI",
  // about 560 m north of the file's position
  lat: 46.355,
  lon: 14 + 10 / 60,
  elev: 504,
  style: 5,
  aptType: AirportType.AIRPORT_CIVIL,
  rwDir: 134,
  rwLen: 1180,
  rwWidth: null,
  freq: "123.500",
  createdAt: null,
  updatedAt: null,
};

const app = createApp({ directory: new InMemoryAirportDirectory([LESCE_BLED]), countries });

describe("GET /v1/health", () => {
  it("reports the directory", async () => {
    const res = await request(app).get("/v1/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, directory: true });
  });
});

describe("POST /v1/cup/inspect", () => {
  it("summarizes the uploaded file", async () => {
    const res = await request(app).post("/v1/cup/inspect").attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(200);
    expect(res.body.file_name).toBe("alps.cup");
    expect(res.body.counts).toEqual({ waypoints: 2, landables: 2, airports: 1, outlandings: 1, task_lines: 0 });
    expect(res.body.bounding_box.minLon).toBe(14);
    expect(res.body.waypoints.map((w: { name: string }) => w.name)).toEqual(["Lesce", "Field"]);
    expect(res.body.waypoints[0].elev).toBe("1640ft");
  });

  it("requires a file", async () => {
    const res = await request(app).post("/v1/cup/inspect");
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "file_required" });
  });

  it("maps codec errors to 422", async () => {
    const res = await request(app)
      .post("/v1/cup/inspect")
      .attach("file", Buffer.from("name,lat,lon\nA,4600.000N,bad"), "bad.cup");
    expect(res.status).toBe(422);
    expect(res.body).toEqual({ ok: false, error: "codec_error", message: "Line 2: Invalid coordinate format: bad" });
  });
});

describe("POST /v1/cup/update", () => {
  it("returns the updated file and report", async () => {
    const res = await request(app).post("/v1/cup/update").attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(200);
    expect(res.body.file_name).toBe("alps-updated.cup");
    expect(res.body.cup).toBe(
      [
        HEADER,
        "Lesce,LJBL,SI,4621.300N,01410.000E,1654ft,5,134,1180m,,123.500,,,",
        "Field,,,4620.000N,01400.000E,,3,,,,,,,",
        "-----Related Tasks-----",
        "",
      ].join("\n")
    );
    expect(res.body.counts.updated).toBe(1);
    expect(res.body.counts.distanceBuckets).toEqual({
      distance_lte_500m: 0,
      distance_lte_1000m: 1,
      distance_lte_1500m: 0,
      distance_lte_2000m: 0,
    });
    expect(res.body.report).toContain("Report for: alps.cup\n");
  });

  it("reads the flags from form fields", async () => {
    const res = await request(app)
      .post("/v1/cup/update")
      .field("update_locations", "false")
      .field("update_radius", "500")
      .attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(200);
    // 556 m is beyond the 500 m update radius
    expect(res.body.counts.updated).toBe(0);
    expect(res.body.counts.notUpdated).toBe(1);
    expect(res.body.counts.distanceBuckets).toEqual({ distance_lte_500m: 0 });
  });

  it("rejects an update radius above the search radius", async () => {
    const res = await request(app)
      .post("/v1/cup/update")
      .field("search_radius", "1000")
      .field("update_radius", "3000")
      .attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("application_error");
  });

  it("rejects malformed form values", async () => {
    const res = await request(app)
      .post("/v1/cup/update")
      .field("search_radius", "far")
      .attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("invalid_request");
  });

  it("answers 503 without a directory", async () => {
    const offline = createApp({ directory: null, countries });
    const res = await request(offline).post("/v1/cup/update").attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ ok: false, error: "directory_not_configured" });
  });

  it("limits the upload size", async () => {
    const small = createApp({ directory: null, countries, maxUploadBytes: 16 });
    const res = await request(small).post("/v1/cup/inspect").attach("file", Buffer.from(ALPS), "alps.cup");
    expect(res.status).toBe(413);
    expect(res.body.error).toBe("limit_file_size");
  });
});

describe("misc", () => {
  it("names the updated file", () => {
    expect(updatedFileName("alps.CUP")).toBe("alps-updated.cup");
    expect(updatedFileName("list")).toBe("list-updated.cup");
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(app).get("/openapi.json");
    expect(res.status).toBe(200);
    expect(Object.keys(res.body.paths)).toEqual(["/v1/health", "/v1/cup/update", "/v1/cup/inspect"]);
  });

  it("answers unknown routes with JSON 404", async () => {
    const res = await request(app).get("/v1/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: "not_found" });
  });
});
