import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { FormatError } from "../lib/errors";
import { LenientFeatureCollectionSchema, PolygonInputSchema } from "../models/geojson";
import {
  batchCompactToOpenAir,
  closePolygonRings,
  extractAllCoordinates,
  icaoCoordinatesToPolygon,
  linesToPolygon,
  parseAipPoint,
} from "../services/geo";
import { geoJsonToOpenAir, openAirToGeoJson } from "../services/openair";

const TextRequest = z.object({
  text: z.string().min(1),
});

const PolygonRequest = TextRequest.extend({
  name: z.string().trim().min(1).optional(),
});

const GeoJsonToOpenAirRequest = z.object({
  geojson: LenientFeatureCollectionSchema,
});

const CloseRingsRequest = z.object({
  geojson: PolygonInputSchema,
});

function invalid(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: "Invalid request", details: error.format() });
}

export default async function convertRoutes(app: FastifyInstance) {
  app.post("/convert/openair-to-geojson", async (req, reply) => {
    const parsed = TextRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    const geojson = openAirToGeoJson(parsed.data.text);
    req.log.debug({ features: geojson.features.length }, "openair converted");
    return geojson;
  });

  app.post("/convert/geojson-to-openair", async (req, reply) => {
    const parsed = GeoJsonToOpenAirRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    return { openair: geoJsonToOpenAir(parsed.data.geojson) };
  });

  app.post("/convert/aip-point", async (req, reply) => {
    const parsed = TextRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    const point = parseAipPoint(parsed.data.text);
    if (!point) {
      throw new FormatError("Invalid AIP coordinate format. Example: '455404.3N 0153113.7E'", parsed.data.text);
    }
    return { lat: point.lat, lon: point.lon };
  });

  // Every coordinate found in a pasted blob, as [lon, lat] pairs
  app.post("/convert/coordinates", async (req, reply) => {
    const parsed = TextRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    const points = extractAllCoordinates(parsed.data.text);
    return {
      count: points.length,
      coordinates: points.map((p) => [p.lon, p.lat]),
    };
  });

  app.post("/convert/polygon", async (req, reply) => {
    const parsed = PolygonRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    return linesToPolygon(parsed.data.text, parsed.data.name);
  });

  app.post("/convert/icao-polygon", async (req, reply) => {
    const parsed = PolygonRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    return icaoCoordinatesToPolygon(parsed.data.text, parsed.data.name);
  });

  app.post("/convert/compact-to-openair", async (req, reply) => {
    const parsed = TextRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    const lines = batchCompactToOpenAir(parsed.data.text);
    return { count: lines.length, openair: lines.join("\n") };
  });

  app.post("/convert/close-rings", async (req, reply) => {
    const parsed = CloseRingsRequest.safeParse(req.body);
    if (!parsed.success) return invalid(reply, parsed.error);

    return closePolygonRings(parsed.data.geojson);
  });
}
