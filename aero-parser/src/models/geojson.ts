import type { FeatureCollection, MultiPolygon, Polygon } from "geojson";
import { z } from "zod";

// Request-side GeoJSON validation. Only the polygon shapes the converters use
// are modelled.

const Position = z.array(z.number()).min(2);

export const PolygonSchema = z.object({
  type: z.literal("Polygon"),
  coordinates: z.array(z.array(Position)),
});

export const MultiPolygonSchema = z.object({
  type: z.literal("MultiPolygon"),
  coordinates: z.array(z.array(z.array(Position))),
});

const Properties = z.record(z.unknown()).nullable().default({});

const PolygonFeature = z.object({
  type: z.literal("Feature"),
  geometry: z.union([PolygonSchema, MultiPolygonSchema]),
  properties: Properties,
});

// any other feature is dropped
const OtherFeature = z
  .object({ type: z.literal("Feature") })
  .passthrough()
  .transform(() => null);

export const PolygonFeatureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(PolygonFeature),
});

/** Keeps Polygon/MultiPolygon features, drops the rest. */
export const LenientFeatureCollectionSchema = z
  .object({
    type: z.literal("FeatureCollection"),
    features: z.array(z.union([PolygonFeature, OtherFeature])),
  })
  .transform((fc): FeatureCollection<Polygon | MultiPolygon> => ({
    type: "FeatureCollection",
    features: fc.features.filter((f): f is z.output<typeof PolygonFeature> => f !== null),
  }));

export const PolygonInputSchema = z.union([PolygonFeatureCollectionSchema, PolygonSchema, MultiPolygonSchema]);
