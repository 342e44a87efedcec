import { z } from "zod";

// GeoJSON as served by the FDSN event service (format=geojson)
export const FeaturePropertiesSchema = z
  .object({
    mag: z.number(),
    place: z.string(),
    time: z.number().int(),
  })
  .passthrough();

export const FeatureGeometrySchema = z
  .object({
    // [longitude, latitude, depth]
    coordinates: z.array(z.number()).min(3),
  })
  .passthrough();

export const FeatureSchema = z
  .object({
    id: z.optional(z.string()),
    properties: FeaturePropertiesSchema,
    geometry: FeatureGeometrySchema,
  })
  .passthrough();

export type Feature = z.infer<typeof FeatureSchema>;

export const FeatureCollectionSchema = z
  .object({
    features: z.array(FeatureSchema),
  })
  .passthrough();

export type FeatureCollection = z.infer<typeof FeatureCollectionSchema>;

export interface SeismicEvent {
  readonly magnitude: number;
  readonly place: string;
  readonly occurredAt: number; // epoch millis
  readonly latitude: number;
  readonly longitude: number;
  readonly depth: number; // km
  readonly feedId: string | null;
}

export const FingerprintModeSchema = z.union([
  z.literal("rendered"),
  z.literal("feed-id"),
]);

export type FingerprintMode = z.infer<typeof FingerprintModeSchema>;
