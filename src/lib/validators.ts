import { z } from "zod";

import { validateThresholds } from "./change";
import { ConfigurationError } from "./errors";
import type { PipelineConfig } from "./types";
import { validateLookbackDays } from "./windows";

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z
  .array(PositionSchema)
  .min(4)
  .refine((ring) => {
    const first = ring[0];
    const last = ring[ring.length - 1];
    return !first || !last || (first[0] === last[0] && first[1] === last[1]);
  }, "Ring must be closed");

export const PolygonSchema = z.object({
  type: z.literal("Polygon"),
  coordinates: z.array(RingSchema).min(1)
});

export const MultiPolygonSchema = z.object({
  type: z.literal("MultiPolygon"),
  coordinates: z.array(z.array(RingSchema).min(1)).min(1)
});

export const RegionSchema = z.discriminatedUnion("type", [PolygonSchema, MultiPolygonSchema]);

export const FeatureSchema = z.object({
  type: z.literal("Feature"),
  geometry: z.unknown()
});

export const FeatureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(FeatureSchema)
});

export const GeoJsonSchema = z.union([FeatureCollectionSchema, FeatureSchema, PolygonSchema, MultiPolygonSchema]);

export const PipelineConfigSchema = z.object({
  decreaseThreshold: z.number().finite(),
  increaseThreshold: z.number().finite(),
  minAreaAcres: z.number().finite().nonnegative(),
  lookbackDays: z.number().int(),
  cloudCeilingPercent: z.number().min(0).max(100),
  scaleMeters: z.number().finite().positive(),
  maxPixels: z.number().int().positive(),
  index: z.enum(["ndvi", "nbr"])
});

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`).join("; ");
}

/** Shape, then the cross-field rules the masks and windows depend on. */
export function validatePipelineConfig(value: unknown): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pipeline configuration: ${formatIssues(parsed.error)}`, parsed.error.issues);
  }
  const config = parsed.data;
  validateThresholds(config.decreaseThreshold, config.increaseThreshold);
  validateLookbackDays(config.lookbackDays);
  return Object.freeze(config);
}
