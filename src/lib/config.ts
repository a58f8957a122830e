import dotenv from "dotenv";
import { z } from "zod";

import { DEFAULT_DECREASE_THRESHOLD, DEFAULT_INCREASE_THRESHOLD } from "./change";
import { ConfigurationError } from "./errors";
import { DEFAULT_MIN_AREA_ACRES } from "./features";
import { DEFAULT_CLOUD_CEILING_PERCENT } from "./gateway";
import type { Bounds, PipelineConfig } from "./types";
import { formatIssues, validatePipelineConfig } from "./validators";
import { DEFAULT_MAX_PIXELS, DEFAULT_SCALE_METERS } from "./vectorize";
import { DEFAULT_LOOKBACK_DAYS, parseReferenceDate } from "./windows";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze({
  decreaseThreshold: DEFAULT_DECREASE_THRESHOLD,
  increaseThreshold: DEFAULT_INCREASE_THRESHOLD,
  minAreaAcres: DEFAULT_MIN_AREA_ACRES,
  lookbackDays: DEFAULT_LOOKBACK_DAYS,
  cloudCeilingPercent: DEFAULT_CLOUD_CEILING_PERCENT,
  scaleMeters: DEFAULT_SCALE_METERS,
  maxPixels: DEFAULT_MAX_PIXELS,
  index: "ndvi"
});

/** Approximate extent of the monitored area, used when no boundary file loads. */
export const DEFAULT_BOUNDS: Bounds = Object.freeze({ west: -95.5, south: 47.1, east: -94.0, north: 48.3 });

export interface AppConfig {
  imageryUrl: string | null;
  imageryToken: string | null;
  vectorUrl: string | null;
  outputDir: string;
  referenceDate: string | null;
  bounds: Bounds;
  logLevel: string;
  pipeline: PipelineConfig;
}

const optionalNumber = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return fallback;
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const BoundsSchema = z
  .string()
  .optional()
  .transform((value, ctx): Bounds => {
    if (!value || !value.trim()) return DEFAULT_BOUNDS;
    const parts = value.split(",").map((part) => Number(part.trim()));
    const [west, south, east, north] = parts;
    if (parts.length !== 4 || parts.some((part) => !Number.isFinite(part)) || west >= east || south >= north) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected west,south,east,north" });
      return z.NEVER;
    }
    return { west, south, east, north };
  });

const EnvSchema = z.object({
  CANOPY_IMAGERY_URL: optionalString.pipe(z.string().url().nullable()),
  CANOPY_IMAGERY_TOKEN: optionalString,
  CANOPY_VECTOR_URL: optionalString.pipe(z.string().url().nullable()),
  CANOPY_OUTPUT_DIR: z.string().trim().min(1).default("./output"),
  CANOPY_REFERENCE_DATE: optionalString,
  CANOPY_LOOKBACK_DAYS: optionalNumber(DEFAULT_PIPELINE_CONFIG.lookbackDays),
  CANOPY_CLOUD_CEILING: optionalNumber(DEFAULT_PIPELINE_CONFIG.cloudCeilingPercent),
  CANOPY_DECREASE_THRESHOLD: optionalNumber(DEFAULT_PIPELINE_CONFIG.decreaseThreshold),
  CANOPY_INCREASE_THRESHOLD: optionalNumber(DEFAULT_PIPELINE_CONFIG.increaseThreshold),
  CANOPY_MIN_AREA_ACRES: optionalNumber(DEFAULT_PIPELINE_CONFIG.minAreaAcres),
  CANOPY_SCALE_METERS: optionalNumber(DEFAULT_PIPELINE_CONFIG.scaleMeters),
  CANOPY_MAX_PIXELS: optionalNumber(DEFAULT_PIPELINE_CONFIG.maxPixels),
  CANOPY_INDEX: z.enum(["ndvi", "nbr"]).default(DEFAULT_PIPELINE_CONFIG.index),
  CANOPY_BOUNDS: BoundsSchema,
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info")
});

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`, parsed.error.issues);
  }
  const values = parsed.data;
  if (values.CANOPY_REFERENCE_DATE !== null) {
    parseReferenceDate(values.CANOPY_REFERENCE_DATE);
  }
  return Object.freeze({
    imageryUrl: values.CANOPY_IMAGERY_URL,
    imageryToken: values.CANOPY_IMAGERY_TOKEN,
    vectorUrl: values.CANOPY_VECTOR_URL ?? values.CANOPY_IMAGERY_URL,
    outputDir: values.CANOPY_OUTPUT_DIR,
    referenceDate: values.CANOPY_REFERENCE_DATE,
    bounds: values.CANOPY_BOUNDS,
    logLevel: values.LOG_LEVEL,
    pipeline: validatePipelineConfig({
      decreaseThreshold: values.CANOPY_DECREASE_THRESHOLD,
      increaseThreshold: values.CANOPY_INCREASE_THRESHOLD,
      minAreaAcres: values.CANOPY_MIN_AREA_ACRES,
      lookbackDays: values.CANOPY_LOOKBACK_DAYS,
      cloudCeilingPercent: values.CANOPY_CLOUD_CEILING,
      scaleMeters: values.CANOPY_SCALE_METERS,
      maxPixels: values.CANOPY_MAX_PIXELS,
      index: values.CANOPY_INDEX
    })
  });
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
