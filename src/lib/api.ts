import { z } from "zod";

import { ServiceError, SetupError, describeError } from "./errors";
import type { CompositeResult, ImageryGateway, SceneInventory } from "./gateway";
import type { CompositeRaster, DateWindow, Region } from "./types";
import { RegionSchema } from "./validators";
import type { FeatureMeasurement, VectorFeature, VectorizeRequest, Vectorizer } from "./vectorize";

export type ServiceClientOptions = {
  baseUrl: string;
  token?: string | null;
};

const BoundsSchema = z.object({
  west: z.number(),
  south: z.number(),
  east: z.number(),
  north: z.number()
});

const HealthSchema = z.object({ ok: z.boolean(), detail: z.string().optional() });

const SceneCountSchema = z.object({
  count: z.number().int().nonnegative(),
  latest: z.string().nullable().optional()
});

const CompositeResponseSchema = z.object({
  sceneCount: z.number().int().nonnegative(),
  composite: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
      bounds: BoundsSchema,
      bands: z.record(z.array(z.number().nullable()))
    })
    .nullable()
});

const VectorsResponseSchema = z.object({
  features: z.array(z.object({ geometry: RegionSchema }))
});

const MeasureResponseSchema = z.object({
  areaSquareMeters: z.number().nonnegative(),
  centroid: z.tuple([z.number(), z.number()])
});

const ErrorBodySchema = z.object({ detail: z.string() });

function endpoint(baseUrl: string, route: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${route}`;
}

async function fetchJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: { body?: unknown; token?: string | null } = {}
): Promise<z.infer<S>> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }
  const response = await fetch(url, {
    method: options.body === undefined ? "GET" : "POST",
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body)
  }).catch((error: unknown) => {
    throw new ServiceError(`Request to ${url} failed: ${describeError(error)}`);
  });
  if (!response.ok) {
    const detail = ErrorBodySchema.safeParse(await response.json().catch(() => ({})));
    const message = detail.success ? detail.data.detail : "Request failed";
    throw new ServiceError(`${url}: ${message}`, response.status);
  }
  const body: unknown = await response.json().catch(() => {
    throw new ServiceError(`${url}: response is not JSON`, response.status);
  });
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ServiceError(`${url}: unexpected response shape`, response.status, parsed.error.issues);
  }
  return parsed.data;
}

function toBand(values: Array<number | null>): Float64Array {
  return Float64Array.from(values, (value) => (value === null ? Number.NaN : value));
}

export class HttpImageryGateway implements ImageryGateway {
  constructor(private readonly options: ServiceClientOptions) {}

  async connect(): Promise<void> {
    let health: z.infer<typeof HealthSchema>;
    try {
      health = await fetchJson(endpoint(this.options.baseUrl, "/health"), HealthSchema, { token: this.options.token });
    } catch (error) {
      throw new SetupError(`Cannot reach imagery service: ${describeError(error)}`);
    }
    if (!health.ok) {
      throw new SetupError(`Imagery service refused the connection: ${health.detail ?? "not ready"}`);
    }
  }

  async countScenes(region: Region, window: DateWindow, cloudCeilingPercent: number): Promise<SceneInventory> {
    const result = await fetchJson(endpoint(this.options.baseUrl, "/scenes/count"), SceneCountSchema, {
      token: this.options.token,
      body: { aoi: region, start: window.start, end: window.end, cloudMax: cloudCeilingPercent }
    });
    return { count: result.count, latest: result.latest ?? null };
  }

  async fetchComposite(region: Region, window: DateWindow, cloudCeilingPercent: number): Promise<CompositeResult> {
    const result = await fetchJson(endpoint(this.options.baseUrl, "/composites"), CompositeResponseSchema, {
      token: this.options.token,
      body: { aoi: region, start: window.start, end: window.end, cloudMax: cloudCeilingPercent, reducer: "median" }
    });
    if (result.sceneCount === 0 || result.composite === null) {
      return { status: "unavailable", sceneCount: 0 };
    }
    const { width, height, bounds, bands } = result.composite;
    const raster: CompositeRaster = { width, height, bounds, bands: {} };
    for (const [name, values] of Object.entries(bands)) {
      raster.bands[name] = toBand(values);
    }
    return { status: "available", raster, sceneCount: result.sceneCount };
  }
}

export class HttpVectorizer implements Vectorizer {
  constructor(private readonly options: ServiceClientOptions) {}

  async reduceToVectors(request: VectorizeRequest): Promise<VectorFeature[]> {
    const { mask, region, scale, maxPixels, geometryType } = request;
    const result = await fetchJson(endpoint(this.options.baseUrl, "/vectors"), VectorsResponseSchema, {
      token: this.options.token,
      body: {
        mask: { width: mask.width, height: mask.height, bounds: mask.bounds, data: Array.from(mask.data) },
        region,
        scale,
        maxPixels,
        geometryType
      }
    });
    return result.features.map((feature) => ({ geometry: feature.geometry }));
  }

  async measure(feature: VectorFeature): Promise<FeatureMeasurement> {
    const result = await fetchJson(endpoint(this.options.baseUrl, "/measure"), MeasureResponseSchema, {
      token: this.options.token,
      body: { geometry: feature.geometry }
    });
    const [lon, lat] = result.centroid;
    return { areaSquareMeters: result.areaSquareMeters, centroid: { lon, lat } };
  }
}
