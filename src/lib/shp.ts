import { promises as fs } from "fs";
import shp from "shpjs";
import type { Polygon } from "geojson";

import { BoundaryError } from "./errors";
import type { Region } from "./types";
import { FeatureCollectionSchema, FeatureSchema, RegionSchema } from "./validators";

function geometryToPolygonList(geometry: unknown): Polygon["coordinates"][] {
  const parsed = RegionSchema.safeParse(geometry);
  if (!parsed.success) {
    return [];
  }
  return parsed.data.type === "Polygon" ? [parsed.data.coordinates] : parsed.data.coordinates;
}

/** Merges every polygon of a set of features into one region. */
export function collectionToGeometry(features: Array<{ geometry?: unknown }>): Region {
  const polygonCoordinates: Polygon["coordinates"][] = [];
  for (const feature of features) {
    polygonCoordinates.push(...geometryToPolygonList(feature.geometry));
  }
  if (polygonCoordinates.length === 0) {
    throw new BoundaryError("Boundary must contain polygons");
  }
  if (polygonCoordinates.length === 1) {
    return { type: "Polygon", coordinates: polygonCoordinates[0] };
  }
  return { type: "MultiPolygon", coordinates: polygonCoordinates };
}

/** Accepts a FeatureCollection, a Feature, or a bare Polygon/MultiPolygon. */
export function geoJsonToGeometry(value: unknown): Region {
  const collection = FeatureCollectionSchema.safeParse(value);
  if (collection.success) {
    return collectionToGeometry(collection.data.features);
  }
  const feature = FeatureSchema.safeParse(value);
  if (feature.success) {
    return collectionToGeometry([feature.data]);
  }
  return collectionToGeometry([{ geometry: value }]);
}

export async function parseShapefileZip(filePath: string): Promise<Region> {
  const bytes = await fs.readFile(filePath);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  const geojson: unknown = await shp(buffer);
  // Archives with several layers come back as one collection per layer.
  const layers: unknown[] = Array.isArray(geojson) ? geojson : [geojson];
  const features: Array<{ geometry?: unknown }> = [];
  for (const layer of layers) {
    const parsed = FeatureCollectionSchema.safeParse(layer);
    if (parsed.success) {
      features.push(...parsed.data.features);
    }
  }
  return collectionToGeometry(features);
}
