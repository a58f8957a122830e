import type { ChangeFeature, ChangeKind, Mask, Region, Severity } from "./types";
import { DEFAULT_MAX_PIXELS, DEFAULT_SCALE_METERS, type Vectorizer } from "./vectorize";

export const SQUARE_METERS_TO_ACRES = 0.000247105;
export const DEFAULT_MIN_AREA_ACRES = 2;
export const HIGH_SEVERITY_ACRES = 20;

export type ExtractOptions = {
  minAreaAcres?: number;
  scaleMeters?: number;
  maxPixels?: number;
};

export function squareMetersToAcres(areaSquareMeters: number): number {
  return areaSquareMeters * SQUARE_METERS_TO_ACRES;
}

export function meetsMinimumArea(areaAcres: number, minAreaAcres: number = DEFAULT_MIN_AREA_ACRES): boolean {
  return areaAcres >= minAreaAcres;
}

export function classifySeverity(kind: ChangeKind, areaAcres: number): Severity {
  if (kind === "recovery") return "positive";
  return areaAcres > HIGH_SEVERITY_ACRES ? "high" : "medium";
}

/**
 * Vectorizes one mask and keeps the features large enough to report. Ids are
 * numbered per kind over the survivors, in the order the vectorizer returned
 * them.
 */
export async function extractFeatures(
  mask: Mask,
  kind: ChangeKind,
  region: Region,
  vectorizer: Vectorizer,
  options: ExtractOptions = {}
): Promise<ChangeFeature[]> {
  const minAreaAcres = options.minAreaAcres ?? DEFAULT_MIN_AREA_ACRES;
  const vectors = await vectorizer.reduceToVectors({
    mask,
    region,
    scale: options.scaleMeters ?? DEFAULT_SCALE_METERS,
    maxPixels: options.maxPixels ?? DEFAULT_MAX_PIXELS,
    geometryType: "polygon"
  });

  const features: ChangeFeature[] = [];
  for (const vector of vectors) {
    const { areaSquareMeters, centroid } = await vectorizer.measure(vector);
    const areaAcres = squareMetersToAcres(areaSquareMeters);
    if (!meetsMinimumArea(areaAcres, minAreaAcres)) continue;
    features.push({
      id: `${kind}_${features.length + 1}`,
      kind,
      geometry: vector.geometry,
      areaAcres,
      centroid,
      severity: classifySeverity(kind, areaAcres)
    });
  }
  return features;
}
