import { ConfigurationError } from "./errors";
import type { CompositeRaster, IndexRaster, VegetationIndex } from "./types";

export type BandPair = { a: string; b: string };

export const INDEX_BANDS: Record<VegetationIndex, BandPair> = {
  // near-infrared vs red
  ndvi: { a: "B8", b: "B4" },
  // near-infrared vs short-wave infrared
  nbr: { a: "B8", b: "B12" }
};

function band(raster: CompositeRaster, name: string): Float64Array {
  const values = raster.bands[name];
  if (!values) {
    const available = Object.keys(raster.bands).join(", ") || "none";
    throw new ConfigurationError(`Composite has no band "${name}" (available: ${available})`);
  }
  if (values.length !== raster.width * raster.height) {
    throw new ConfigurationError(`Band "${name}" has ${values.length} pixels, expected ${raster.width * raster.height}`);
  }
  return values;
}

/**
 * (A - B) / (A + B) per pixel. Pixels where A + B is zero, or where either
 * input is no-data, come out as NaN.
 */
export function normalizedDifference(raster: CompositeRaster, bandA: string, bandB: string): IndexRaster {
  const a = band(raster, bandA);
  const b = band(raster, bandB);
  const values = new Float64Array(a.length);
  for (let i = 0; i < a.length; i += 1) {
    const sum = a[i] + b[i];
    values[i] = sum === 0 ? Number.NaN : (a[i] - b[i]) / sum;
  }
  return { width: raster.width, height: raster.height, bounds: raster.bounds, values };
}

export function computeIndex(raster: CompositeRaster, index: VegetationIndex): IndexRaster {
  const { a, b } = INDEX_BANDS[index];
  return normalizedDifference(raster, a, b);
}

export function meanIndex(index: IndexRaster): number | null {
  let total = 0;
  let count = 0;
  for (const value of index.values) {
    if (Number.isNaN(value)) continue;
    total += value;
    count += 1;
  }
  return count ? total / count : null;
}
