import { ConfigurationError, RasterMismatchError } from "./errors";
import type { IndexRaster, Mask, RasterGrid } from "./types";

export const DEFAULT_DECREASE_THRESHOLD = -0.15;
export const DEFAULT_INCREASE_THRESHOLD = 0.1;

export interface ChangeClassification {
  change: IndexRaster;
  damage: Mask;
  recovery: Mask;
}

export function validateThresholds(decreaseThreshold: number, increaseThreshold: number): void {
  if (!(decreaseThreshold < 0 && increaseThreshold > 0)) {
    throw new ConfigurationError(
      `Thresholds must straddle zero (decrease < 0 < increase), got decrease=${decreaseThreshold} increase=${increaseThreshold}`
    );
  }
}

function sameGrid(left: RasterGrid, right: RasterGrid): boolean {
  return (
    left.width === right.width &&
    left.height === right.height &&
    left.bounds.west === right.bounds.west &&
    left.bounds.south === right.bounds.south &&
    left.bounds.east === right.bounds.east &&
    left.bounds.north === right.bounds.north
  );
}

/**
 * Differences current against baseline and splits the result into damage
 * (change below the decrease threshold) and recovery (above the increase
 * threshold) masks. NaN compares false both ways, so no-data never lands in
 * either mask.
 */
export function classify(
  baselineIndex: IndexRaster,
  currentIndex: IndexRaster,
  decreaseThreshold: number = DEFAULT_DECREASE_THRESHOLD,
  increaseThreshold: number = DEFAULT_INCREASE_THRESHOLD
): ChangeClassification {
  validateThresholds(decreaseThreshold, increaseThreshold);
  if (!sameGrid(baselineIndex, currentIndex)) {
    throw new RasterMismatchError("Baseline and current index rasters do not share a grid", {
      baseline: { width: baselineIndex.width, height: baselineIndex.height, bounds: baselineIndex.bounds },
      current: { width: currentIndex.width, height: currentIndex.height, bounds: currentIndex.bounds }
    });
  }

  const grid = { width: currentIndex.width, height: currentIndex.height, bounds: currentIndex.bounds };
  const size = grid.width * grid.height;
  const change = new Float64Array(size);
  const damage = new Uint8Array(size);
  const recovery = new Uint8Array(size);

  for (let i = 0; i < size; i += 1) {
    const delta = currentIndex.values[i] - baselineIndex.values[i];
    change[i] = delta;
    if (delta < decreaseThreshold) damage[i] = 1;
    else if (delta > increaseThreshold) recovery[i] = 1;
  }

  return {
    change: { ...grid, values: change },
    damage: { ...grid, data: damage },
    recovery: { ...grid, data: recovery }
  };
}
