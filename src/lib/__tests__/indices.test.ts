import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../errors";
import { computeIndex, meanIndex, normalizedDifference } from "../indices";
import type { CompositeRaster } from "../types";
import { GRID_BOUNDS } from "./fixtures";

function composite(bands: Record<string, number[]>): CompositeRaster {
  const entries = Object.entries(bands).map(([name, values]) => [name, Float64Array.from(values)] as const);
  return { width: 3, height: 1, bounds: GRID_BOUNDS, bands: Object.fromEntries(entries) };
}

describe("normalizedDifference", () => {
  it("computes (A - B) / (A + B) per pixel", () => {
    const index = normalizedDifference(composite({ B8: [0.8, 0.3, 0], B4: [0.2, 0.3, 0.5] }), "B8", "B4");
    expect(index.values[0]).toBeCloseTo(0.6, 10);
    expect(index.values[1]).toBe(0);
    expect(index.values[2]).toBe(-1);
  });

  it("marks zero sums and no-data inputs as no-data", () => {
    const index = normalizedDifference(composite({ B8: [0, Number.NaN, 0.4], B4: [0, 0.1, 0.4] }), "B8", "B4");
    expect(Number.isNaN(index.values[0])).toBe(true);
    expect(Number.isNaN(index.values[1])).toBe(true);
    expect(index.values[2]).toBe(0);
  });

  it("keeps the grid of the composite", () => {
    const index = normalizedDifference(composite({ B8: [1, 1, 1], B4: [0, 0, 0] }), "B8", "B4");
    expect(index.width).toBe(3);
    expect(index.height).toBe(1);
    expect(index.bounds).toEqual(GRID_BOUNDS);
  });

  it("rejects unknown bands", () => {
    expect(() => normalizedDifference(composite({ B8: [1, 1, 1] }), "B8", "B4")).toThrow(ConfigurationError);
  });
});

describe("computeIndex", () => {
  it("uses near-infrared and short-wave infrared for the burn ratio", () => {
    const raster = composite({ B8: [0.6, 0.6, 0.6], B4: [0.2, 0.2, 0.2], B12: [0.6, 0.2, 0.4] });
    expect(computeIndex(raster, "nbr").values[0]).toBe(0);
    expect(computeIndex(raster, "nbr").values[1]).toBeCloseTo(0.5, 10);
    expect(computeIndex(raster, "ndvi").values[0]).toBeCloseTo(0.5, 10);
  });
});

describe("meanIndex", () => {
  it("averages valid pixels only", () => {
    const index = normalizedDifference(composite({ B8: [0.8, 0, 0.5], B4: [0.2, 0, 0.5] }), "B8", "B4");
    expect(meanIndex(index)).toBeCloseTo(0.3, 10);
  });

  it("returns null without valid pixels", () => {
    const index = normalizedDifference(composite({ B8: [0, 0, 0], B4: [0, 0, 0] }), "B8", "B4");
    expect(meanIndex(index)).toBeNull();
  });
});
