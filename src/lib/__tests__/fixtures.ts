import type { CompositeResult, ImageryGateway, SceneInventory } from "../gateway";
import type { Bounds, CompositeRaster, DateWindow, Region } from "../types";

export const GRID_BOUNDS: Bounds = { west: -95, south: 47.96, east: -94.94, north: 48 };

/** Composite whose bands hold one constant per band, with optional per-pixel overrides. */
export function uniformComposite(
  width: number,
  height: number,
  values: Record<string, number>,
  bounds: Bounds = GRID_BOUNDS
): CompositeRaster {
  const bands: Record<string, Float64Array> = {};
  for (const [name, value] of Object.entries(values)) {
    bands[name] = new Float64Array(width * height).fill(value);
  }
  return { width, height, bounds, bands };
}

export function fillBlock(
  raster: CompositeRaster,
  block: { col: number; row: number; width: number; height: number },
  values: Record<string, number>
): CompositeRaster {
  for (const [name, value] of Object.entries(values)) {
    const band = raster.bands[name];
    for (let row = block.row; row < block.row + block.height; row += 1) {
      for (let col = block.col; col < block.col + block.width; col += 1) {
        band[row * raster.width + col] = value;
      }
    }
  }
  return raster;
}

/** Serves composites keyed by window start date; unknown windows are unavailable. */
export class StubGateway implements ImageryGateway {
  readonly calls: DateWindow[] = [];

  constructor(private readonly composites: Record<string, CompositeRaster>) {}

  async connect(): Promise<void> {}

  async countScenes(): Promise<SceneInventory> {
    return { count: Object.keys(this.composites).length, latest: null };
  }

  async fetchComposite(_region: Region, window: DateWindow): Promise<CompositeResult> {
    this.calls.push(window);
    const raster = this.composites[window.start];
    return raster ? { status: "available", raster, sceneCount: 3 } : { status: "unavailable", sceneCount: 0 };
  }
}
