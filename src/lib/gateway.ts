import type { CompositeRaster, DateWindow, Region } from "./types";

export const DEFAULT_CLOUD_CEILING_PERCENT = 20;

export type CompositeResult =
  | { status: "available"; raster: CompositeRaster; sceneCount: number }
  | { status: "unavailable"; sceneCount: 0 };

export interface SceneInventory {
  count: number;
  /** Acquisition date of the newest qualifying scene, `yyyy-MM-dd`. */
  latest: string | null;
}

/**
 * Scene catalog and compositing backend. Implementations filter scenes by
 * region, window and cloud cover, then reduce them with a per-pixel median.
 */
export interface ImageryGateway {
  connect(): Promise<void>;
  countScenes(region: Region, window: DateWindow, cloudCeilingPercent: number): Promise<SceneInventory>;
  fetchComposite(region: Region, window: DateWindow, cloudCeilingPercent: number): Promise<CompositeResult>;
}
