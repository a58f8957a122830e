import type { MultiPolygon, Polygon } from "geojson";

export type Region = Polygon | MultiPolygon;

export interface Bounds {
  west: number;
  south: number;
  east: number;
  north: number;
}

/** Search interval for the imagery catalog, `yyyy-MM-dd`, end exclusive. */
export interface DateWindow {
  start: string;
  end: string;
}

export interface WindowPair {
  baseline: DateWindow;
  current: DateWindow;
}

/**
 * Row-major pixel grid. Every raster derived from the same region shares one
 * grid, which is what makes pixel-wise algebra between them valid.
 */
export interface RasterGrid {
  width: number;
  height: number;
  bounds: Bounds;
}

export interface CompositeRaster extends RasterGrid {
  /** No-data pixels are NaN. */
  bands: Record<string, Float64Array>;
}

export interface IndexRaster extends RasterGrid {
  values: Float64Array;
}

export interface Mask extends RasterGrid {
  data: Uint8Array;
}

export type ChangeKind = "damage" | "recovery";

export type Severity = "high" | "medium" | "positive";

export type AlertType = "vegetation_change" | "recovery";

export type LngLat = { lon: number; lat: number };

export interface ChangeFeature {
  id: string;
  kind: ChangeKind;
  geometry: Region;
  areaAcres: number;
  centroid: LngLat;
  severity: Severity;
}

export interface Alert {
  id: string;
  type: AlertType;
  severity: Severity;
  lat: number;
  lng: number;
  area_acres: number;
  date: string;
  description: string;
}

export interface AlertDocument {
  generated: string;
  count: number;
  alerts: Alert[];
}

export type VegetationIndex = "ndvi" | "nbr";

export interface PipelineConfig {
  decreaseThreshold: number;
  increaseThreshold: number;
  minAreaAcres: number;
  lookbackDays: number;
  cloudCeilingPercent: number;
  scaleMeters: number;
  maxPixels: number;
  index: VegetationIndex;
}
