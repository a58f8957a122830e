import type { MultiPolygon, Position } from "geojson";

import { ServiceError } from "./errors";
import { cellRunRing, pixelCenter, pointInsideGeometry } from "./geometry";
import type { LngLat, Mask, Region } from "./types";

export const DEFAULT_SCALE_METERS = 30;
export const DEFAULT_MAX_PIXELS = 1e8;

export interface VectorizeRequest {
  mask: Mask;
  region: Region;
  scale: number;
  maxPixels: number;
  geometryType: "polygon";
}

export interface VectorFeature {
  geometry: Region;
}

export interface FeatureMeasurement {
  areaSquareMeters: number;
  centroid: LngLat;
}

/** Turns a mask's connected true-regions into polygons and measures them. */
export interface Vectorizer {
  reduceToVectors(request: VectorizeRequest): Promise<VectorFeature[]>;
  measure(feature: VectorFeature): Promise<FeatureMeasurement>;
}

const NEIGHBOURS: ReadonlyArray<[number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1]
];

/**
 * In-process vectorizer for offline runs and tests. Groups 8-connected cells
 * whose centers fall inside the region and emits components in row-major
 * order of their first cell.
 *
 * The mask is assumed to be sampled at `scale` already: each cell counts as a
 * `scale` x `scale` meter square, whatever span the grid bounds give it. The
 * polygons follow the grid bounds, so their planar extent only matches the
 * measured area when that holds.
 */
export class LocalVectorizer implements Vectorizer {
  private readonly measurements = new WeakMap<VectorFeature, FeatureMeasurement>();

  async reduceToVectors(request: VectorizeRequest): Promise<VectorFeature[]> {
    const { mask, region, scale, maxPixels } = request;
    const size = mask.width * mask.height;
    if (size > maxPixels) {
      throw new ServiceError(`Mask has ${size} pixels, more than maxPixels=${maxPixels}`);
    }

    const eligible = new Uint8Array(size);
    for (let row = 0; row < mask.height; row += 1) {
      for (let col = 0; col < mask.width; col += 1) {
        const index = row * mask.width + col;
        if (mask.data[index] && pointInsideGeometry(pixelCenter(mask, col, row), region)) {
          eligible[index] = 1;
        }
      }
    }

    const visited = new Uint8Array(size);
    const features: VectorFeature[] = [];
    for (let start = 0; start < size; start += 1) {
      if (!eligible[start] || visited[start]) continue;
      const cells = this.collectComponent(mask, eligible, visited, start);
      const feature: VectorFeature = { geometry: this.toGeometry(mask, cells) };
      this.measurements.set(feature, this.measureCells(mask, cells, scale));
      features.push(feature);
    }
    return features;
  }

  async measure(feature: VectorFeature): Promise<FeatureMeasurement> {
    const measurement = this.measurements.get(feature);
    if (!measurement) {
      throw new ServiceError("Feature was not produced by this vectorizer");
    }
    return measurement;
  }

  private collectComponent(mask: Mask, eligible: Uint8Array, visited: Uint8Array, start: number): number[] {
    const cells: number[] = [];
    const stack = [start];
    visited[start] = 1;
    while (stack.length) {
      const index = stack.pop();
      if (index === undefined) break;
      cells.push(index);
      const col = index % mask.width;
      const row = Math.floor(index / mask.width);
      for (const [dx, dy] of NEIGHBOURS) {
        const c = col + dx;
        const r = row + dy;
        if (c < 0 || r < 0 || c >= mask.width || r >= mask.height) continue;
        const next = r * mask.width + c;
        if (eligible[next] && !visited[next]) {
          visited[next] = 1;
          stack.push(next);
        }
      }
    }
    return cells.sort((left, right) => left - right);
  }

  private toGeometry(mask: Mask, sortedCells: number[]): MultiPolygon {
    const polygons: Position[][][] = [];
    let runStart = sortedCells[0];
    let previous = sortedCells[0];
    const flush = (first: number, last: number) => {
      const row = Math.floor(first / mask.width);
      polygons.push([cellRunRing(mask, row, first % mask.width, (last % mask.width) + 1)]);
    };
    for (const cell of sortedCells.slice(1)) {
      const sameRow = Math.floor(cell / mask.width) === Math.floor(previous / mask.width);
      if (!(sameRow && cell === previous + 1)) {
        flush(runStart, previous);
        runStart = cell;
      }
      previous = cell;
    }
    flush(runStart, previous);
    return { type: "MultiPolygon", coordinates: polygons };
  }

  private measureCells(mask: Mask, cells: number[], scale: number): FeatureMeasurement {
    let lon = 0;
    let lat = 0;
    for (const cell of cells) {
      const center = pixelCenter(mask, cell % mask.width, Math.floor(cell / mask.width));
      lon += center.lon;
      lat += center.lat;
    }
    return {
      areaSquareMeters: cells.length * scale * scale,
      centroid: { lon: lon / cells.length, lat: lat / cells.length }
    };
  }
}
