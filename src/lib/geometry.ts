import type { Polygon as GeoPolygon, Position } from "geojson";

import type { Bounds, LngLat, RasterGrid, Region } from "./types";

type Ring = Position[];
type Polygon = Ring[];

function pointInRing(point: LngLat, ring: Ring): boolean {
  if (ring.length < 3) return false;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const xi = ring[i][0];
    const yi = ring[i][1];
    const xj = ring[j][0];
    const yj = ring[j][1];
    const intersect = yi > point.lat !== yj > point.lat && point.lon < ((xj - xi) * (point.lat - yi)) / (yj - yi + 1e-12) + xi;
    if (intersect) inside = !inside;
  }
  return inside;
}

function pointInPolygon(point: LngLat, polygon: Polygon): boolean {
  if (!polygon.length) return false;
  const [outer, ...holes] = polygon;
  if (!pointInRing(point, outer)) return false;
  return holes.every((hole) => !pointInRing(point, hole));
}

function regionPolygons(region: Region): Polygon[] {
  return region.type === "Polygon" ? [region.coordinates] : region.coordinates;
}

export function pointInsideGeometry(point: LngLat, region: Region): boolean {
  return regionPolygons(region).some((polygon) => pointInPolygon(point, polygon));
}

export function boundsToPolygon(bounds: Bounds): GeoPolygon {
  const { west, south, east, north } = bounds;
  return {
    type: "Polygon",
    coordinates: [
      [
        [west, south],
        [east, south],
        [east, north],
        [west, north],
        [west, south]
      ]
    ]
  };
}

/** Longitude/latitude of a pixel's center; row 0 is the northern edge. */
export function pixelCenter(grid: RasterGrid, col: number, row: number): LngLat {
  const { west, south, east, north } = grid.bounds;
  return {
    lon: west + ((col + 0.5) * (east - west)) / grid.width,
    lat: north - ((row + 0.5) * (north - south)) / grid.height
  };
}

/** Closed ring covering columns [colStart, colEnd) of one row. */
export function cellRunRing(grid: RasterGrid, row: number, colStart: number, colEnd: number): Ring {
  const { west, south, east, north } = grid.bounds;
  const dx = (east - west) / grid.width;
  const dy = (north - south) / grid.height;
  const left = west + colStart * dx;
  const right = west + colEnd * dx;
  const top = north - row * dy;
  const bottom = north - (row + 1) * dy;
  return [
    [left, bottom],
    [right, bottom],
    [right, top],
    [left, top],
    [left, bottom]
  ];
}
