import { promises as fs } from "fs";
import path from "path";

import { BoundaryError, describeError } from "./errors";
import { boundsToPolygon } from "./geometry";
import type { Logger } from "./logger";
import { geoJsonToGeometry, parseShapefileZip } from "./shp";
import type { Bounds, Region } from "./types";

export type RegionSource = "file" | "bounds";

export interface LoadedRegion {
  region: Region;
  source: RegionSource;
}

async function readBoundaryFile(filePath: string): Promise<Region> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === ".zip") {
    return parseShapefileZip(filePath);
  }
  if (extension !== ".geojson" && extension !== ".json") {
    throw new BoundaryError(`Unsupported boundary format "${extension || filePath}". Use .geojson, .json or a zipped shapefile.`);
  }
  const text = await fs.readFile(filePath, "utf8");
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new BoundaryError(`Boundary file is not valid JSON: ${describeError(error)}`);
  }
  return geoJsonToGeometry(value);
}

/**
 * Region for the run. A missing or unreadable boundary file is not fatal: the
 * configured bounding box stands in and the operator gets a warning.
 */
export async function loadRegion(filePath: string | undefined, bounds: Bounds, logger: Logger): Promise<LoadedRegion> {
  if (filePath) {
    try {
      const region = await readBoundaryFile(filePath);
      logger.info(`Loaded boundary from ${filePath}`);
      return { region, source: "file" };
    } catch (error) {
      logger.warn(`Could not load boundary ${filePath} (${describeError(error)})`);
    }
  }
  logger.warn("Using bounding box approximation - load an actual boundary for accuracy");
  return { region: boundsToPolygon(bounds), source: "bounds" };
}
