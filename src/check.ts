#!/usr/bin/env node
import { existsSync, promises as fs } from "fs";
import { subDays } from "date-fns";

import { HttpImageryGateway } from "./lib/api";
import { loadConfig } from "./lib/config";
import { describeError } from "./lib/errors";
import type { ImageryGateway } from "./lib/gateway";
import { boundsToPolygon } from "./lib/geometry";
import { computeIndex, meanIndex } from "./lib/indices";
import { createLogger, logger as defaultLogger, type Logger } from "./lib/logger";
import { geoJsonToGeometry } from "./lib/shp";
import type { Bounds } from "./lib/types";
import { formatDate } from "./lib/windows";

export const CHECK_LOOKBACK_DAYS = 30;
export const CHECK_CLOUD_CEILING_PERCENT = 30;
export const HEALTHY_MEAN_NDVI = 0.3;
export const DEFAULT_BOUNDARY_FILE = "boundary.geojson";

export type ConnectionCheckOptions = {
  gateway: ImageryGateway;
  bounds: Bounds;
  today?: Date;
  boundaryFile?: string;
  logger?: Logger;
};

/**
 * Smoke test for a fresh install: service reachable, recent scenes exist, the
 * boundary file parses, and the composite yields a sensible NDVI.
 */
export async function checkConnection(options: ConnectionCheckOptions): Promise<boolean> {
  const log = options.logger ?? defaultLogger;
  const region = boundsToPolygon(options.bounds);
  const today = options.today ?? new Date();
  const window = { start: formatDate(subDays(today, CHECK_LOOKBACK_DAYS)), end: formatDate(today) };

  log.info("1. Testing imagery service connection...");
  try {
    await options.gateway.connect();
    log.info("Connected to imagery service");
  } catch (error) {
    log.error(`Connection failed: ${describeError(error)}`);
    return false;
  }

  log.info("2. Testing scene catalog access...");
  try {
    const inventory = await options.gateway.countScenes(region, window, CHECK_CLOUD_CEILING_PERCENT);
    log.info(`Found ${inventory.count} scenes in last ${CHECK_LOOKBACK_DAYS} days`);
    if (inventory.latest) {
      log.info(`Most recent scene: ${inventory.latest}`);
    }
  } catch (error) {
    log.error(`Scene catalog access failed: ${describeError(error)}`);
    return false;
  }

  log.info("3. Testing boundary file...");
  const boundaryFile = options.boundaryFile ?? DEFAULT_BOUNDARY_FILE;
  if (!existsSync(boundaryFile)) {
    log.warn(`Boundary file not found (${boundaryFile}); runs will use the bounding box`);
  } else {
    try {
      const value: unknown = JSON.parse(await fs.readFile(boundaryFile, "utf8"));
      const geometry = geoJsonToGeometry(value);
      const parts = geometry.type === "Polygon" ? 1 : geometry.coordinates.length;
      log.info(`Loaded boundary file with ${parts} polygon(s)`);
    } catch (error) {
      log.error(`Error loading boundary: ${describeError(error)}`);
    }
  }

  log.info("4. Testing NDVI calculation...");
  try {
    const composite = await options.gateway.fetchComposite(region, window, CHECK_CLOUD_CEILING_PERCENT);
    if (composite.status === "unavailable") {
      log.warn("No composite available for the last month; skipping NDVI check");
    } else {
      const mean = meanIndex(computeIndex(composite.raster, "ndvi"));
      if (mean === null) {
        log.warn("Composite has no valid NDVI pixels");
      } else if (mean > HEALTHY_MEAN_NDVI) {
        log.info(`Mean NDVI ${mean.toFixed(3)}: healthy vegetation detected`);
      } else {
        log.warn(`Mean NDVI ${mean.toFixed(3)}: low vegetation signal, may be winter or snow cover`);
      }
    }
  } catch (error) {
    log.error(`NDVI calculation failed: ${describeError(error)}`);
    return false;
  }

  log.info("All checks passed - ready to run canopy-watch");
  return true;
}

export async function main(): Promise<number> {
  try {
    const config = loadConfig();
    const log = createLogger({ level: config.logLevel });
    if (!config.imageryUrl) {
      log.error("CANOPY_IMAGERY_URL is not set");
      return 1;
    }
    const gateway = new HttpImageryGateway({ baseUrl: config.imageryUrl, token: config.imageryToken });
    return (await checkConnection({ gateway, bounds: config.bounds, logger: log })) ? 0 : 1;
  } catch (error) {
    defaultLogger.error(describeError(error));
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      defaultLogger.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
