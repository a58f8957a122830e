import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadRegion } from "../boundary";
import { boundsToPolygon } from "../geometry";
import { createLogger } from "../logger";

const bounds = { west: -95.5, south: 47.1, east: -94.0, north: 48.3 };

const boundary = {
  type: "FeatureCollection",
  features: [
    {
      type: "Feature",
      properties: { name: "test area" },
      geometry: {
        type: "Polygon",
        coordinates: [
          [
            [-95, 47.5],
            [-94.5, 47.5],
            [-94.5, 48],
            [-95, 48],
            [-95, 47.5]
          ]
        ]
      }
    }
  ]
};

describe("loadRegion", () => {
  let dir: string;
  const logger = createLogger({ silent: true });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "canopy-boundary-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads polygons from a GeoJSON file", async () => {
    const file = path.join(dir, "boundary.geojson");
    await fs.writeFile(file, JSON.stringify(boundary));
    const loaded = await loadRegion(file, bounds, logger);
    expect(loaded).toEqual({ region: boundary.features[0].geometry, source: "file" });
  });

  it("falls back to the bounding box without a file", async () => {
    const warn = vi.spyOn(logger, "warn");
    const loaded = await loadRegion(undefined, bounds, logger);
    expect(loaded).toEqual({ region: boundsToPolygon(bounds), source: "bounds" });
    expect(warn).toHaveBeenCalledWith("Using bounding box approximation - load an actual boundary for accuracy");
  });

  it("falls back when the file is missing", async () => {
    const loaded = await loadRegion(path.join(dir, "missing.geojson"), bounds, logger);
    expect(loaded.source).toBe("bounds");
  });

  it("falls back when the file is not JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json");
    const warn = vi.spyOn(logger, "warn");
    const loaded = await loadRegion(file, bounds, logger);
    expect(loaded.source).toBe("bounds");
    expect(String(warn.mock.calls[0][0])).toContain("BOUNDARY_ERROR: Boundary file is not valid JSON");
  });

  it("falls back on unsupported formats", async () => {
    const file = path.join(dir, "boundary.kml");
    await fs.writeFile(file, "<kml/>");
    const loaded = await loadRegion(file, bounds, logger);
    expect(loaded.region).toEqual(boundsToPolygon(bounds));
  });
});
