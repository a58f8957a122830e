import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { checkConnection } from "../check";
import { SetupError } from "../lib/errors";
import { boundsToPolygon } from "../lib/geometry";
import { createLogger } from "../lib/logger";
import { StubGateway, uniformComposite } from "../lib/__tests__/fixtures";

const bounds = { west: -95, south: 47.96, east: -94.94, north: 48 };
const today = new Date(2024, 5, 15);

class OfflineGateway extends StubGateway {
  async connect(): Promise<void> {
    throw new SetupError("Cannot reach imagery service: offline");
  }
}

describe("checkConnection", () => {
  let dir: string;
  const logger = createLogger({ silent: true });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "canopy-check-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("passes with a reachable service and healthy vegetation", async () => {
    const gateway = new StubGateway({ "2024-05-16": uniformComposite(2, 2, { B8: 0.6, B4: 0.2 }) });
    const info = vi.spyOn(logger, "info");

    const passed = await checkConnection({
      gateway,
      bounds,
      today,
      boundaryFile: path.join(dir, "missing.geojson"),
      logger
    });

    expect(passed).toBe(true);
    expect(gateway.calls).toEqual([{ start: "2024-05-16", end: "2024-06-15" }]);
    expect(info).toHaveBeenCalledWith("Found 1 scenes in last 30 days");
    expect(info).toHaveBeenCalledWith("Mean NDVI 0.500: healthy vegetation detected");
  });

  it("parses the boundary file when present", async () => {
    const boundaryFile = path.join(dir, "boundary.geojson");
    await fs.writeFile(boundaryFile, JSON.stringify({ type: "Feature", geometry: boundsToPolygon(bounds), properties: {} }));
    const info = vi.spyOn(logger, "info");

    await checkConnection({ gateway: new StubGateway({}), bounds, today, boundaryFile, logger });

    expect(info).toHaveBeenCalledWith("Loaded boundary file with 1 polygon(s)");
  });

  it("warns on a weak vegetation signal without failing", async () => {
    const gateway = new StubGateway({ "2024-05-16": uniformComposite(2, 2, { B8: 0.3, B4: 0.25 }) });
    const warn = vi.spyOn(logger, "warn");
    const passed = await checkConnection({ gateway, bounds, today, boundaryFile: path.join(dir, "none"), logger });
    expect(passed).toBe(true);
    expect(warn).toHaveBeenCalledWith("Mean NDVI 0.091: low vegetation signal, may be winter or snow cover");
  });

  it("fails when the service is unreachable", async () => {
    const gateway = new OfflineGateway({});
    const error = vi.spyOn(logger, "error");
    expect(await checkConnection({ gateway, bounds, today, logger })).toBe(false);
    expect(error).toHaveBeenCalledWith("Connection failed: SETUP_ERROR: Cannot reach imagery service: offline");
    expect(gateway.calls).toEqual([]);
  });
});

