import { describe, expect, it } from "vitest";

import * as canopyWatch from "../index";

describe("library entry point", () => {
  it("exposes the pipeline with its collaborators and defaults", () => {
    expect(typeof canopyWatch.runChangeDetection).toBe("function");
    expect(typeof canopyWatch.LocalVectorizer).toBe("function");
    expect(typeof canopyWatch.HttpImageryGateway).toBe("function");
    expect(typeof canopyWatch.HttpVectorizer).toBe("function");
    expect(typeof canopyWatch.loadRegion).toBe("function");
    expect(canopyWatch.DEFAULT_PIPELINE_CONFIG.index).toBe("ndvi");
  });

  it("runs a detection through the exported surface alone", async () => {
    const bounds = { west: 0, south: 0, east: 1, north: 1 };
    const raster: canopyWatch.CompositeRaster = {
      width: 1,
      height: 1,
      bounds,
      bands: { B8: Float64Array.from([0.6]), B4: Float64Array.from([0.2]) }
    };
    const gateway: canopyWatch.ImageryGateway = {
      connect: async () => undefined,
      countScenes: async () => ({ count: 1, latest: null }),
      fetchComposite: async () => ({ status: "available", raster, sceneCount: 1 })
    };
    const result = await canopyWatch.runChangeDetection({
      region: canopyWatch.boundsToPolygon(bounds),
      gateway,
      vectorizer: new canopyWatch.LocalVectorizer(),
      config: canopyWatch.DEFAULT_PIPELINE_CONFIG,
      referenceDate: "2024-06-15",
      logger: canopyWatch.createLogger({ silent: true })
    });
    expect(result).toMatchObject({ status: "completed", alerts: [], analysisDate: "2024-06-15" });
  });
});
