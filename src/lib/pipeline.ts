import { buildAlerts } from "./alerts";
import { classify } from "./change";
import { extractFeatures } from "./features";
import type { CompositeResult, ImageryGateway } from "./gateway";
import { computeIndex } from "./indices";
import { logger as defaultLogger, type Logger } from "./logger";
import type { Alert, DateWindow, PipelineConfig, Region, WindowPair } from "./types";
import { validatePipelineConfig } from "./validators";
import type { Vectorizer } from "./vectorize";
import { parseReferenceDate, selectWindows } from "./windows";

export type RunOptions = {
  region: Region;
  gateway: ImageryGateway;
  vectorizer: Vectorizer;
  config: PipelineConfig;
  /** `yyyy-MM-dd`; today when omitted. */
  referenceDate?: string | null;
  logger?: Logger;
};

export type SceneCounts = { baseline: number; current: number };

export type PipelineResult =
  | {
      status: "completed";
      alerts: Alert[];
      windows: WindowPair;
      analysisDate: string;
      sceneCounts: SceneCounts;
    }
  | {
      status: "unavailable";
      reason: string;
      windows: WindowPair;
      sceneCounts: SceneCounts;
    };

async function fetchWindow(
  label: string,
  options: RunOptions & { logger: Logger },
  window: DateWindow,
  cloudCeilingPercent: number
): Promise<CompositeResult> {
  options.logger.info(`Fetching ${label} imagery ${window.start} to ${window.end}`);
  const result = await options.gateway.fetchComposite(options.region, window, cloudCeilingPercent);
  options.logger.info(`Found ${result.sceneCount} scenes for ${window.start} to ${window.end}`);
  return result;
}

/**
 * One batch run: composites for both windows, index difference, masks, and
 * the alerts extracted from them. Configuration and the reference date are
 * checked before the gateway is touched.
 */
export async function runChangeDetection(options: RunOptions): Promise<PipelineResult> {
  const log = options.logger ?? defaultLogger;
  const config = validatePipelineConfig(options.config);
  const referenceDate = parseReferenceDate(options.referenceDate);
  const windows = selectWindows(referenceDate, config.lookbackDays);
  const context = { ...options, logger: log };

  log.info(`Baseline: ${windows.baseline.start} to ${windows.baseline.end}`);
  log.info(`Current:  ${windows.current.start} to ${windows.current.end}`);

  const baseline = await fetchWindow("baseline", context, windows.baseline, config.cloudCeilingPercent);
  const current = await fetchWindow("current", context, windows.current, config.cloudCeilingPercent);
  const sceneCounts = { baseline: baseline.sceneCount, current: current.sceneCount };

  if (baseline.status === "unavailable" || current.status === "unavailable") {
    const missing = [
      baseline.status === "unavailable" ? `baseline ${windows.baseline.start} to ${windows.baseline.end}` : null,
      current.status === "unavailable" ? `current ${windows.current.start} to ${windows.current.end}` : null
    ].filter((label): label is string => label !== null);
    return {
      status: "unavailable",
      reason: `Insufficient imagery: no scenes for ${missing.join(" and ")}`,
      windows,
      sceneCounts
    };
  }

  const { damage, recovery } = classify(
    computeIndex(baseline.raster, config.index),
    computeIndex(current.raster, config.index),
    config.decreaseThreshold,
    config.increaseThreshold
  );

  const extractOptions = {
    minAreaAcres: config.minAreaAcres,
    scaleMeters: config.scaleMeters,
    maxPixels: config.maxPixels
  };
  log.info("Extracting change areas");
  const damageFeatures = await extractFeatures(damage, "damage", options.region, options.vectorizer, extractOptions);
  const recoveryFeatures = await extractFeatures(recovery, "recovery", options.region, options.vectorizer, extractOptions);

  const analysisDate = windows.current.end;
  const alerts = buildAlerts(damageFeatures, recoveryFeatures, analysisDate);
  log.info(`Found ${alerts.length} significant changes`);
  return { status: "completed", alerts, windows, analysisDate, sceneCounts };
}
