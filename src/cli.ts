#!/usr/bin/env node
import path from "path";

import { toAlertDocument } from "./lib/alerts";
import { HttpImageryGateway, HttpVectorizer } from "./lib/api";
import { loadRegion } from "./lib/boundary";
import { loadConfig, type AppConfig } from "./lib/config";
import { ConfigurationError, describeError } from "./lib/errors";
import { createLogger, logger as defaultLogger, type Logger } from "./lib/logger";
import { runChangeDetection } from "./lib/pipeline";
import { reportAlerts, writeAlertDocument } from "./lib/report";

const USAGE = "Usage: canopy-watch [boundary.geojson | boundary.zip]";

export async function main(argv: string[], logger?: Logger): Promise<number> {
  const log = logger ?? defaultLogger;
  const boundaryFile = argv[0];
  if (boundaryFile) {
    log.info(`Using boundary file: ${boundaryFile}`);
  } else {
    log.info("No boundary file provided - using bounding box approximation");
    log.info(USAGE);
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    log.error(describeError(error));
    return 1;
  }
  const runLog = logger ?? createLogger({ level: config.logLevel });

  if (!config.imageryUrl) {
    runLog.error(describeError(new ConfigurationError("CANOPY_IMAGERY_URL is not set")));
    return 1;
  }
  const gateway = new HttpImageryGateway({ baseUrl: config.imageryUrl, token: config.imageryToken });
  const vectorizer = new HttpVectorizer({ baseUrl: config.vectorUrl ?? config.imageryUrl, token: config.imageryToken });

  try {
    await gateway.connect();
    runLog.info("Connected to imagery service");
  } catch (error) {
    runLog.error(describeError(error));
    return 1;
  }

  const { region } = await loadRegion(boundaryFile, config.bounds, runLog);

  try {
    const result = await runChangeDetection({
      region,
      gateway,
      vectorizer,
      config: config.pipeline,
      referenceDate: config.referenceDate,
      logger: runLog
    });
    if (result.status === "unavailable") {
      runLog.warn(`Analysis aborted: ${result.reason}`);
      return 0;
    }

    const outputPath = path.join(config.outputDir, "alerts.json");
    await writeAlertDocument(outputPath, toAlertDocument(result.alerts));
    runLog.info(`Exported ${result.alerts.length} alerts to ${outputPath}`);
    reportAlerts(runLog, result.alerts);
    return 0;
  } catch (error) {
    runLog.error(describeError(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      defaultLogger.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
