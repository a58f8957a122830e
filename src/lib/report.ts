import { promises as fs } from "fs";
import path from "path";

import { summarizeAlerts, topAlerts } from "./alerts";
import type { Logger } from "./logger";
import type { Alert, AlertDocument } from "./types";

export function serializeAlertDocument(document: AlertDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

export async function writeAlertDocument(outputPath: string, document: AlertDocument): Promise<void> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, serializeAlertDocument(document));
}

export function reportAlerts(logger: Logger, alerts: Alert[]): void {
  const summary = summarizeAlerts(alerts);
  logger.info(`High priority:   ${summary.high}`);
  logger.info(`Medium priority: ${summary.medium}`);
  logger.info(`Recovery areas:  ${summary.positive}`);
  for (const alert of topAlerts(alerts)) {
    logger.info(
      `Top alert ${alert.id}: ${alert.type} ${alert.area_acres.toFixed(1)} acres at (${alert.lat.toFixed(4)}, ${alert.lng.toFixed(4)})`
    );
  }
}
