import type { Alert, AlertDocument, ChangeFeature, Severity } from "./types";

/**
 * One decimal, rounded on the exact value of the double. A tie is only
 * possible at quarter values (x.25, x.75), and those go to the even digit.
 */
export function roundAcres(areaAcres: number): number {
  if (Number.isInteger(areaAcres * 4) && !Number.isInteger(areaAcres * 2)) {
    const tenths = Math.floor(areaAcres * 10);
    return (tenths % 2 === 0 ? tenths : tenths + 1) / 10;
  }
  return Number(areaAcres.toFixed(1));
}

function describe(feature: ChangeFeature): string {
  const acres = roundAcres(feature.areaAcres).toFixed(1);
  return feature.kind === "damage"
    ? `Significant vegetation loss detected (${acres} acres)`
    : `Vegetation recovery observed (${acres} acres)`;
}

export function toAlert(feature: ChangeFeature, analysisDate: string): Alert {
  return {
    id: feature.id,
    type: feature.kind === "damage" ? "vegetation_change" : "recovery",
    severity: feature.severity,
    lat: feature.centroid.lat,
    lng: feature.centroid.lon,
    area_acres: roundAcres(feature.areaAcres),
    date: analysisDate,
    description: describe(feature)
  };
}

/** Damage alerts first, then recovery, each in extraction order. */
export function buildAlerts(damage: ChangeFeature[], recovery: ChangeFeature[], analysisDate: string): Alert[] {
  return [...damage, ...recovery].map((feature) => toAlert(feature, analysisDate));
}

/** Largest first; equal areas keep their list order. */
export function topAlerts(alerts: Alert[], limit = 5): Alert[] {
  return alerts
    .map((alert, index) => ({ alert, index }))
    .sort((left, right) => right.alert.area_acres - left.alert.area_acres || left.index - right.index)
    .slice(0, limit)
    .map(({ alert }) => alert);
}

export function summarizeAlerts(alerts: Alert[]): Record<Severity, number> {
  const summary: Record<Severity, number> = { high: 0, medium: 0, positive: 0 };
  for (const alert of alerts) {
    summary[alert.severity] += 1;
  }
  return summary;
}

export function toAlertDocument(alerts: Alert[], generated: Date = new Date()): AlertDocument {
  return {
    generated: generated.toISOString(),
    count: alerts.length,
    alerts
  };
}
