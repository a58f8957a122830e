import { format, isValid, parse, startOfDay, subDays } from "date-fns";

import { ConfigurationError, ParseError } from "./errors";
import type { WindowPair } from "./types";

/** Width of each composite window in days. */
export const COMPOSITE_DAYS = 15;

export const DEFAULT_LOOKBACK_DAYS = 30;

const DATE_FORMAT = "yyyy-MM-dd";

export function formatDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

export function parseReferenceDate(value?: string | null): Date {
  if (value == null || value.trim() === "") {
    return startOfDay(new Date());
  }
  const raw = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}$/.test(raw)) {
    throw new ParseError(`Reference date must be formatted ${DATE_FORMAT}, got "${value}"`);
  }
  const parsed = parse(raw, DATE_FORMAT, new Date(0));
  if (!isValid(parsed)) {
    throw new ParseError(`Reference date "${value}" is not a calendar date`);
  }
  return parsed;
}

export function validateLookbackDays(lookbackDays: number): void {
  if (!Number.isInteger(lookbackDays) || lookbackDays < COMPOSITE_DAYS) {
    throw new ConfigurationError(
      `lookbackDays must be an integer >= ${COMPOSITE_DAYS} so the baseline and current windows do not overlap (got ${lookbackDays})`
    );
  }
}

/**
 * Baseline and current search windows ending at `referenceDate`. The catalog
 * treats the end date as exclusive, so with the minimum lookback the baseline
 * ends exactly where the current window starts.
 */
export function selectWindows(referenceDate: Date, lookbackDays: number = DEFAULT_LOOKBACK_DAYS): WindowPair {
  validateLookbackDays(lookbackDays);
  return {
    baseline: {
      start: formatDate(subDays(referenceDate, lookbackDays + COMPOSITE_DAYS)),
      end: formatDate(subDays(referenceDate, lookbackDays))
    },
    current: {
      start: formatDate(subDays(referenceDate, COMPOSITE_DAYS)),
      end: formatDate(referenceDate)
    }
  };
}
