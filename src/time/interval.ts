import { InvalidIntervalError } from './errors';

const INTERVAL_PATTERN = /^(\d+(?:\.\d+)?)(ms|[Mwdhmsy])$/;

/**
 * Seconds per interval unit. Months and years are nominal (30 and 365 days):
 * a refresh cadence has no calendar anchor.
 */
const SECONDS_PER_UNIT: Record<string, number> = {
  y: 365 * 24 * 60 * 60,
  M: 30 * 24 * 60 * 60,
  w: 7 * 24 * 60 * 60,
  d: 24 * 60 * 60,
  h: 60 * 60,
  m: 60,
  s: 1,
};

/**
 * A refresh setting as found on a dashboard record. `false`, `null`, `''` and
 * undefined all mean auto-refresh is off.
 */
export type RefreshSetting = string | false | null | undefined;

/**
 * Converts a duration literal such as `"10s"`, `"1m"` or `"1.5h"` to milliseconds.
 *
 * @throws InvalidIntervalError when the string is not `<number><unit>`.
 */
export function intervalToMs(interval: string): number {
  const match = INTERVAL_PATTERN.exec(interval.trim());
  if (!match) {
    throw new InvalidIntervalError(interval);
  }

  const [, amount, unit] = match;
  if (unit === 'ms') {
    return Math.round(parseFloat(amount));
  }
  return Math.round(parseFloat(amount) * SECONDS_PER_UNIT[unit] * 1000);
}

/**
 * Normalizes a refresh setting to an interval string, or undefined when disabled.
 * A literal that parses to zero milliseconds counts as disabled.
 *
 * @throws InvalidIntervalError for a non-empty, malformed interval.
 */
export function normalizeRefresh(setting: RefreshSetting): string | undefined {
  if (!setting) {
    return undefined;
  }
  const interval = setting.trim();
  if (!interval) {
    return undefined;
  }
  return intervalToMs(interval) > 0 ? interval : undefined;
}

export function isRefreshEnabled(setting: RefreshSetting): boolean {
  try {
    return normalizeRefresh(setting) !== undefined;
  } catch (error) {
    if (error instanceof InvalidIntervalError) {
      return false;
    }
    throw error;
  }
}
