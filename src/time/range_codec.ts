import moment from 'moment';
import { InvalidExpressionError } from './errors';
import { DateMathOptions, Instant, resolveRange } from './date_math';
import { RawTimeRange, TimeBoundary, TimeRange } from './types';

const EPOCH_PATTERN = /^-?\d+$/;

// An ISO-8601 timestamp with a zone designator, as JSON.stringify writes dates
const ISO_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Decodes an address-bar boundary. First match wins:
 *
 * 1. contains `now`: relative, kept verbatim
 * 2. 8 characters, `YYYYMMDD`: midnight UTC
 * 3. 15 characters, `YYYYMMDDTHHmmss`: that UTC instant
 * 4. an integer: epoch milliseconds, within the range a Date can hold
 *
 * @throws InvalidExpressionError when nothing matches.
 */
export function decodeBoundary(raw: string): TimeBoundary {
  if (raw.includes('now')) {
    return { kind: 'relative', expression: raw };
  }

  if (raw.length === 8) {
    const date = moment.utc(raw, 'YYYYMMDD', true);
    if (date.isValid()) {
      return { kind: 'absolute', at: date };
    }
  }

  if (raw.length === 15) {
    const timestamp = moment.utc(raw, 'YYYYMMDDTHHmmss', true);
    if (timestamp.isValid()) {
      return { kind: 'absolute', at: timestamp };
    }
  }

  if (EPOCH_PATTERN.test(raw)) {
    const epoch = moment.utc(Number(raw));
    if (epoch.isValid()) {
      return { kind: 'absolute', at: epoch };
    }
  }

  throw new InvalidExpressionError(raw);
}

/**
 * Like {@link decodeBoundary}, but returns null instead of throwing.
 */
export function tryDecodeBoundary(raw: string): TimeBoundary | null {
  try {
    return decodeBoundary(raw);
  } catch (error) {
    if (error instanceof InvalidExpressionError) {
      return null;
    }
    throw error;
  }
}

/**
 * Decodes a boundary read from a saved dashboard, where absolute times were
 * serialized as ISO-8601 strings.
 */
export function decodeStoredBoundary(raw: string): TimeBoundary {
  if (ISO_TIMESTAMP_PATTERN.test(raw)) {
    const instant = moment.utc(raw, moment.ISO_8601, true);
    if (instant.isValid()) {
      return { kind: 'absolute', at: instant };
    }
  }
  return decodeBoundary(raw);
}

export function encodeBoundary(boundary: TimeBoundary): string {
  switch (boundary.kind) {
    case 'absolute':
      return String(boundary.at.valueOf());
    case 'relative':
      return boundary.expression;
  }
}

/**
 * Encodes a range for the address bar.
 *
 * Relative expressions are kept verbatim so `now-6h` survives navigation. With
 * `resolveToAbsolute` both sides are first resolved against `now`, giving a
 * link that shows the same window regardless of when it is opened.
 */
export function encodeForAddress(
  range: TimeRange,
  resolveToAbsolute: boolean,
  now: Instant = Date.now(),
  options: DateMathOptions = {}
): RawTimeRange {
  if (resolveToAbsolute) {
    const resolved = resolveRange(range, now, options);
    return { from: String(resolved.from.valueOf()), to: String(resolved.to.valueOf()) };
  }
  return { from: encodeBoundary(range.from), to: encodeBoundary(range.to) };
}
