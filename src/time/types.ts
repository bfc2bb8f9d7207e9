import moment, { Moment } from 'moment';
import { InvalidExpressionError } from './errors';

export interface AbsoluteBoundary {
  kind: 'absolute';
  at: Moment;
}

/**
 * A boundary expressed against "now", e.g. `now`, `now-6h`, `now-1d/d`.
 */
export interface RelativeBoundary {
  kind: 'relative';
  expression: string;
}

export type TimeBoundary = AbsoluteBoundary | RelativeBoundary;

/**
 * A `{from, to}` pair as stored. `from < to` is not enforced.
 */
export interface TimeRange {
  from: TimeBoundary;
  to: TimeBoundary;
}

/**
 * Both boundaries evaluated against a single "now" snapshot.
 */
export interface ResolvedRange {
  from: Moment;
  to: Moment;
}

/**
 * Address-bar form of a range: epoch milliseconds or verbatim relative expressions.
 */
export interface RawTimeRange {
  from: string;
  to: string;
}

export function absolute(at: moment.MomentInput): AbsoluteBoundary {
  const instant = moment.utc(at);
  if (!instant.isValid()) {
    throw new InvalidExpressionError(String(at), 'not a valid instant');
  }
  return { kind: 'absolute', at: instant };
}

export function relative(expression: string): RelativeBoundary {
  if (!expression.includes('now')) {
    throw new InvalidExpressionError(expression, 'relative expressions must contain "now"');
  }
  return { kind: 'relative', expression };
}

export function isAbsolute(boundary: TimeBoundary): boundary is AbsoluteBoundary {
  return boundary.kind === 'absolute';
}

/**
 * Copies a boundary so the caller cannot mutate stored moments.
 */
export function cloneBoundary(boundary: TimeBoundary): TimeBoundary {
  switch (boundary.kind) {
    case 'absolute':
      return { kind: 'absolute', at: boundary.at.clone() };
    case 'relative':
      return { kind: 'relative', expression: boundary.expression };
  }
}

export function cloneRange(range: TimeRange): TimeRange {
  return { from: cloneBoundary(range.from), to: cloneBoundary(range.to) };
}
