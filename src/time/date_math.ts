import moment, { Moment } from 'moment';
import { timeConfig, TimezoneMode, WeekStart } from '../config';
import { ClockAnchorMissingError, InvalidExpressionError } from './errors';
import { ResolvedRange, TimeBoundary, TimeRange } from './types';

const DATE_MATH_UNITS = ['y', 'M', 'w', 'd', 'h', 'm', 's'] as const;
type DateMathUnit = (typeof DATE_MATH_UNITS)[number];
const UNIT_NAMES: ReadonlySet<string> = new Set(DATE_MATH_UNITS);

const MAX_AMOUNT_DIGITS = 10;

/**
 * Anything moment accepts as a point in time without a format string.
 */
export type Instant = Moment | Date | number;

export interface DateMathOptions {
  weekStart?: WeekStart;
  timezone?: TimezoneMode;
}

export type DateMathOperation =
  | { op: '+' | '-'; amount: number; unit: DateMathUnit }
  | { op: '/'; unit: DateMathUnit };

function isDateMathUnit(value: string): value is DateMathUnit {
  return UNIT_NAMES.has(value);
}

function isDigit(value: string | undefined): boolean {
  return value !== undefined && value >= '0' && value <= '9';
}

/**
 * Parses the operations following `now` in a relative expression.
 *
 * `now-1d/d+2h` yields `[-1d, /d, +2h]`. A missing amount means 1; rounding
 * (`/`) takes no amount other than an explicit 1.
 *
 * @throws InvalidExpressionError
 */
export function parseRelativeExpression(expression: string): DateMathOperation[] {
  if (!expression.startsWith('now')) {
    throw new InvalidExpressionError(expression, 'relative expressions must start with "now"');
  }

  const math = expression.substring('now'.length);
  const operations: DateMathOperation[] = [];
  let i = 0;

  while (i < math.length) {
    const op = math.charAt(i++);
    if (op !== '+' && op !== '-' && op !== '/') {
      throw new InvalidExpressionError(expression, `unexpected "${op}"`);
    }

    let amount = 1;
    if (isDigit(math[i])) {
      const start = i;
      while (isDigit(math[i])) {
        i++;
        if (i - start > MAX_AMOUNT_DIGITS) {
          throw new InvalidExpressionError(expression, 'offset is too large');
        }
      }
      amount = parseInt(math.substring(start, i), 10);
    }

    const unit = math.charAt(i++);
    if (!isDateMathUnit(unit)) {
      throw new InvalidExpressionError(expression, unit ? `unknown unit "${unit}"` : 'missing unit');
    }

    if (op === '/') {
      if (amount !== 1) {
        throw new InvalidExpressionError(expression, 'rounding does not take an amount');
      }
      operations.push({ op, unit });
    } else {
      operations.push({ op, amount, unit });
    }
  }

  return operations;
}

export function isValidExpression(expression: string): boolean {
  try {
    parseRelativeExpression(expression);
    return true;
  } catch (error) {
    if (error instanceof InvalidExpressionError) {
      return false;
    }
    throw error;
  }
}

function toAnchor(now: Instant | null | undefined, timezone: TimezoneMode): Moment {
  if (now === null || now === undefined) {
    throw new ClockAnchorMissingError();
  }
  const anchor = timezone === 'local' ? moment(now) : moment.utc(now);
  if (!anchor.isValid()) {
    throw new ClockAnchorMissingError();
  }
  return anchor;
}

/**
 * Snaps to the start or end of `unit`. Weeks honor the configured first day
 * instead of the moment locale.
 */
function round(time: Moment, unit: DateMathUnit, roundUp: boolean, weekStart: WeekStart): Moment {
  if (unit !== 'w') {
    return roundUp ? time.endOf(unit) : time.startOf(unit);
  }
  if (weekStart === 'monday') {
    return roundUp ? time.endOf('isoWeek') : time.startOf('isoWeek');
  }
  time.startOf('day').subtract(time.day(), 'days');
  return roundUp ? time.add(6, 'days').endOf('day') : time;
}

/**
 * Resolves a boundary to a concrete instant.
 *
 * Absolute boundaries come back unchanged (as a copy). Relative ones are
 * evaluated against `now` with calendar-aware arithmetic; `roundUp` picks the
 * end rather than the start of any `/unit` rounding.
 *
 * @throws InvalidExpressionError when a relative expression is malformed.
 * @throws ClockAnchorMissingError when `now` is missing or invalid.
 */
export function resolveBoundary(
  boundary: TimeBoundary,
  now: Instant | null | undefined,
  roundUp: boolean,
  options: DateMathOptions = {}
): Moment {
  switch (boundary.kind) {
    case 'absolute':
      return boundary.at.clone();
    case 'relative': {
      const weekStart = options.weekStart ?? timeConfig.weekStart;
      const operations = parseRelativeExpression(boundary.expression);
      let time = toAnchor(now, options.timezone ?? timeConfig.timezone);

      for (const operation of operations) {
        switch (operation.op) {
          case '+':
            time = time.add(operation.amount, operation.unit);
            break;
          case '-':
            time = time.subtract(operation.amount, operation.unit);
            break;
          case '/':
            time = round(time, operation.unit, roundUp, weekStart);
            break;
        }
      }
      return time;
    }
  }
}

/**
 * Resolves `from` rounding down and `to` rounding up, so that `now/d` to
 * `now/d` spans the whole day.
 */
export function resolveRange(range: TimeRange, now: Instant | null | undefined, options: DateMathOptions = {}): ResolvedRange {
  return {
    from: resolveBoundary(range.from, now, false, options),
    to: resolveBoundary(range.to, now, true, options),
  };
}
