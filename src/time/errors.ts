/**
 * Base class for time range and refresh errors. `code` is stable and safe to
 * branch on; `context` carries the offending input.
 */
export class TimeRangeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TimeRangeError';
  }
}

/**
 * A boundary string matched neither an absolute encoding nor the `now` grammar.
 */
export class InvalidExpressionError extends TimeRangeError {
  constructor(
    public readonly expression: string,
    reason?: string
  ) {
    super(
      reason ? `Invalid time expression "${expression}": ${reason}` : `Invalid time expression "${expression}"`,
      'INVALID_EXPRESSION',
      { expression }
    );
    this.name = 'InvalidExpressionError';
  }
}

/**
 * Resolution was asked for without a usable "now" snapshot.
 */
export class ClockAnchorMissingError extends TimeRangeError {
  constructor() {
    super('Cannot resolve a time range without a valid "now" anchor', 'CLOCK_ANCHOR_MISSING');
    this.name = 'ClockAnchorMissingError';
  }
}

export class InvalidIntervalError extends TimeRangeError {
  constructor(public readonly interval: string) {
    super(
      `Invalid interval string "${interval}", expecting a number followed by one of "Mwdhmsy"`,
      'INVALID_INTERVAL',
      { interval }
    );
    this.name = 'InvalidIntervalError';
  }
}

export class InvalidDashboardSettingsError extends TimeRangeError {
  constructor(public readonly issues: string[]) {
    super(`Invalid dashboard settings: ${issues.join('; ')}`, 'INVALID_DASHBOARD_SETTINGS', { issues });
    this.name = 'InvalidDashboardSettingsError';
  }
}
