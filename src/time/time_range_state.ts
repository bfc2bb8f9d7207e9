import { logger as defaultLogger, Logger } from '../utils/logger';
import { createAttributes, createMetrics, Metrics } from '../utils/metrics';
import { PARAM_FROM, PARAM_TO, REFRESH_REASON_RANGE_CHANGED } from '../utils/constants';
import { DateMathOptions, Instant, isValidExpression, resolveRange } from './date_math';
import { RefreshSetting } from './interval';
import { encodeForAddress, tryDecodeBoundary } from './range_codec';
import { SessionEvents } from './session_events';
import { cloneRange, isAbsolute, RawTimeRange, ResolvedRange, TimeBoundary, TimeRange } from './types';

/**
 * The part of the session that owns the dashboard's refresh interval.
 */
export interface AutoRefreshControl {
  getInterval(): string | undefined;
  setAutoRefresh(interval: RefreshSetting): void;
}

export interface TimeRangeStateOptions {
  initialRange: TimeRange;
  refresh: AutoRefreshControl;
  events: SessionEvents;
  dateMath?: DateMathOptions;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * The session's current `{from, to}` pair.
 *
 * Setting a range whose `to` is absolute suspends auto-refresh (a frozen
 * window never moves) and remembers the interval; the next range whose `to`
 * is relative again restores it.
 */
export class TimeRangeState {
  private range: TimeRange;
  private suppressedRefresh: string | undefined;
  private readonly pendingRefreshRequests = new Set<ReturnType<typeof setTimeout>>();
  private readonly refresh: AutoRefreshControl;
  private readonly events: SessionEvents;
  private readonly dateMath: DateMathOptions;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: TimeRangeStateOptions) {
    this.range = cloneRange(options.initialRange);
    this.refresh = options.refresh;
    this.events = options.events;
    this.dateMath = options.dateMath ?? {};
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? createMetrics();
  }

  /**
   * Applies `from` / `to` address-bar parameters. A side that is absent, fails
   * to decode or holds a relative expression that cannot be resolved keeps its
   * current value.
   */
  setFromUrl(fromRaw?: string | null, toRaw?: string | null): void {
    const from = this.decodeParam(PARAM_FROM, fromRaw);
    if (from) {
      this.range.from = from;
    }
    const to = this.decodeParam(PARAM_TO, toRaw);
    if (to) {
      this.range.to = to;
    }
  }

  /**
   * Replaces the range, applies the refresh suppression rule, notifies
   * observers synchronously and requests a refresh on the next timer turn.
   */
  setRange(newRange: TimeRange, isUserManualSelection: boolean): void {
    this.range = cloneRange(newRange);

    if (isAbsolute(newRange.to)) {
      this.suppressedRefresh = this.refresh.getInterval() || this.suppressedRefresh;
      if (this.refresh.getInterval()) {
        this.logger.info('Absolute time range selected, pausing auto-refresh', { remembered: this.suppressedRefresh });
      }
      this.refresh.setAutoRefresh(undefined);
    } else if (this.suppressedRefresh && this.suppressedRefresh !== this.refresh.getInterval()) {
      this.logger.info(`Relative time range selected, resuming auto-refresh every ${this.suppressedRefresh}`);
      this.refresh.setAutoRefresh(this.suppressedRefresh);
      this.suppressedRefresh = undefined;
    }

    this.metrics.range?.changes.add(1, createAttributes(this.metrics, { manual: isUserManualSelection ? 'true' : 'false' }));
    this.events.emitTimeRangeChanged({
      range: cloneRange(this.range),
      raw: this.getForAddressBar(),
      manual: isUserManualSelection,
    });
    this.scheduleRefreshRequest();
  }

  /**
   * The interval waiting to be restored, if auto-refresh is currently paused.
   */
  get rememberedRefresh(): string | undefined {
    return this.suppressedRefresh;
  }

  /**
   * Drops the remembered interval, e.g. after the user picks a refresh rate explicitly.
   */
  forgetRememberedRefresh(): void {
    this.suppressedRefresh = undefined;
  }

  getRaw(): TimeRange {
    return cloneRange(this.range);
  }

  /**
   * @throws InvalidExpressionError or ClockAnchorMissingError; a wrong
   * range must not silently reach data fetching.
   */
  getResolved(anchorNow: Instant): ResolvedRange {
    return resolveRange(this.range, anchorNow, this.dateMath);
  }

  getForAddressBar(): RawTimeRange {
    return encodeForAddress(this.range, false);
  }

  get pendingRefreshRequestCount(): number {
    return this.pendingRefreshRequests.size;
  }

  /**
   * Cancels refresh requests that have not been delivered yet.
   */
  dispose(): void {
    for (const handle of this.pendingRefreshRequests) {
      clearTimeout(handle);
    }
    this.pendingRefreshRequests.clear();
  }

  private decodeParam(name: string, raw: string | null | undefined): TimeBoundary | null {
    if (!raw) {
      return null;
    }
    const decoded = tryDecodeBoundary(raw);
    // A relative value is only usable if it resolves
    const boundary = decoded?.kind === 'relative' && !isValidExpression(decoded.expression) ? null : decoded;
    if (!boundary) {
      this.metrics.range?.urlDecodeFailures.add(1, createAttributes(this.metrics, { param: name }));
      this.logger.warn(`Ignoring malformed "${name}" parameter`, { value: raw });
    }
    return boundary;
  }

  private scheduleRefreshRequest(): void {
    const handle = setTimeout(() => {
      this.pendingRefreshRequests.delete(handle);
      this.metrics.range?.refreshRequests.add(1, createAttributes(this.metrics, { reason: REFRESH_REASON_RANGE_CHANGED }));
      this.events.emitRefreshRequested({ reason: REFRESH_REASON_RANGE_CHANGED });
    }, 0);
    this.pendingRefreshRequests.add(handle);
  }
}
