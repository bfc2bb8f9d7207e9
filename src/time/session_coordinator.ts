import { createLogger, DashboardContext, logger as defaultLogger, Logger } from '../utils/logger';
import { createAttributes, createMetrics, Metrics } from '../utils/metrics';
import { REFRESH_REASON_INTERVAL, REFRESH_REASON_MANUAL } from '../utils/constants';
import { AddressBar, AddressParams } from './address_bar';
import { parseDashboardSettings, DashboardSettings } from './dashboard_settings';
import { DateMathOptions, Instant } from './date_math';
import { normalizeRefresh, RefreshSetting } from './interval';
import { decodeBoundary, encodeForAddress } from './range_codec';
import { RefreshScheduler, SchedulerState } from './refresh_scheduler';
import { RefreshReason, SessionEvents, SessionObserver } from './session_events';
import { AutoRefreshControl, TimeRangeState } from './time_range_state';
import { RawTimeRange, ResolvedRange, TimeBoundary, TimeRange } from './types';

export interface SessionCoordinatorOptions {
  /** Source of initial `from` / `to`, and target of every range change. */
  addressBar?: AddressBar;
  dateMath?: DateMathOptions;
  /** Epoch milliseconds; defaults to `Date.now`. */
  clock?: () => number;
  logger?: Logger;
}

/**
 * A range as accepted from the UI: decoded boundaries or raw address-bar strings.
 */
export interface TimeRangeInput {
  from: TimeBoundary | string;
  to: TimeBoundary | string;
}

interface ActiveSession {
  dashboard: DashboardSettings;
  state: TimeRangeState;
  scheduler: RefreshScheduler;
  logger: Logger;
  metrics: Metrics;
}

function toBoundary(value: TimeBoundary | string): TimeBoundary {
  return typeof value === 'string' ? decodeBoundary(value) : value;
}

/**
 * One dashboard-viewing lifetime: owns the time range, the refresh schedule
 * and the dashboard's refresh setting, and publishes changes to observers.
 *
 * Loading another dashboard through {@link init} tears the previous one down
 * first. Coordinators share nothing; run one per open dashboard.
 */
export class SessionCoordinator {
  private readonly events: SessionEvents;
  private readonly addressBar?: AddressBar;
  private readonly dateMath: DateMathOptions;
  private readonly clock: () => number;
  private readonly baseLogger: Logger;
  private readonly customLogger?: Logger;
  private session: ActiveSession | null = null;

  constructor(options: SessionCoordinatorOptions = {}) {
    this.addressBar = options.addressBar;
    this.dateMath = options.dateMath ?? {};
    this.clock = options.clock ?? (() => Date.now());
    this.customLogger = options.logger;
    this.baseLogger = options.logger ?? defaultLogger;
    this.events = new SessionEvents(this.baseLogger);

    const addressBar = this.addressBar;
    if (addressBar) {
      this.events.subscribe({ onTimeRangeChanged: (event) => addressBar.write(event.raw) });
    }
  }

  /**
   * Starts viewing a dashboard.
   *
   * Cancels whatever the previous dashboard left scheduled, adopts the saved
   * range and refresh interval, overlays the address-bar parameters, resolves
   * the range once and arms auto-refresh if the dashboard has an interval.
   *
   * @throws InvalidDashboardSettingsError for a malformed record.
   * @throws InvalidExpressionError when the initial range cannot be resolved;
   * the coordinator is left uninitialized.
   */
  init(dashboardSettings: unknown, addressParams?: AddressParams): ResolvedRange {
    this.dispose();

    const dashboard = parseDashboardSettings(dashboardSettings);
    const context: DashboardContext | undefined = dashboard.uid ? { uid: dashboard.uid, title: dashboard.title } : undefined;
    const logger = this.customLogger ?? (context ? createLogger(context) : defaultLogger);
    const metrics = createMetrics(context);

    const scheduler = new RefreshScheduler({
      onRefresh: () => this.emitRefresh(REFRESH_REASON_INTERVAL),
      logger,
      metrics,
    });

    const refreshControl: AutoRefreshControl = {
      getInterval: () => dashboard.refresh || undefined,
      setAutoRefresh: (interval) => this.applyRefresh(interval),
    };

    const state = new TimeRangeState({
      initialRange: dashboard.time,
      refresh: refreshControl,
      events: this.events,
      dateMath: this.dateMath,
      logger,
      metrics,
    });

    this.session = { dashboard, state, scheduler, logger, metrics };

    const params = addressParams ?? this.addressBar?.read();
    if (params) {
      state.setFromUrl(params.from, params.to);
    }

    let resolved: ResolvedRange;
    try {
      resolved = state.getResolved(this.clock());
    } catch (error) {
      logger.error('Could not resolve the initial time range', {
        error: error instanceof Error ? error.message : String(error),
        ...state.getForAddressBar(),
      });
      this.dispose();
      throw error;
    }

    logger.info(`Dashboard session started: ${resolved.from.toISOString()} to ${resolved.to.toISOString()}`, {
      ...state.getForAddressBar(),
      refresh: dashboard.refresh || 'off',
    });

    if (dashboard.refresh) {
      scheduler.setInterval(dashboard.refresh);
    }

    return resolved;
  }

  get isActive(): boolean {
    return this.session !== null;
  }

  subscribe(observer: SessionObserver): () => void {
    return this.events.subscribe(observer);
  }

  /**
   * Resolves the current range against `now` (default: the session clock).
   */
  getResolvedRange(now?: Instant): ResolvedRange {
    return this.requireSession().state.getResolved(now ?? this.clock());
  }

  getRawRange(): TimeRange {
    return this.requireSession().state.getRaw();
  }

  getForAddressBar(): RawTimeRange {
    return this.requireSession().state.getForAddressBar();
  }

  /**
   * Address-bar parameters pinned to the current instant, for sharing a link
   * that shows the same window whenever it is opened.
   */
  getRangeForUrl(now?: Instant): RawTimeRange {
    return encodeForAddress(this.requireSession().state.getRaw(), true, now ?? this.clock(), this.dateMath);
  }

  /**
   * @throws InvalidExpressionError when a raw string boundary cannot be decoded.
   */
  setRange(range: TimeRangeInput, isUserManualSelection: boolean = true): void {
    const next: TimeRange = { from: toBoundary(range.from), to: toBoundary(range.to) };
    this.requireSession().state.setRange(next, isUserManualSelection);
  }

  /**
   * Sets the refresh interval chosen by the user. Any interval remembered
   * while an absolute range paused auto-refresh is discarded.
   *
   * @throws InvalidIntervalError
   */
  setAutoRefresh(interval: RefreshSetting): void {
    const { state } = this.requireSession();
    this.applyRefresh(interval);
    state.forgetRememberedRefresh();
  }

  getRefreshInterval(): string | undefined {
    return this.requireSession().dashboard.refresh || undefined;
  }

  get schedulerState(): SchedulerState {
    return this.requireSession().scheduler.state;
  }

  get pendingTimerCount(): number {
    return this.requireSession().scheduler.pendingTimerCount;
  }

  get nextRefreshAt(): number | null {
    return this.requireSession().scheduler.nextFireAt;
  }

  /**
   * Snapshot of the dashboard record as the session has modified it, for the
   * caller to persist.
   */
  getDashboardSettings(): DashboardSettings {
    const { dashboard } = this.requireSession();
    return { ...dashboard, time: this.getRawRange() };
  }

  /**
   * Requests a refresh right away.
   */
  refreshDashboard(): void {
    this.requireSession();
    this.emitRefresh(REFRESH_REASON_MANUAL);
  }

  /**
   * Cancels every pending timer. The coordinator can be initialized again.
   */
  dispose(): void {
    if (!this.session) {
      return;
    }
    this.session.scheduler.cancelAll();
    this.session.state.dispose();
    this.session.logger.debug('Dashboard session ended');
    this.session = null;
  }

  private applyRefresh(interval: RefreshSetting): void {
    const { dashboard, scheduler, logger } = this.requireSession();
    const normalized = normalizeRefresh(interval);
    scheduler.setInterval(normalized);

    const next = normalized ?? false;
    if (dashboard.refresh !== next) {
      logger.info(normalized ? `Auto-refresh set to ${normalized}` : 'Auto-refresh disabled');
    }
    dashboard.refresh = next;
  }

  private emitRefresh(reason: RefreshReason): void {
    const metrics = this.session?.metrics;
    if (metrics) {
      metrics.range?.refreshRequests.add(1, createAttributes(metrics, { reason }));
    }
    this.events.emitRefreshRequested({ reason });
  }

  private requireSession(): ActiveSession {
    if (!this.session) {
      throw new Error('Dashboard session has not been initialized');
    }
    return this.session;
  }
}
