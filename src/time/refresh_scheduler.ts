import { logger as defaultLogger, Logger } from '../utils/logger';
import { createAttributes, createMetrics, Metrics } from '../utils/metrics';
import { SCHEDULER_STATE_ARMED, SCHEDULER_STATE_IDLE } from '../utils/constants';
import { setLongTimeout, LongTimeout } from '../utils/timers';
import { intervalToMs, normalizeRefresh, RefreshSetting } from './interval';

export type SchedulerState = typeof SCHEDULER_STATE_IDLE | typeof SCHEDULER_STATE_ARMED;

export type RefreshCallback = () => void | Promise<void>;

export interface RefreshSchedulerOptions {
  onRefresh: RefreshCallback;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Self-rescheduling auto-refresh timer.
 *
 * At most one timer is pending at any time. Each fire arms the next timer
 * before invoking `onRefresh`, so a slow refresh never delays the schedule;
 * refreshes may overlap, timers never do.
 */
export class RefreshScheduler {
  private readonly onRefresh: RefreshCallback;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private handle: LongTimeout | null = null;
  private currentInterval: string | undefined;
  private currentIntervalMs = 0;

  constructor(options: RefreshSchedulerOptions) {
    this.onRefresh = options.onRefresh;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? createMetrics();
  }

  get state(): SchedulerState {
    return this.handle ? SCHEDULER_STATE_ARMED : SCHEDULER_STATE_IDLE;
  }

  get interval(): string | undefined {
    return this.currentInterval;
  }

  get intervalMs(): number {
    return this.currentIntervalMs;
  }

  /**
   * Epoch milliseconds at which the pending timer fires, or null when idle.
   */
  get nextFireAt(): number | null {
    return this.handle ? this.handle.dueAt : null;
  }

  get pendingTimerCount(): number {
    return this.handle ? 1 : 0;
  }

  /**
   * Arms the scheduler for `interval`, replacing any pending timer. An empty,
   * zero or absent interval moves to idle.
   *
   * @throws InvalidIntervalError, leaving the current schedule untouched.
   */
  setInterval(interval?: RefreshSetting): void {
    const normalized = normalizeRefresh(interval);
    if (!normalized) {
      this.cancelAll();
      return;
    }

    const intervalMs = intervalToMs(normalized);
    this.cancelPending();
    this.currentInterval = normalized;
    this.currentIntervalMs = intervalMs;
    this.arm();

    this.metrics.scheduler?.arms.add(1, createAttributes(this.metrics, { interval: normalized }));
    this.logger.debug(`Auto-refresh armed every ${normalized}`, { intervalMs });
  }

  /**
   * Moves to idle. Safe to call at any time.
   */
  cancelAll(): void {
    const wasArmed = this.cancelPending();
    this.currentInterval = undefined;
    this.currentIntervalMs = 0;
    if (wasArmed) {
      this.logger.debug('Auto-refresh cancelled');
    }
  }

  private arm(): void {
    this.handle = setLongTimeout(() => this.fire(), this.currentIntervalMs);
  }

  private fire(): void {
    this.handle = null;

    // Re-arm first: the next tick must not wait on this refresh
    this.arm();

    this.metrics.scheduler?.ticks.add(1, createAttributes(this.metrics, { interval: this.currentInterval ?? '' }));
    try {
      const result = this.onRefresh();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportFailure(error));
      }
    } catch (error) {
      this.reportFailure(error);
    }
  }

  private cancelPending(): boolean {
    if (!this.handle) {
      return false;
    }
    this.handle.cancel();
    this.handle = null;
    this.metrics.scheduler?.cancels.add(1, createAttributes(this.metrics));
    return true;
  }

  private reportFailure(error: unknown): void {
    this.metrics.scheduler?.tickFailures.add(1, createAttributes(this.metrics));
    this.logger.error('Scheduled refresh failed', {
      interval: this.currentInterval,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
