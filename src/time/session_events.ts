import { logger as defaultLogger, Logger } from '../utils/logger';
import { EVENT_REFRESH_REQUESTED, EVENT_TIME_RANGE_CHANGED } from '../utils/constants';
import type { RawTimeRange, TimeRange } from './types';

export type RefreshReason = 'range-changed' | 'interval' | 'manual';

export interface TimeRangeChangedEvent {
  range: TimeRange;
  raw: RawTimeRange;
  manual: boolean;
}

export interface RefreshRequestedEvent {
  reason: RefreshReason;
}

/**
 * Receives session notifications. Both callbacks are optional; a refresh
 * handler may return a promise, which is not awaited.
 */
export interface SessionObserver {
  onTimeRangeChanged?(event: TimeRangeChangedEvent): void;
  onRefreshRequested?(event: RefreshRequestedEvent): void | Promise<void>;
}

/**
 * Synchronous fan-out to the session's observers. A failing observer is
 * logged and does not prevent delivery to the others.
 */
export class SessionEvents {
  private observers = new Set<SessionObserver>();

  constructor(private readonly logger: Logger = defaultLogger) {}

  subscribe(observer: SessionObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  get observerCount(): number {
    return this.observers.size;
  }

  emitTimeRangeChanged(event: TimeRangeChangedEvent): void {
    for (const observer of [...this.observers]) {
      if (observer.onTimeRangeChanged) {
        const handler = observer.onTimeRangeChanged.bind(observer);
        this.deliver(EVENT_TIME_RANGE_CHANGED, () => handler(event));
      }
    }
  }

  emitRefreshRequested(event: RefreshRequestedEvent): void {
    for (const observer of [...this.observers]) {
      if (observer.onRefreshRequested) {
        const handler = observer.onRefreshRequested.bind(observer);
        this.deliver(EVENT_REFRESH_REQUESTED, () => handler(event));
      }
    }
  }

  private deliver(eventName: string, invoke: () => void | Promise<void>): void {
    try {
      const result = invoke();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportFailure(eventName, error));
      }
    } catch (error) {
      this.reportFailure(eventName, error);
    }
  }

  private reportFailure(eventName: string, error: unknown): void {
    this.logger.error(`Observer failed while handling ${eventName}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
