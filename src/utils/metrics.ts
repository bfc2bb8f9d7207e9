// src/utils/metrics.ts
import { getMeterProvider } from './otel_provider';
import { Meter, Counter } from '@opentelemetry/api';
import { ATTR_DASHBOARD_UID, ATTR_DASHBOARD_TITLE } from './constants';
import type { DashboardContext } from './logger';

/**
 * Metric instruments for the refresh scheduler.
 */
export interface SchedulerMetrics {
  ticks: Counter;
  tickFailures: Counter;
  arms: Counter;
  cancels: Counter;
}

/**
 * Metric instruments for time range changes.
 */
export interface RangeMetrics {
  changes: Counter;
  urlDecodeFailures: Counter;
  refreshRequests: Counter;
}

export interface Metrics {
  meter: Meter | null;
  scheduler: SchedulerMetrics | null;
  range: RangeMetrics | null;
  context?: DashboardContext;
}

/**
 * Creates the session's metric instruments.
 *
 * When OpenTelemetry metrics are disabled every instrument group is null, so
 * callers record through optional chaining: `metrics.scheduler?.ticks.add(1)`.
 */
export function createMetrics(context?: DashboardContext): Metrics {
  const meterProvider = getMeterProvider();

  if (!meterProvider) {
    return { meter: null, scheduler: null, range: null, context };
  }

  const meter = meterProvider.getMeter('dashboard-timekeeper');

  const scheduler: SchedulerMetrics = {
    ticks: meter.createCounter('scheduler.ticks', {
      description: 'Auto-refresh timer fires',
      unit: 'ticks',
    }),
    tickFailures: meter.createCounter('scheduler.tick.failures', {
      description: 'Refresh callbacks that threw or rejected',
      unit: 'ticks',
    }),
    arms: meter.createCounter('scheduler.arms', {
      description: 'Times the scheduler moved to the armed state with a new interval',
      unit: 'transitions',
    }),
    cancels: meter.createCounter('scheduler.cancels', {
      description: 'Pending timers cancelled before firing',
      unit: 'timers',
    }),
  };

  const range: RangeMetrics = {
    changes: meter.createCounter('range.changes', {
      description: 'Time range replacements',
      unit: 'changes',
    }),
    urlDecodeFailures: meter.createCounter('range.url_decode_failures', {
      description: 'Address-bar parameters that could not be decoded',
      unit: 'parameters',
    }),
    refreshRequests: meter.createCounter('refresh.requests', {
      description: 'Refresh signals delivered to observers',
      unit: 'requests',
    }),
  };

  return { meter, scheduler, range, context };
}

/**
 * Merges the session's dashboard context into metric attributes.
 */
export function createAttributes(
  metrics: Metrics,
  attributes: Record<string, string | number> = {}
): Record<string, string | number> {
  const result: Record<string, string | number> = { ...attributes };

  if (metrics.context) {
    result[ATTR_DASHBOARD_UID] = metrics.context.uid;
    if (metrics.context.title) {
      result[ATTR_DASHBOARD_TITLE] = metrics.context.title;
    }
  }

  return result;
}
