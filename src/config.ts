import dotenv from 'dotenv';

// Don't override existing environment variables (important for tests)
dotenv.config({ quiet: true, override: false });

export type WeekStart = 'sunday' | 'monday';
export type TimezoneMode = 'utc' | 'local';

export function parseWeekStart(value: string | undefined): WeekStart {
  return value?.toLowerCase() === 'monday' ? 'monday' : 'sunday';
}

export function parseTimezone(value: string | undefined): TimezoneMode {
  return value?.toLowerCase() === 'local' ? 'local' : 'utc';
}

export const timeConfig = {
  weekStart: parseWeekStart(process.env.WEEK_START),
  timezone: parseTimezone(process.env.DASHBOARD_TIMEZONE),
  defaultFrom: process.env.DEFAULT_TIME_FROM || 'now-6h',
  defaultTo: process.env.DEFAULT_TIME_TO || 'now',
};

export const otelConfig = {
  enabled: process.env.OTEL_LOGGING_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'dashboard-timekeeper',
  endpoint: process.env.OTEL_EXPORTER_OTLP_LOGS_ENDPOINT || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318',
  headers: process.env.OTEL_EXPORTER_OTLP_HEADERS || '',
  metricsEnabled: process.env.OTEL_METRICS_ENABLED === 'true' || (process.env.OTEL_METRICS_ENABLED === undefined && process.env.OTEL_LOGGING_ENABLED === 'true'),
  metricsEndpoint: process.env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318',
  metricExportIntervalMs: parseInt(process.env.OTEL_METRIC_EXPORT_INTERVAL_MILLIS || '60000', 10),
};
