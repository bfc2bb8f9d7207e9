// src/utils/otel_provider.ts
import { LoggerProvider, BatchLogRecordProcessor } from '@opentelemetry/sdk-logs';
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import { MeterProvider, PeriodicExportingMetricReader, AggregationTemporality } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { otelConfig } from '../config';
import { ATTR_DEPLOYMENT_ENVIRONMENT } from './constants';
import path from 'path';
import fs from 'fs';

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  debug: DiagLogLevel.DEBUG,
  info: DiagLogLevel.INFO,
  warn: DiagLogLevel.WARN,
  error: DiagLogLevel.ERROR,
};

// OTEL_LOG_LEVEL turns on the SDK's own diagnostic output
const diagLevel = DIAG_LEVELS[process.env.OTEL_LOG_LEVEL ?? ''] ?? DiagLogLevel.NONE;
if (diagLevel !== DiagLogLevel.NONE) {
  diag.setLogger(new DiagConsoleLogger(), diagLevel);
}

let loggerProvider: LoggerProvider | null = null;
let meterProvider: MeterProvider | null = null;

function getServiceVersion(): string {
  try {
    const packageJsonPath = path.join(process.cwd(), 'package.json');
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string' &&
        packageJson.version
      ) {
        return packageJson.version;
      }
    }
  } catch (error) {
    console.error('Could not get service version', error);
  }
  return '1.0.0';
}

/**
 * Splits a comma-separated `key=value` list. Only the first `=` of each entry
 * separates key from value; entries with an empty key or value are dropped.
 */
function parseKeyValueList(input: string): Record<string, string> {
  const result: Record<string, string> = {};
  if (!input) return result;

  for (const entry of input.split(',')) {
    const separator = entry.indexOf('=');
    if (separator === -1) continue;

    const key = entry.substring(0, separator).trim();
    const value = entry.substring(separator + 1).trim();
    if (key && value) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Parses OTEL_EXPORTER_OTLP_HEADERS into a headers object.
 *
 * @example
 * parseHeaders("Authorization=ApiKey test-secret==,x-team=dashboards")
 * // Returns: { Authorization: "ApiKey test-secret==", "x-team": "dashboards" }
 */
export function parseHeaders(headersString: string): Record<string, string> {
  return parseKeyValueList(headersString);
}

/**
 * Builds the resource shared by the log and metric pipelines.
 *
 * Precedence, lowest first: service defaults, SDK defaults, OTEL_RESOURCE_ATTRIBUTES.
 */
function buildServiceResource(): Resource {
  const defaults: Record<string, string> = {
    [ATTR_SERVICE_NAME]: otelConfig.serviceName,
    [ATTR_SERVICE_VERSION]: getServiceVersion(),
  };

  const resourceAttributes = process.env.OTEL_RESOURCE_ATTRIBUTES ?? '';
  if (!resourceAttributes.includes(ATTR_DEPLOYMENT_ENVIRONMENT)) {
    defaults[ATTR_DEPLOYMENT_ENVIRONMENT] = process.env.NODE_ENV || 'production';
  }

  return new Resource(defaults)
    .merge(Resource.default())
    .merge(new Resource(parseKeyValueList(resourceAttributes)));
}

function withSignalPath(endpoint: string, signalPath: string): string {
  return endpoint.endsWith(signalPath) ? endpoint : `${endpoint}${signalPath}`;
}

/**
 * Returns the process-wide LoggerProvider, creating it on first use.
 *
 * @returns The provider, or null when OTEL_LOGGING_ENABLED is not `true`.
 */
export function getLoggerProvider(): LoggerProvider | null {
  if (!otelConfig.enabled) {
    return null;
  }

  if (!loggerProvider) {
    const exporter = new OTLPLogExporter({
      url: withSignalPath(otelConfig.endpoint, '/v1/logs'),
      headers: parseHeaders(otelConfig.headers),
    });

    loggerProvider = new LoggerProvider({ resource: buildServiceResource() });
    loggerProvider.addLogRecordProcessor(new BatchLogRecordProcessor(exporter));
  }

  return loggerProvider;
}

/**
 * Returns the process-wide MeterProvider, creating it on first use.
 *
 * @returns The provider, or null when metrics are disabled.
 */
export function getMeterProvider(): MeterProvider | null {
  if (!otelConfig.metricsEnabled) {
    return null;
  }

  if (!meterProvider) {
    const exporter = new OTLPMetricExporter({
      url: withSignalPath(otelConfig.metricsEndpoint, '/v1/metrics'),
      headers: parseHeaders(otelConfig.headers),
      temporalityPreference: AggregationTemporality.DELTA,
    });

    meterProvider = new MeterProvider({
      resource: buildServiceResource(),
      readers: [
        new PeriodicExportingMetricReader({
          exporter,
          exportIntervalMillis: otelConfig.metricExportIntervalMs,
        }),
      ],
    });
  }

  return meterProvider;
}

/**
 * Flushes and shuts down both providers.
 *
 * Called when the CLI exits or receives SIGTERM/SIGINT.
 */
export async function shutdown(): Promise<void> {
  const pending: Promise<void>[] = [];

  if (loggerProvider) {
    pending.push(loggerProvider.shutdown());
    loggerProvider = null;
  }

  if (meterProvider) {
    pending.push(meterProvider.shutdown());
    meterProvider = null;
  }

  await Promise.all(pending);
}
