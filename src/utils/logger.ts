// src/utils/logger.ts
import { getLoggerProvider } from './otel_provider';
import { SeverityNumber } from '@opentelemetry/api-logs';
import { ATTR_DASHBOARD_UID, ATTR_DASHBOARD_TITLE } from './constants';

enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

const LOG_LEVEL_TO_SEVERITY: Record<LogLevel, SeverityNumber> = {
  [LogLevel.DEBUG]: SeverityNumber.DEBUG,
  [LogLevel.INFO]: SeverityNumber.INFO,
  [LogLevel.WARN]: SeverityNumber.WARN,
  [LogLevel.ERROR]: SeverityNumber.ERROR,
};

/**
 * Identifies the dashboard a session is viewing.
 */
export interface DashboardContext {
  uid: string;
  title?: string;
}

type AttributeValue = string | number | boolean;

/**
 * Flattens log metadata into OTel attributes. Errors become their message,
 * other non-primitive values are JSON-encoded.
 */
function toAttributes(metadata: object): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined || value === null) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attributes[key] = value;
    } else if (value instanceof Error) {
      attributes[key] = value.message;
    } else {
      attributes[key] = JSON.stringify(value);
    }
  }
  return attributes;
}

/**
 * Writes one log entry to the console (unless NODE_ENV=test) and, when enabled,
 * to the OpenTelemetry collector with the dashboard context attached.
 */
function log(level: LogLevel, message: string, metadata: object = {}, context?: DashboardContext) {
  if (process.env.NODE_ENV !== 'test' || process.env.FORCE_LOGGING === 'true') {
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] [${level}] ${message}`);
  }

  const loggerProvider = getLoggerProvider();
  if (loggerProvider) {
    const attributes = toAttributes(metadata);

    if (context) {
      attributes[ATTR_DASHBOARD_UID] = context.uid;
      if (context.title) {
        attributes[ATTR_DASHBOARD_TITLE] = context.title;
      }
    }

    loggerProvider.getLogger('default').emit({
      severityNumber: LOG_LEVEL_TO_SEVERITY[level],
      severityText: level,
      body: message,
      attributes,
    });
  }
}

/**
 * Creates a logger, optionally bound to a dashboard.
 *
 * @example
 * const sessionLogger = createLogger({ uid: 'ops-overview', title: 'Ops overview' });
 * sessionLogger.info('Auto-refresh armed', { interval: '30s' });
 */
export function createLogger(context?: DashboardContext) {
  return {
    info: (message: string, metadata?: object) => log(LogLevel.INFO, message, metadata, context),
    warn: (message: string, metadata?: object) => log(LogLevel.WARN, message, metadata, context),
    error: (message: string, metadata?: object) => log(LogLevel.ERROR, message, metadata, context),
    debug: (message: string, metadata?: object) => log(LogLevel.DEBUG, message, metadata, context),
  };
}

export type Logger = ReturnType<typeof createLogger>;

export const logger = createLogger();
