/**
 * Structured Logger
 * Single-line JSON log entries on the console, filtered by LOG_LEVEL.
 *
 * @module logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  from?: string;
  messageId?: string;
  commandType?: string;
  error?: unknown;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// ============================================================================
// Threshold
// ============================================================================

function thresholdFromEnv(): LogThreshold {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  return configured && isLogThreshold(configured) ? configured : 'info';
}

let threshold: LogThreshold = thresholdFromEnv();

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

// ============================================================================
// Logging
// ============================================================================

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

/**
 * Structured logger for bot events
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const logEntry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };

  if (context?.error !== undefined) {
    logEntry.error = serializeError(context.error);
  }

  const logString = JSON.stringify(logEntry);

  switch (level) {
    case 'debug':
      console.debug(logString);
      break;
    case 'info':
      console.info(logString);
      break;
    case 'warn':
      console.warn(logString);
      break;
    case 'error':
      console.error(logString);
      break;
  }
}

/** Mask credentials in a connection URL before logging it */
export function maskUrlCredentials(url: string): string {
  return url.replace(/\/\/.*@/, '//*****@');
}
