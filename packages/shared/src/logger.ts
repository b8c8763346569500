/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation and run IDs from the
 * AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function thresholdRank(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  switch (configured) {
    case 'silent':
      return Number.POSITIVE_INFINITY;
    case 'error':
      return LEVEL_RANK.ERROR;
    case 'warn':
      return LEVEL_RANK.WARN;
    case 'info':
      return LEVEL_RANK.INFO;
    case 'debug':
      return LEVEL_RANK.DEBUG;
    default:
      return process.env.NODE_ENV === 'production' ? LEVEL_RANK.INFO : LEVEL_RANK.DEBUG;
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= thresholdRank();
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    runId: reqContext?.runId,
    documentId: reqContext?.documentId,
    declaredCategory: reqContext?.declaredCategory,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function serializeError(error: unknown): { message: string; name?: string; stack?: string } | string {
  return error instanceof Error
    ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      }
    : String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (shouldLog('INFO')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (shouldLog('WARN')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!shouldLog('ERROR')) return;
    console.error(formatLog('ERROR', message, { ...context, error: serializeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (shouldLog('DEBUG')) console.debug(formatLog('DEBUG', message, context));
  },
};
