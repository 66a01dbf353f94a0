/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation and session ids from the
 * AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    sessionId: reqContext?.sessionId,
    documentId: reqContext?.documentId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function isSilenced(): boolean {
  return process.env.LOG_LEVEL === 'silent';
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (isSilenced()) return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (isSilenced()) return;
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (isSilenced()) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (isSilenced()) return;
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
