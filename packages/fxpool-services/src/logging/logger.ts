/**
 * Service Logger
 *
 * Structured JSON logging with pino. Every service gets a child logger bound
 * to its name; method entry/exit/error records share one shape.
 *
 * Level comes from LOG_LEVEL (default 'info', 'silent' under NODE_ENV=test).
 * For pretty output in development, pipe to pino-pretty:
 *   npm start | npx pino-pretty
 */

import pino from 'pino';

export type ServiceLogger = pino.Logger;

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger: ServiceLogger = pino({
  name: 'fxpool-engine',
  level: defaultLevel(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger for a service
 */
export function createServiceLogger(service: string): ServiceLogger {
  return logger.child({ service });
}

/**
 * Logging helpers for consistent method entry/exit logging
 */
export const log = {
  methodEntry: (
    log: ServiceLogger,
    method: string,
    params?: Record<string, unknown>
  ) => {
    log.debug({ method, ...params }, `→ ${method}`);
  },

  methodExit: (
    log: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    log.debug({ method, ...result }, `← ${method}`);
  },

  methodError: (
    log: ServiceLogger,
    method: string,
    error: unknown,
    context?: Record<string, unknown>
  ) => {
    log.error(
      {
        method,
        error: error instanceof Error ? error.message : error,
        code: error instanceof Error && 'code' in error ? error.code : undefined,
        ...context,
      },
      `✗ ${method}`
    );
  },
};
