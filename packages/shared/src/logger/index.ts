/**
 * Structured logging for scrapelink
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  relationId?: number;
  relationName?: string;
  app?: string;
  unit?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'scrapelink',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

/**
 * Log a fragment that was skipped for one peer while the others proceed.
 */
export function logFragmentSkipped(
  logger: pino.Logger,
  reason: string,
  context: LogContext & { error?: unknown }
): void {
  const { error, ...rest } = context;
  logger.warn(
    {
      event: 'fragment_skipped',
      ...rest,
      error: error instanceof Error ? error.message : error,
    },
    `Skipping fragment: ${reason}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
