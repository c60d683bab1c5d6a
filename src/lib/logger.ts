/**
 * Logger factory
 *
 * pino writing JSON lines to stderr so stdout stays reserved for reports.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
  /** Override the stderr destination (tests capture output this way) */
  destination?: DestinationStream;
}

const DEFAULT_LOGGER_NAME = 'image-ref-scanner';

function resolveLevel(level?: string): string {
  if (level) {
    return level;
  }
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Create a pino logger.
 *
 * Level resolution: explicit option, then `LOG_LEVEL`, then `silent` under
 * `NODE_ENV=test`, then `info`.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: options.name ?? DEFAULT_LOGGER_NAME,
    level: resolveLevel(options.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ['*.password', '*.token', '*.auth', '*.credentials'],
      censor: '[REDACTED]',
    },
  };

  return pino(loggerOptions, options.destination ?? pino.destination(2));
}

export interface Timer {
  end(additionalContext?: Record<string, unknown>): void;
  error(error: unknown, additionalContext?: Record<string, unknown>): void;
  /** Log elapsed time so far and return it in milliseconds */
  checkpoint(label: string, additionalContext?: Record<string, unknown>): number;
}

export function createTimer(
  logger: Logger,
  operation: string,
  initialContext: Record<string, unknown> = {},
): Timer {
  const start = Date.now();

  return {
    end(additionalContext = {}) {
      logger.debug(
        { ...initialContext, ...additionalContext, operation, durationMs: Date.now() - start },
        `${operation} completed`,
      );
    },

    error(error, additionalContext = {}) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(
        {
          ...initialContext,
          ...additionalContext,
          operation,
          durationMs: Date.now() - start,
          error: message,
        },
        `${operation} failed`,
      );
    },

    checkpoint(label, additionalContext = {}) {
      const elapsed = Date.now() - start;
      logger.debug(
        { ...initialContext, ...additionalContext, operation, checkpoint: label, elapsedMs: elapsed },
        `${operation} checkpoint: ${label}`,
      );
      return elapsed;
    },
  };
}
