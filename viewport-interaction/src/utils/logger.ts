import type { LogLevel, Logger } from '../types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

// createConsoleLogger writes to the console, dropping messages below the given level.
export const createConsoleLogger = (level: LogLevel = 'warn'): Logger => {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];
  return {
    debug: (message, meta) => {
      if (enabled('debug')) console.debug(message, meta ?? {});
    },
    info: (message, meta) => {
      if (enabled('info')) console.info(message, meta ?? {});
    },
    warn: (message, meta) => {
      if (enabled('warn')) console.warn(message, meta ?? {});
    },
    error: (message, meta) => {
      if (enabled('error')) console.error(message, meta ?? {});
    }
  };
};

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

// createScopedLogger prefixes every message with [scope].
export const createScopedLogger = (logger: Logger, scope: string): Logger => ({
  debug: (message, meta) => logger.debug(`[${scope}] ${message}`, meta),
  info: (message, meta) => logger.info(`[${scope}] ${message}`, meta),
  warn: (message, meta) => logger.warn(`[${scope}] ${message}`, meta),
  error: (message, meta) => logger.error(`[${scope}] ${message}`, meta)
});
