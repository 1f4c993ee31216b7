export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger that prefixes every line with its scope, e.g.
 * `[Battle:GateSpawnScheduler] gate 1 summoned Standard Enemy at (2, 0)`.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= LEVEL_ORDER[level];
  const prefix = `[${scope}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    },
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
