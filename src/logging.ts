/**
 * Console log-level gate. Components log through console with a bracketed
 * tag (`[SimControl]`, `[Session]`, ...); levels below the configured one are
 * silenced for the life of the process.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const silent = (): void => { };

export function applyLogLevel(level: LogLevel, target: Console = console): void {
  const threshold = LEVEL_ORDER[level];

  if (threshold > LEVEL_ORDER.debug) {
    target.debug = silent;
  }
  if (threshold > LEVEL_ORDER.info) {
    target.log = silent;
    target.info = silent;
  }
  if (threshold > LEVEL_ORDER.warn) {
    target.warn = silent;
  }
}
