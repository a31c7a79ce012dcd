export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger for CLI use. Everything goes to stderr so that stdout
 * carries only the report.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (at: LogLevel) => RANK[at] >= RANK[level];
  const stamp = () => new Date().toISOString().replace('T', ' ').slice(0, 19);

  return {
    debug(message) {
      if (enabled('debug')) console.error(`${stamp()} DEBUG ${message}`);
    },
    info(message) {
      if (enabled('info')) console.error(`${stamp()} INFO ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${stamp()} WARN ${message}`);
    },
    error(message) {
      if (enabled('error')) console.error(`${stamp()} ERROR ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
