// Leveled logger on top of console. Everything goes to stderr: stdout belongs
// to the MCP stdio transport when running as a server.
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  function log(l: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
    if (LEVEL_ORDER[l] >= threshold) {
      console.error(`[${l}]`, ...args);
    }
  }
  return {
    debug: (...a: unknown[]) => log('debug', a),
    info: (...a: unknown[]) => log('info', a),
    warn: (...a: unknown[]) => log('warn', a),
    error: (...a: unknown[]) => log('error', a),
  };
}
