// Scoped structured logger. Writes to stderr so stdout stays free for
// CLI output and the MCP stdio transport.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function resolveLevel(): LogLevel {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return env && isLogLevel(env) ? env : 'info';
}

export function createLogger(scope: string, level: LogLevel = resolveLevel()): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (lvl: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const prefix = `[${scope}:${lvl.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
