/**
 * Structured JSON console logger. Level threshold from LOG_LEVEL (trace adds full payloads).
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = value?.toLowerCase();
  if (v === 'trace' || v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return 'info';
}

export function createConsoleLogger(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_RANK[level];

  function write(lvl: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[lvl] < threshold) return;
    const line = JSON.stringify({ level: lvl.toUpperCase(), message, ...fields });
    switch (lvl) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      default:
        console.debug(line);
    }
  }

  return {
    trace: (message, fields) => write('trace', message, fields),
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}
