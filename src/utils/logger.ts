/**
 * Structured JSON logger
 *
 * Log format:
 * { timestamp, level, event, ... }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  database?: string;
  file?: string;
  method?: string;
  path?: string;
  status?: number;
  latency_ms?: number;
  error?: string;
  [key: string]: unknown;
}

export type LogFields = Omit<LogEntry, 'timestamp' | 'level'>;

export interface Logger {
  debug(entry: LogFields): void;
  info(entry: LogFields): void;
  warn(entry: LogFields): void;
  error(entry: LogFields): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a structured JSON logger
 * @param output Write function (default: console.log)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = console.log,
  minLevel: LogLevel = 'info'
): Logger {
  const log = (level: LogLevel, entry: LogFields) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;

    const fullEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    };

    output(JSON.stringify(fullEntry));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger(() => {}, 'error');
