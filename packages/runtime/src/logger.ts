// Logging for trails
//
// Loggers are injected. Nothing is written anywhere unless the caller
// passes one in; `createConsoleLogger` is the stock choice.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export type TrailLogger = Record<LogLevel, (message: string, data?: LogData) => void>;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function buildLogger(write: (level: LogLevel, message: string, data?: LogData) => void): TrailLogger {
  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export type ConsoleLoggerOptions = {
  /**
   * Entries below this level are dropped (default: 'info')
   */
  level?: LogLevel;

  prefix?: string;

  /**
   * Defaults to the global console
   */
  output?: Pick<Console, LogLevel>;
};

/**
 * Writes `[prefix] LEVEL message` lines, with the entry data as a second
 * argument when there is any.
 *
 * Usage:
 * ```ts
 * const trail = createTrail({ repos, logger: createConsoleLogger({ level: 'debug' }) });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): TrailLogger {
  const { level = 'info', prefix = 'trailkeep', output = console } = options;

  return buildLogger((entryLevel, message, data) => {
    if (LEVEL_RANK[entryLevel] < LEVEL_RANK[level]) return;
    const line = `[${prefix}] ${entryLevel.toUpperCase()} ${message}`;
    if (data === undefined) {
      output[entryLevel](line);
    } else {
      output[entryLevel](line, data);
    }
  });
}

/**
 * Logger that adds `context` to the data of every entry. Keys the entry
 * sets itself win.
 */
export function withLogContext(logger: TrailLogger, context: LogData): TrailLogger {
  return buildLogger((level, message, data) => logger[level](message, { ...context, ...data }));
}

/**
 * The default when no logger is configured
 */
export const silentLogger: TrailLogger = buildLogger(() => {});

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
};

/**
 * Logger that keeps its entries for inspection
 */
export function createCapturingLogger(): TrailLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = buildLogger((level, message, data) => {
    entries.push(data === undefined ? { level, message } : { level, message, data });
  });
  return { ...logger, entries };
}
