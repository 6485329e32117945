/**
 * Scoped console logging.
 *
 * Lines are written as `Scope: message`, so `EventDispatcher: queue full`
 * reads the same as the hand-written console warnings elsewhere in the engine.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Minimum level accepted by a logger; `silent` drops everything. */
export type LogThreshold = LogLevel | 'silent';

export const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogContext = Record<string, unknown>;

export interface LogRecord {
  readonly level: LogLevel;
  readonly scope: string;
  readonly message: string;
  readonly context?: LogContext;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  readonly scope: string;
  /** Current threshold, shared with every child of the same root. */
  readonly level: LogThreshold;
  setLevel(level: LogThreshold): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-component; scope becomes `parent/child`, level stays shared. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Default: 'info'. */
  level?: LogThreshold;
  /** Default: console. */
  sink?: LogSink;
}

export function isLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.some((threshold) => threshold === value);
}

export const consoleSink: LogSink = (record) => {
  const line = `${record.scope}: ${record.message}`;
  const args: unknown[] = record.context ? [line, record.context] : [line];
  switch (record.level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
};

interface LevelCell {
  threshold: LogThreshold;
}

function buildLogger(scope: string, cell: LevelCell, sink: LogSink): Logger {
  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[cell.threshold]) {
      return;
    }
    sink(context ? { level, scope, message, context } : { level, scope, message });
  };

  return {
    scope,
    get level() {
      return cell.threshold;
    },
    setLevel: (level) => {
      cell.threshold = level;
    },
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (childScope) => buildLogger(`${scope}/${childScope}`, cell, sink),
  };
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return buildLogger(scope, { threshold: options.level ?? 'info' }, options.sink ?? consoleSink);
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

export interface MemorySink {
  readonly sink: LogSink;
  readonly records: LogRecord[];
  /** Messages at the given level, in order. */
  messages(level?: LogLevel): string[];
  clear(): void;
}

/** Captures records in memory, for tests and in-game consoles. */
export function createMemorySink(): MemorySink {
  const records: LogRecord[] = [];
  return {
    sink: (record) => {
      records.push(record);
    },
    records,
    messages: (level) =>
      records.filter((record) => level === undefined || record.level === level).map((record) => record.message),
    clear: () => {
      records.length = 0;
    },
  };
}
