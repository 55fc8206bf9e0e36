import { PIPELINE_ERROR_CODES, PipelineError } from '../errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Represents a single formatted log line
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Receives every log entry that passes the level filter
 */
export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Defaults to stdout for debug/info and stderr for warn/error. */
  sink?: LogSink;
}

export const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LOG_LEVEL_RANK, value);

export const parseLogLevel = (value: string): LogLevel => {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new PipelineError(
      PIPELINE_ERROR_CODES.CONFIGURATION_ERROR,
      `Unsupported log level '${value}', expected one of: ${Object.keys(LOG_LEVEL_RANK).join('|')}`
    );
  }
  return normalized;
};

export const formatLogEntry = (entry: LogEntry): string => `[${entry.level}] ${entry.message}`;

type Write = (text: string) => void;

/** Formatted lines: debug and info to `writeOut`, warn and error to `writeErr`. */
export const createStreamSink = (writeOut: Write, writeErr: Write): LogSink => entry => {
  const line = `${formatLogEntry(entry)}\n`;
  if (entry.level === 'warn' || entry.level === 'error') {
    writeErr(line);
  } else {
    writeOut(line);
  }
};

const consoleSink = createStreamSink(
  text => {
    process.stdout.write(text);
  },
  text => {
    process.stderr.write(text);
  }
);

/**
 * Creates a level-filtered logger.
 * @param options - Minimum level and output sink
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => {
  const level = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;
  const threshold = LOG_LEVEL_RANK[level];

  const emit = (entryLevel: LogLevel, message: string) => {
    if (LOG_LEVEL_RANK[entryLevel] < threshold) return;
    sink({ level: entryLevel, message });
  };

  return {
    level,
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  };
};

export const silentLogger: Logger = createConsoleLogger({ level: 'error', sink: () => { } });
