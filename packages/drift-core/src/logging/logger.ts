/**
 * Structured logging.
 *
 * Emits one JSON line per entry: `{ ts, level, msg, ...fields }`.
 * The default sink writes to stdout, so any aggregator that reads JSON
 * lines can pick the entries up.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  msg: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** Fields merged into every entry. */
  bindings?: LogFields;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Infinity,
};

export const stdoutSink: LogSink = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? 'info'];
  const sink = options.sink ?? stdoutSink;
  const bindings = options.bindings ?? {};

  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (SEVERITY[level] < threshold) return;
    sink({ ...bindings, ...fields, ts: new Date().toISOString(), level, msg });
  };

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}
