import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Where formatted lines go. stdout is the protocol channel, so the default is stderr. */
export type LogSink = (line: string) => void;

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  /** Logger sharing level and sink, with `scope` appended (`session:transport`). */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? 'info';
  const sink = opts.sink ?? stderrSink;

  const shouldLog = (l: Exclude<LogLevel, 'silent'>): boolean => levels[l] >= levels[level];

  const emit = (
    l: Exclude<LogLevel, 'silent'>,
    paint: (text: string) => string,
    msg: string,
    args: unknown[],
  ): void => {
    if (!shouldLog(l)) return;
    const tail = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    sink(paint(`[${l.toUpperCase()}] [${scope}] ${msg}`) + tail);
  };

  return {
    scope,
    level,
    debug: (msg, ...args) => emit('debug', chalk.gray, msg, args),
    info: (msg, ...args) => emit('info', chalk.blue, msg, args),
    warn: (msg, ...args) => emit('warn', chalk.yellow, msg, args),
    error: (msg, ...args) => emit('error', chalk.red, msg, args),
    child: (sub) => createLogger(`${scope}:${sub}`, { level, sink }),
  };
}

/** Drops everything. Default for components constructed without a logger. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent', sink: () => {} });

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(levels, value);
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
