/**
 * Component logger for pipeline runs.
 *
 * Environment:
 *   MSGSPEC_LOG_LEVEL = debug|info|warn|error (default: info)
 *   MSGSPEC_LOG_JSON  = 1 (JSON lines instead of text)
 *   MSGSPEC_DEBUG     = 1|true (forces debug)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(component: string): Logger;
}

/** Receives finished lines; warnings and errors are flagged for stderr. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly sink?: LogSink;
  readonly now?: () => Date;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = { debug: 0, info: 1, warn: 2, error: 3 };

interface ResolvedLoggerSettings {
  readonly minLevel: number;
  readonly json: boolean;
  readonly sink: LogSink;
  readonly now: () => Date;
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  return createComponentLogger(component, resolveSettings(options));
}

/** Drops everything; the default when a caller injects no logger. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  return normalized === 'debug' || normalized === 'warn' || normalized === 'error' ? normalized : 'info';
}

function resolveSettings(options: LoggerOptions): ResolvedLoggerSettings {
  const env = options.env ?? process.env;
  const debugOverride = env.MSGSPEC_DEBUG === '1' || env.MSGSPEC_DEBUG === 'true';
  return {
    minLevel: debugOverride ? LEVEL_ORDER.debug : LEVEL_ORDER[parseLogLevel(env.MSGSPEC_LOG_LEVEL)],
    json: env.MSGSPEC_LOG_JSON === '1',
    sink: options.sink ?? writeToProcess,
    now: options.now ?? (() => new Date()),
  };
}

function createComponentLogger(component: string, settings: ResolvedLoggerSettings): Logger {
  const emit = (level: LogLevel, message: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < settings.minLevel) {
      return;
    }
    const ts = settings.now().toISOString();
    if (settings.json) {
      settings.sink(level, JSON.stringify({ ts, level, component, msg: message, ...(data === undefined ? {} : { data }) }));
      return;
    }
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    settings.sink(level, data === undefined ? `${prefix} ${message}` : `${prefix} ${message} ${JSON.stringify(data)}`);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (sub) => createComponentLogger(`${component}:${sub}`, settings),
  };
}

function writeToProcess(level: LogLevel, line: string): void {
  if (level === 'warn' || level === 'error') {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}
