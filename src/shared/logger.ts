export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

type LogContext = Record<string, unknown>;

interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
}

export interface Logger {
  child(context: LogContext): Logger;
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLevel(explicit?: LogLevel): LogLevel {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

function resolveFormat(explicit?: LogFormat): LogFormat {
  if (explicit) {
    return explicit;
  }
  return process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty';
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const level = resolveLevel(options.level);
  const format = resolveFormat(options.format);
  const threshold = LOG_LEVELS.indexOf(level);

  function emit(entryLevel: LogLevel, base: LogContext, message: string, extra?: LogContext): void {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) {
      return;
    }

    const context = { ...base, ...(extra ?? {}) };
    const write = entryLevel === 'error' || entryLevel === 'warn' ? console.error : console.log;

    if (format === 'json') {
      write(JSON.stringify({ ts: new Date().toISOString(), level: entryLevel, service, msg: message, ...context }));
      return;
    }

    const suffix = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    write(`[${new Date().toISOString()}] ${entryLevel.toUpperCase()} ${service} - ${message}${suffix}`);
  }

  function create(base: LogContext): Logger {
    return {
      child: (context) => create({ ...base, ...context }),
      trace: (message, context) => emit('trace', base, message, context),
      debug: (message, context) => emit('debug', base, message, context),
      info: (message, context) => emit('info', base, message, context),
      warn: (message, context) => emit('warn', base, message, context),
      error: (message, context) => emit('error', base, message, context)
    };
  }

  return create({});
}

export function createSilentLogger(): Logger {
  const silent: Logger = {
    child: () => silent,
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
  };
  return silent;
}
