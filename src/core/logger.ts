export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const format = options.format ?? 'pretty';
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    let line: string;
    if (format === 'json') {
      line = JSON.stringify({ t: now().toISOString(), level, msg: message, ...meta });
    } else {
      const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      line = `${PREFIX[level]} ${message}${metaStr}`;
    }

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
