export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

export const formatLogLine = (level: LogLevel, scope: string, message: string, date = new Date()): string =>
  `[${date.toISOString()}] [${level}] [${scope}] ${message}`;

/**
 * Level below which lines are dropped; QUESTSHELF_DEBUG=1 lowers it to debug
 */
export const defaultLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel =>
  env.QUESTSHELF_DEBUG === '1' ? 'debug' : 'info';

/**
 * Logger writing timestamped lines through the console
 */
export const createConsoleLogger = (scope: string, minLevel: LogLevel = defaultLogLevel()): Logger => {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const write = (level: LogLevel, message: string, error?: unknown) => {
    if (!enabled(level)) {
      return;
    }
    const line = formatLogLine(level, scope, message);
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (error === undefined) {
      sink(line);
    } else {
      sink(line, error);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message, error) => write('warn', message, error),
    error: (message, error) => write('error', message, error)
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
