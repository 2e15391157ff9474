export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

type MessageLevel = Exclude<LogLevel, 'silent'>;

/**
 * Line-oriented stderr logger: `[schemasmith] <level>: <message>`.
 * Messages above the configured level are dropped.
 */
export function createLogger(level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const write = (messageLevel: MessageLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(messageLevel) > threshold) return;
    process.stderr.write(`[schemasmith] ${messageLevel}: ${message}\n`);
  };

  return {
    level,
    error: (message) => write('error', message),
    warn: (message) => write('warn', message),
    info: (message) => write('info', message),
    debug: (message) => write('debug', message),
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}
