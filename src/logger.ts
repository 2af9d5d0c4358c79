import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggingConfig = {
  level: LogLevel;
  pretty: boolean;
  /** Write JSON lines to this file instead of stdout. */
  destination?: string;
};

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

export const createLogger = (config: LoggingConfig): Logger => {
  if (config.destination) {
    return pino(
      { level: config.level },
      pino.destination({ dest: config.destination, mkdir: true, sync: true }),
    );
  }

  return pino({
    level: config.level,
    ...(config.pretty ? { transport: { target: 'pino-pretty' } } : {}),
  });
};
