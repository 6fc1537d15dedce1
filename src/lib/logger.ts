import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
}

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

/**
 * Create a pino-backed logger. Logs go to stderr by default so stdout stays
 * reserved for the JSON result.
 */
export const createLogger = ({
  level = 'warn',
  destination = pino.destination({ dest: 2, sync: true }),
}: {
  level?: LogLevel;
  destination?: pino.DestinationStream;
} = {}): Logger => {
  const instance = pino(
    {
      level,
      base: { name: 'stack-order' },
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination
  );

  return {
    debug: (message) => instance.debug(message),
    info: (message) => instance.info(message),
    warn: (message) => instance.warn(message),
  };
};

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase() ?? 'warn';

/**
 * Default logger, configured from LOG_LEVEL
 */
export const logger: Logger = createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'warn',
});
