import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Explicit logging configuration handed to createLogger
 */
export interface LoggingOptions {
  level: pino.LevelWithSilent;
  pretty: boolean;
}

/**
 * Map a LOG_LEVEL value onto a pino level.
 * `warning` and `panic` are accepted as aliases; anything unknown is `info`.
 */
export const resolveLogLevel = (value: string | undefined): pino.LevelWithSilent => {
  switch (value?.trim().toLowerCase()) {
    case 'trace':
      return 'trace';
    case 'debug':
      return 'debug';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    case 'fatal':
    case 'panic':
      return 'fatal';
    case 'silent':
      return 'silent';
    default:
      return 'info';
  }
};

/**
 * Read logging options from the environment
 */
export const loggingOptionsFromEnv = (env: NodeJS.ProcessEnv = process.env): LoggingOptions => ({
  level: resolveLogLevel(env['LOG_LEVEL']),
  pretty: env['LOG_FORMAT']?.toLowerCase() === 'pretty',
});

/**
 * Build the controller logger
 */
export const createLogger = (options: LoggingOptions): Logger => {
  const loggerConfig: pino.LoggerOptions = {
    name: 'receive-limits-controller',
    level: options.level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(options.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };

  return pino(loggerConfig);
};

/**
 * Logger that drops everything, for callers that were not given one
 */
export const silentLogger: Logger = pino({ level: 'silent' });
