import pino, { type Logger, type LoggerOptions } from 'pino';

const DEFAULT_REDACT_PATHS = [
  'headers.authorization',
  'headers.cookie',
  'req.headers.authorization',
  'req.headers.cookie',
];

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  prettyPrint?: boolean;
  redactPaths?: string[];
  serviceName?: string;
  version?: string;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const {
    level = 'info',
    prettyPrint = false,
    redactPaths = [],
    serviceName = 'shared-expenses',
    version = '1.0.0',
  } = config;

  const options: LoggerOptions = {
    level,
    name: serviceName,
    redact: {
      paths: [...DEFAULT_REDACT_PATHS, ...redactPaths],
      censor: '[REDACTED]',
    },
    base: {
      service: serviceName,
      version,
      pid: process.pid,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

/**
 * Replace the process-wide logger. Components take their child logger when
 * constructed, so call this before building them.
 */
export function initLogger(config: LoggerConfig): Logger {
  loggerInstance = createLogger(config);
  return loggerInstance;
}
