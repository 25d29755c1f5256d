import pino from 'pino';

export interface LoggerOptions {
  level?: string;
  service: string;
  environment?: string;
  prettyPrint?: boolean;
}

export interface LogContext {
  requestId?: string;
  searchType?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext | string, message?: string): void;
  warn(context: LogContext | string, message?: string): void;
  error(context: LogContext | Error | string, message?: string): void;
  debug(context: LogContext | string, message?: string): void;
  child(bindings: LogContext): Logger;
}

// Keys that may carry upstream credentials or caller tokens
const REDACTED_PATHS = [
  'apiKey',
  'token',
  'accessToken',
  'authorization',
  'cookie',
  'headers["api-key"]',
  'headers.authorization',
];

function wrap(base: pino.Logger): Logger {
  return {
    info: (context, message) => {
      if (typeof context === 'string') {
        base.info(context);
      } else {
        base.info(context, message);
      }
    },
    warn: (context, message) => {
      if (typeof context === 'string') {
        base.warn(context);
      } else {
        base.warn(context, message);
      }
    },
    error: (context, message) => {
      if (context instanceof Error) {
        base.error({ err: context }, message ?? context.message);
      } else if (typeof context === 'string') {
        base.error(context);
      } else {
        base.error(context, message);
      }
    },
    debug: (context, message) => {
      if (typeof context === 'string') {
        base.debug(context);
      } else {
        base.debug(context, message);
      }
    },
    child: (bindings) => wrap(base.child(bindings)),
  };
}

export function createLogger(options: LoggerOptions): Logger {
  const { level = 'info', service, environment = process.env.NODE_ENV ?? 'development', prettyPrint = false } = options;

  const logger = pino({
    level,
    base: {
      service,
      environment,
    },
    redact: {
      paths: REDACTED_PATHS,
      remove: true,
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(prettyPrint && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss.l',
        },
      },
    }),
  });

  return wrap(logger);
}

/**
 * Logger that drops everything. Used where a collaborator is optional.
 */
export function createSilentLogger(service = 'silent'): Logger {
  return createLogger({ service, level: 'silent' });
}
