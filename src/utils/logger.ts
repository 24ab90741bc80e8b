import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

const SECRET_FIELDS = [
  'apiKey',
  'apiSecret',
  'accessToken',
  'refreshToken',
  'token',
  'mpin',
  'totpSeed',
  'password',
];

// HTTP client errors serialize their request config, bearer header and form body included
const REQUEST_FIELDS = [
  'headers.Authorization',
  '*.headers.Authorization',
  'err.config.headers.Authorization',
  'err.config.data',
  'err.response.config.headers.Authorization',
  'err.response.config.data',
];

export const REDACT_PATHS = [
  ...SECRET_FIELDS,
  ...SECRET_FIELDS.map((field) => `*.${field}`),
  ...REQUEST_FIELDS,
];

/** Builds the root logger; a destination replaces the pretty transport. */
export function buildLogger(destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
  if (destination) return pino(options, destination);

  return pino({
    ...options,
    transport: isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

export const logger = buildLogger();

export function createLogger(name: string) {
  return logger.child({ module: name });
}
