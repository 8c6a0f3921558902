import pino from 'pino';
import { env } from './environment.js';

// Sensitive fields to redact from logs
const redactPaths = [
  'password',
  'token',
  'setupToken',
  'authorization',
  'cookie',
  'secret',
  '*.password',
  '*.token',
  '*.setupToken',
  'user.password',
  'payload.token',
  'payload.user.password',
  'headers.authorization',
  'headers.cookie',
];

export const logger = pino({
  level: env.LOG_LEVEL,
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  transport:
    env.LOG_PRETTY && env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

// Child logger bound to a single bootstrap target
export function createTargetLogger(target: string): pino.Logger {
  return logger.child({ target });
}
