/**
 * Logging with Pino - API keys are redacted
 */

import pino, { type Logger } from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'finnhubApiKey',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.finnhubApiKey',
  'headers.authorization',
  'headers.Authorization',
];

const nodeEnv = process.env.NODE_ENV ?? 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type { Logger };

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
