/**
 * Logging with Pino - API keys are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'apikey',
  'fmpApiKey',
  'polygonApiKey',
  'authorization',
  'Authorization',
  'token',
  '*.apiKey',
  '*.apikey',
  '*.fmpApiKey',
  '*.polygonApiKey',
  'headers.authorization',
  'headers.Authorization',
];

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    process.env.NODE_ENV !== 'production' && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
