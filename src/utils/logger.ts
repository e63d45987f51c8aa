/**
 * Logging with Pino - provider credentials are redacted
 */

import pino, { type Logger } from 'pino';
import { getEnvConfig } from '@/core/env';

const redactPaths = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  'provider.apiKey',
  'provider.token',
  'headers.authorization',
  'headers.Authorization',
];

const { logLevel, nodeEnv } = getEnvConfig();

export const logger = pino({
  level: logLevel,
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
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
