/**
 * Logging with Pino
 * Pretty output for local runs; JSON under production. Tests stay silent
 * unless LOG_LEVEL asks otherwise.
 */

import pino from 'pino';

const redactPaths = ['token', 'password', 'secret', '*.token', '*.password', 'headers.authorization'];

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  name: 'a-share-backtest',
  level: defaultLevel(),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:HH:MM:ss',
        },
      }
    : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
