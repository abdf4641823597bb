/**
 * Pino Logger
 * 
 * Structured JSON logging for production observability.
 * The server builds its own instance from the same options.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';
import type { ApiConfig } from '../config/index.js';

export function loggerOptions(config: Pick<ApiConfig, 'logLevel' | 'nodeEnv'>): LoggerOptions {
  return {
    level: config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'dashsync-api',
      env: config.nodeEnv,
    },
  };
}

export function createApiLogger(config: Pick<ApiConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino(loggerOptions(config));
}
