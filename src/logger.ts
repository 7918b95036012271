import { pino, type Logger } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

// Job params and request bodies never reach the logs verbatim.
const REDACT_PATHS = ['req.body', 'reply.body', 'params', 'payload', 'headers["x-api-key"]'];

export function loggerOptions(config: Pick<AppConfig, 'log'>) {
  return {
    level: config.log.level,
    redact: REDACT_PATHS,
  };
}

export function createLogger(config: Pick<AppConfig, 'log'>, bindings: Record<string, string> = {}): Logger {
  return pino(loggerOptions(config)).child(bindings);
}
