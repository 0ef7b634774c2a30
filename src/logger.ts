import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.log.level,
  base: { service: 'split-ledger' },
  transport: {
    target: 'pino/file',
    options: { destination: 1 }, // stdout
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
