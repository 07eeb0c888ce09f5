import pino from 'pino';
import { config } from './config.js';

export const SERVICE_NAME = 'fx-price-stream';

export const logger = pino({
  level: config.log.level,
  transport: {
    target: 'pino/file',
    options: { destination: 1 }, // stdout
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  base: { service: SERVICE_NAME, pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: ['apiKey', 'headers.authorization', 'headers.Authorization'],
});

export function createChildLogger(module: string) {
  return logger.child({ module });
}
