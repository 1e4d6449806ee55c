import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.logLevel,
  base: { service: 'rejections-api' },
  redact: {
    paths: ['req.headers.authorization', 'password', 'token'],
    censor: '[redacted]',
  },
});

export function getLogger(moduleName: string) {
  return logger.child({ module: moduleName });
}
