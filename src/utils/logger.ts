import pino from 'pino';
import { env } from '@/config/env';

/**
 * Root pino instance
 * In development: pretty-printed for human readability
 * Otherwise: JSON lines for log aggregation
 *
 * Authorization headers and KIS secrets are redacted wherever they appear.
 */
export const logger = pino({
  level: env.LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development' && env.LOG_PRETTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  redact: {
    paths: ['req.headers.authorization', '*.appKey', '*.appSecret', '*.accountNumber'],
    censor: '[REDACTED]',
  },
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
