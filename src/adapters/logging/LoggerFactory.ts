/**
 * Logger Factory
 *
 * Hands out named ILogger instances. Each one is a pino child bound to
 * a `context` field, e.g. {"context":"KisQuoteProvider"}.
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { logger as rootLogger } from '@/utils/logger';
import { PinoLogger } from './PinoLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    return new PinoLogger(rootLogger.child({ context: context || 'app' }));
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
