import { IFetchProgressObserver } from '@/interfaces/IFetchProgressObserver';
import { ILogger } from '@/interfaces/ILogger';

/**
 * Reports universe fetch progress at debug level
 */
export class LoggingProgressObserver implements IFetchProgressObserver {
  constructor(private readonly logger: ILogger) {}

  onProgress(completed: number, total: number, code: string, fetched: boolean): void {
    this.logger.debug({ completed, total, code, fetched }, `Loading quotes ${completed}/${total}`);
  }
}
