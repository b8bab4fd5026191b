import { AppError } from './AppError';

/**
 * Configuration Error (500)
 * Live data was requested without usable credentials
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
