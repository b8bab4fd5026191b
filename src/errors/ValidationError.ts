import { AppError } from './AppError';

/**
 * Validation Error (400 Bad Request)
 * Thrown when a request body or query fails its zod schema.
 * details carries the flattened zod issues and is returned to the client.
 */
export class ValidationError extends AppError {
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 400);
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
