import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * Thrown for unknown routes
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  static forRoute(method: string, path: string): NotFoundError {
    return new NotFoundError(`Route ${method} ${path} not found`);
  }
}
