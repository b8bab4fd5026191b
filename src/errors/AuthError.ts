import { AppError } from './AppError';

/**
 * Auth Error (502 Bad Gateway)
 * Thrown when the KIS token endpoint rejects the credentials or cannot be reached
 */
export class AuthError extends AppError {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 502);
    this.status = status;
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}
