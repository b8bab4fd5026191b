import { AppError } from './AppError';

export type FetchFailureReason = 'http_status' | 'malformed_payload' | 'network';

/**
 * Fetch Error (502 Bad Gateway)
 * A single quote could not be retrieved. Callers skip the instrument.
 */
export class FetchError extends AppError {
  public readonly reason: FetchFailureReason;
  public readonly code: string;

  constructor(message: string, reason: FetchFailureReason, code: string) {
    super(message, 502);
    this.reason = reason;
    this.code = code;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}
