import { KisCredentials, MarketSnapshot } from '@/models';
import { AuthError, FetchError } from '@/errors';

/**
 * Source of short-lived bearer tokens for the quote endpoint
 */
export interface IAuthTokenSource {
  /**
   * @throws AuthError when the credentials are rejected or the endpoint is unreachable
   */
  obtain(appKey: string, appSecret: string): Promise<string>;
}

/**
 * Outcome of one quote fetch. Failures carry the cause for logging and
 * metrics; callers outside the adapter only see present or absent.
 */
export type QuoteResult =
  | { ok: true; snapshot: MarketSnapshot }
  | { ok: false; error: AuthError | FetchError };

export interface IQuoteProvider {
  /**
   * Fetch the current snapshot of one instrument. Never rejects.
   */
  fetchQuote(code: string, credentials: KisCredentials): Promise<QuoteResult>;

  /**
   * Same as fetchQuote, collapsed to the snapshot or null
   */
  fetchSnapshot(code: string, credentials: KisCredentials): Promise<MarketSnapshot | null>;
}
