/**
 * KIS app credentials
 * Passed through to the quote provider, never persisted.
 */
export interface KisCredentials {
  appKey: string;
  appSecret: string;
  /** Accepted for completeness; the ranking pipeline never uses it */
  accountNumber?: string;
}
