/**
 * Minimal HTTP client used by the KIS adapters
 *
 * Every status resolves (nothing throws for 4xx/5xx); adapters inspect
 * `status` themselves. Transport failures and timeouts reject.
 */
export interface HttpResponse {
  status: number;
  data: unknown;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string>;
}

export interface IHttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpResponse>;
}
