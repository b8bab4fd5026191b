import axios, { AxiosInstance } from 'axios';
import { HttpRequestOptions, HttpResponse, IHttpClient } from '@/interfaces/IHttpClient';

/**
 * axios-backed HTTP client
 *
 * validateStatus accepts every status so callers decide what counts as success.
 */
export class AxiosHttpClient implements IHttpClient {
  private readonly client: AxiosInstance;

  constructor(baseURL: string, timeoutMs: number) {
    this.client = axios.create({
      baseURL,
      timeout: timeoutMs,
      headers: { 'content-type': 'application/json' },
      validateStatus: () => true,
    });
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await this.client.get<unknown>(url, {
      headers: options.headers,
      params: options.params,
    });
    return { status: response.status, data: response.data };
  }

  async post(url: string, body: unknown, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await this.client.post<unknown>(url, body, {
      headers: options.headers,
      params: options.params,
    });
    return { status: response.status, data: response.data };
  }
}
