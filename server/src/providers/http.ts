/**
 * JSON-over-HTTP helpers shared by the chat and embedding clients
 */
import { ProviderError } from '../utils/errors';

export interface HttpClientConfig {
  baseUrl: string;
  apiKey: string;
  timeout: number;
}

/**
 * Base class for clients of OpenAI-compatible HTTP APIs
 * Handles timeouts, auth headers and error responses
 */
export abstract class JsonHttpClient {
  protected readonly http: HttpClientConfig;

  constructor(http: HttpClientConfig) {
    this.http = http;
  }

  /**
   * Performs fetch request with timeout using AbortController
   */
  protected async fetchWithTimeout(
    url: string,
    options: RequestInit,
    timeout: number
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ProviderError(`Request timeout after ${timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Request headers; the Authorization header is omitted when there is no key
   */
  protected buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.http.apiKey) {
      headers.Authorization = `Bearer ${this.http.apiKey}`;
    }
    return headers;
  }

  /**
   * POSTs a JSON body and returns the parsed JSON response
   * @throws ProviderError carrying the status for non-2xx responses
   */
  protected async postJson(endpoint: string, body: unknown): Promise<unknown> {
    const url = `${this.http.baseUrl}${endpoint}`;
    const response = await this.fetchWithTimeout(
      url,
      {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
      },
      this.http.timeout
    );

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      throw new ProviderError(
        `HTTP ${response.status} ${response.statusText}: ${errorText}`,
        response.status
      );
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch {
      throw new ProviderError(`Invalid JSON response from ${url}`);
    }
  }
}
