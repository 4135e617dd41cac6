/**
 * HTTP Transport Implementation
 *
 * Implements the HttpTransport interface using fetch API.
 */

import type { OllamaConfig } from '../config/types.js';
import type { Logger } from '../observability/logging.js';
import { OllamaError, RequestError } from '../types/errors.js';
import { isRecord } from '../utils/values.js';
import type { HttpMethod, HttpResponse, HttpTransport } from './types.js';

/**
 * HTTP transport implementation using fetch
 */
export class HttpTransportImpl implements HttpTransport {
  private readonly config: OllamaConfig;
  private readonly logger: Logger;

  constructor(config: OllamaConfig) {
    this.config = config;
    this.logger = config.logger.child({ component: 'transport' });
  }

  /**
   * Build full URL from base URL and path
   *
   * Plain concatenation keeps any sub-path of the base URL.
   */
  buildUrl(path: string): string {
    const suffix = path.startsWith('/') ? path : `/${path}`;
    return `${this.config.baseUrl}${suffix}`;
  }

  /**
   * Create headers for request
   */
  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.config.defaultHeaders,
    };

    // Add Authorization header if auth token is set
    if (this.config.authToken) {
      headers['Authorization'] = `Bearer ${this.config.authToken}`;
    }

    return headers;
  }

  /**
   * Map fetch errors to OllamaError types
   */
  private mapFetchError(error: unknown, operation: string): OllamaError {
    if (!(error instanceof Error)) {
      return OllamaError.internalError('Unknown error occurred');
    }

    // Check for timeout
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return OllamaError.timeout(operation, this.config.timeoutMs);
    }

    // Check for connection refused (server not running)
    const cause = error.cause;
    const causeCode = isRecord(cause) ? cause['code'] : undefined;
    if (
      causeCode === 'ECONNREFUSED' ||
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('fetch failed')
    ) {
      return OllamaError.serverNotRunning(
        `Cannot connect to Ollama server at ${this.config.baseUrl}. ` +
        "Run 'ollama serve' or start the Ollama application."
      );
    }

    // Generic connection error
    return OllamaError.connectionError(
      error.message,
      this.config.baseUrl,
      error.name
    );
  }

  /**
   * Turn a non-2xx response into a RequestError
   */
  private async handleErrorResponse(response: Response): Promise<never> {
    const status = response.status;
    let text: string;

    try {
      text = await response.text();
    } catch (error) {
      this.logger.debug('Failed to read error response body', {
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      text = '';
    }

    throw new RequestError(status, text, this.extractErrorMessage(text, status));
  }

  /**
   * Pick the `error` string out of a JSON error body, else the raw text
   */
  private extractErrorMessage(text: string, status: number): string {
    const fallback = text.trim() || `HTTP ${status} error`;
    try {
      const parsed: unknown = JSON.parse(text);
      if (isRecord(parsed) && typeof parsed['error'] === 'string' && parsed['error']) {
        return parsed['error'];
      }
      return fallback;
    } catch {
      return fallback;
    }
  }

  /**
   * Perform a request and check its status
   *
   * The timeout covers the wait for response headers only, so long streams
   * are not cut off.
   */
  private async send(method: HttpMethod, path: string, body?: unknown): Promise<Response> {
    const url = this.buildUrl(path);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const operation = `${method} ${path}`;

    this.logger.debug('Sending request', { method, path });

    let response: Response;
    try {
      response = await this.config.fetch(url, {
        method,
        headers: this.buildHeaders(),
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const mapped = this.mapFetchError(error, operation);
      this.logger.warn('Request failed', { method, path, code: mapped.code });
      throw mapped;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      this.logger.warn('Request returned error status', { method, path, status: response.status });
      await this.handleErrorResponse(response);
    }

    return response;
  }

  /**
   * Read the whole body as JSON
   */
  private async readJson(response: Response, operation: string): Promise<HttpResponse> {
    const text = await response.text();
    let body: unknown = null;

    if (text.trim()) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw OllamaError.internalError(
          `${operation}: invalid JSON in response body (${error instanceof Error ? error.message : String(error)})`,
          response.status
        );
      }
    }

    return {
      status: response.status,
      body,
      headers: response.headers,
    };
  }

  /**
   * Send GET request
   */
  async get(path: string): Promise<HttpResponse> {
    const response = await this.send('GET', path);
    return this.readJson(response, `GET ${path}`);
  }

  /**
   * Send POST request with JSON body
   */
  async post<T>(path: string, body: T): Promise<HttpResponse> {
    const response = await this.send('POST', path, body);
    return this.readJson(response, `POST ${path}`);
  }

  /**
   * Send DELETE request with JSON body
   */
  async delete<T>(path: string, body: T): Promise<HttpResponse> {
    const response = await this.send('DELETE', path, body);
    return this.readJson(response, `DELETE ${path}`);
  }

  /**
   * Send HEAD request
   */
  async head(path: string): Promise<number> {
    const response = await this.send('HEAD', path);
    return response.status;
  }

  /**
   * Send POST request and return the unread response body
   */
  async postStreaming<T>(path: string, body: T): Promise<ReadableStream<Uint8Array>> {
    const response = await this.send('POST', path, body);

    if (!response.body) {
      throw OllamaError.streamError('Response body is null');
    }

    return response.body;
  }
}
