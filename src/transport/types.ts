/**
 * Transport Layer Types
 *
 * Defines the HTTP transport abstraction for the Ollama client.
 */

/**
 * HTTP methods used by the Ollama API
 */
export type HttpMethod = 'GET' | 'POST' | 'DELETE' | 'HEAD';

/**
 * HTTP response structure
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** JSON-parsed response body, `null` when the body is empty */
  body: unknown;
  /** Response headers */
  headers?: Headers;
}

/**
 * HTTP transport abstraction
 *
 * Every method rejects with a RequestError when the status is not 2xx,
 * before any of the body is handed out.
 */
export interface HttpTransport {
  /**
   * Send GET request
   *
   * @param path - API path (e.g., "/api/tags")
   */
  get(path: string): Promise<HttpResponse>;

  /**
   * Send POST request with JSON body
   *
   * @param path - API path (e.g., "/api/show")
   * @param body - Request body (will be JSON-serialized)
   */
  post<T>(path: string, body: T): Promise<HttpResponse>;

  /**
   * Send DELETE request with JSON body
   */
  delete<T>(path: string, body: T): Promise<HttpResponse>;

  /**
   * Send HEAD request
   *
   * @returns HTTP status code
   */
  head(path: string): Promise<number>;

  /**
   * Send POST request and hand back the unread response body
   *
   * @param path - API path (e.g., "/api/generate")
   * @param body - Request body (will be JSON-serialized)
   * @returns Byte stream of the response body
   */
  postStreaming<T>(path: string, body: T): Promise<ReadableStream<Uint8Array>>;
}
