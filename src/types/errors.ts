/**
 * Ollama Integration - Error Types
 *
 * Error hierarchy for the Ollama client.
 */

/**
 * Ollama error codes
 */
export enum OllamaErrorCode {
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  SERVER_NOT_RUNNING = 'SERVER_NOT_RUNNING',
  REQUEST_ERROR = 'REQUEST_ERROR',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  STREAM_ERROR = 'STREAM_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base Ollama error class with recovery hints
 */
export class OllamaError extends Error {
  readonly code: OllamaErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: OllamaErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OllamaError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Check if error is retryable
   *
   * Retryable errors are typically transient and may succeed on retry.
   * The client itself never retries.
   */
  isRetryable(): boolean {
    return [
      OllamaErrorCode.SERVER_NOT_RUNNING,
      OllamaErrorCode.CONNECTION_ERROR,
      OllamaErrorCode.TIMEOUT_ERROR,
      OllamaErrorCode.STREAM_ERROR,
      OllamaErrorCode.INTERNAL_ERROR,
    ].includes(this.code);
  }

  /**
   * Get recovery hint for this error
   */
  recoveryHint(): string | undefined {
    switch (this.code) {
      case OllamaErrorCode.SERVER_NOT_RUNNING:
        return "Run 'ollama serve' or start the Ollama application";
      case OllamaErrorCode.TIMEOUT_ERROR:
        return 'Increase timeout or use a smaller/faster model';
      default:
        return undefined;
    }
  }

  /**
   * Create connection error
   */
  static connectionError(message: string, address: string, cause?: string): OllamaError {
    return new OllamaError(
      OllamaErrorCode.CONNECTION_ERROR,
      message,
      { address, cause }
    );
  }

  /**
   * Create server not running error
   */
  static serverNotRunning(message?: string): OllamaError {
    return new OllamaError(
      OllamaErrorCode.SERVER_NOT_RUNNING,
      message || 'Ollama server is not running',
      { hint: "Run 'ollama serve' or start the Ollama application" }
    );
  }

  /**
   * Create validation error
   */
  static validationError(message: string, field?: string, value?: string): OllamaError {
    return new OllamaError(
      OllamaErrorCode.VALIDATION_ERROR,
      message,
      { field, value }
    );
  }

  /**
   * Create timeout error
   */
  static timeout(operation: string, timeoutMs: number): OllamaError {
    return new OllamaError(
      OllamaErrorCode.TIMEOUT_ERROR,
      `${operation} timed out after ${timeoutMs}ms`,
      { operation, timeoutMs }
    );
  }

  /**
   * Create stream error
   */
  static streamError(message: string, partialResponse?: string): OllamaError {
    return new OllamaError(
      OllamaErrorCode.STREAM_ERROR,
      message,
      { partialResponse }
    );
  }

  /**
   * Create internal error
   */
  static internalError(message: string, statusCode?: number): OllamaError {
    return new OllamaError(
      OllamaErrorCode.INTERNAL_ERROR,
      message,
      { statusCode }
    );
  }
}

/**
 * Non-success HTTP status returned by the server.
 *
 * Raised before any part of the response body is handed to the caller.
 */
export class RequestError extends OllamaError {
  /** HTTP status code */
  readonly status: number;
  /** Raw response body text */
  readonly body: string;

  constructor(status: number, body: string, message?: string) {
    super(
      OllamaErrorCode.REQUEST_ERROR,
      message || `HTTP ${status} error`,
      { status, body }
    );
    this.name = 'RequestError';
    this.status = status;
    this.body = body;
  }

  override isRetryable(): boolean {
    return this.status >= 500 || this.status === 408 || this.status === 429;
  }
}

/**
 * Error reported in-band by a streaming response.
 *
 * The server signals failures after a 200 status by emitting a line
 * carrying an `error` field.
 */
export class UpstreamError extends OllamaError {
  /** Value of the `error` field as sent by the server */
  readonly upstream: unknown;

  constructor(upstream: unknown) {
    super(
      OllamaErrorCode.UPSTREAM_ERROR,
      typeof upstream === 'string' ? upstream : JSON.stringify(upstream),
      { upstream }
    );
    this.name = 'UpstreamError';
    this.upstream = upstream;
  }

  override isRetryable(): boolean {
    return false;
  }
}
