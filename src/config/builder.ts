/**
 * Builder for creating Ollama client instances.
 */

import type { FetchFn, OllamaConfig } from './types.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, HOST_ENV_VAR, MODEL_ENV_VAR } from './constants.js';
import { isRemote, normalizeBaseUrl, validateConfig } from './schema.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { OllamaClient } from '../client.js';

/**
 * Builder for OllamaConfig with fluent API.
 */
export class OllamaClientBuilder {
  private _baseUrl?: string;
  private _timeoutMs?: number;
  private _authToken?: string;
  private _defaultModel?: string;
  private _defaultHeaders: Record<string, string> = {};
  private _logger?: Logger;
  private _fetch?: FetchFn;

  /**
   * Set base URL.
   */
  baseUrl(url: string): this {
    this._baseUrl = url;
    return this;
  }

  /**
   * Set base URL from the OLLAMA_HOST environment variable, if set.
   */
  baseUrlFromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const url = env[HOST_ENV_VAR];
    if (url) {
      this._baseUrl = url;
    }
    return this;
  }

  /**
   * Set timeout in milliseconds.
   */
  timeoutMs(ms: number): this {
    this._timeoutMs = ms;
    return this;
  }

  /**
   * Set authentication token.
   * For use with proxied Ollama setups.
   */
  authToken(token: string): this {
    this._authToken = token;
    return this;
  }

  /**
   * Set default model.
   */
  defaultModel(model: string): this {
    this._defaultModel = model;
    return this;
  }

  /**
   * Set default model from the OLLAMA_MODEL environment variable, if set.
   */
  defaultModelFromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const model = env[MODEL_ENV_VAR];
    if (model) {
      this._defaultModel = model;
    }
    return this;
  }

  /**
   * Add a default header.
   */
  defaultHeader(name: string, value: string): this {
    this._defaultHeaders[name] = value;
    return this;
  }

  /**
   * Set the logger. Defaults to a no-op logger.
   */
  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Set the fetch implementation. Defaults to the global fetch.
   */
  fetch(fn: FetchFn): this {
    this._fetch = fn;
    return this;
  }

  /**
   * Build and validate the configuration without creating a client.
   *
   * @throws {OllamaError} If configuration is invalid
   */
  buildConfig(): OllamaConfig {
    const config: OllamaConfig = Object.freeze({
      baseUrl: normalizeBaseUrl(this._baseUrl ?? DEFAULT_BASE_URL),
      timeoutMs: this._timeoutMs ?? DEFAULT_TIMEOUT_MS,
      authToken: this._authToken,
      defaultModel: this._defaultModel,
      defaultHeaders: Object.freeze({ ...this._defaultHeaders }),
      logger: this._logger ?? new NoopLogger(),
      fetch: this._fetch ?? globalThis.fetch.bind(globalThis),
    });

    validateConfig(config);

    if (isRemote(config) && !config.authToken) {
      config.logger.warn('Connecting to remote Ollama without authentication', {
        baseUrl: config.baseUrl,
      });
    }

    return config;
  }

  /**
   * Build the client.
   *
   * @throws {OllamaError} If configuration is invalid
   */
  build(): OllamaClient {
    return new OllamaClient(this.buildConfig());
  }
}
