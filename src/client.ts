/**
 * Ollama Client Implementation
 *
 * Main client for interacting with an Ollama server.
 */

import type { OllamaConfig } from './config/types.js';
import { OllamaClientBuilder } from './config/builder.js';
import type { HealthStatus, OperationStatus } from './types/health.js';
import { OllamaError } from './types/errors.js';
import { HttpTransportImpl } from './transport/http.js';
import type { HttpTransport } from './transport/types.js';
import { GenerateService } from './services/generate/service.js';
import { ChatService } from './services/chat/service.js';
import { EmbeddingsService } from './services/embeddings/service.js';
import { ModelsService } from './services/models/service.js';

/**
 * Main Ollama client class
 *
 * Provides lazy-loaded access to generate, chat, embeddings, and model services.
 * The configuration is fixed at construction and shared by every service.
 *
 * @example
 * ```typescript
 * import { OllamaClientBuilder } from 'ollama-ndjson-client';
 *
 * // Create client with defaults (localhost:11434)
 * const client = new OllamaClientBuilder().build();
 *
 * // Folded generation
 * const result = await client.generate.create({
 *   model: 'llama2',
 *   prompt: 'Why is the sky blue?'
 * });
 *
 * // Streaming
 * for await (const chunk of await client.generate.createStream(request)) {
 *   process.stdout.write(chunk.response);
 * }
 * ```
 */
export class OllamaClient {
  private readonly _config: OllamaConfig;
  private readonly transport: HttpTransport;

  // Lazy-initialized services
  private _generateService?: GenerateService;
  private _chatService?: ChatService;
  private _embeddingsService?: EmbeddingsService;
  private _modelsService?: ModelsService;

  constructor(config: OllamaConfig, transport?: HttpTransport) {
    this._config = config;
    this.transport = transport ?? new HttpTransportImpl(config);
  }

  /**
   * Get the client configuration
   */
  get config(): Readonly<OllamaConfig> {
    return this._config;
  }

  /**
   * Generate service for text completion
   *
   * Lazy-loaded on first access.
   */
  get generate(): GenerateService {
    if (!this._generateService) {
      this._generateService = new GenerateService({
        config: this._config,
        transport: this.transport,
      });
    }
    return this._generateService;
  }

  /**
   * Chat service for conversations
   *
   * Lazy-loaded on first access.
   */
  get chat(): ChatService {
    if (!this._chatService) {
      this._chatService = new ChatService({
        config: this._config,
        transport: this.transport,
      });
    }
    return this._chatService;
  }

  /**
   * Embeddings service for vector generation
   *
   * Lazy-loaded on first access.
   */
  get embeddings(): EmbeddingsService {
    if (!this._embeddingsService) {
      this._embeddingsService = new EmbeddingsService({
        config: this._config,
        transport: this.transport,
      });
    }
    return this._embeddingsService;
  }

  /**
   * Models service for model management
   *
   * Create, pull, push, list, show, copy and delete models.
   * Lazy-loaded on first access.
   */
  get models(): ModelsService {
    if (!this._modelsService) {
      this._modelsService = new ModelsService({
        config: this._config,
        transport: this.transport,
      });
    }
    return this._modelsService;
  }

  /**
   * Check that the server answers
   * HEAD /
   *
   * @throws {RequestError} On a non-2xx status
   * @throws {OllamaError} When the server cannot be reached
   */
  async ping(): Promise<OperationStatus> {
    await this.transport.head('/');
    return { status: 'success' };
  }

  /**
   * Check if Ollama server is running and reachable
   *
   * Never throws; any failure reports `running: false`.
   */
  async health(): Promise<HealthStatus> {
    try {
      await this.ping();
      return { running: true };
    } catch (error) {
      this._config.logger.debug('Health check failed', {
        code: error instanceof OllamaError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      return { running: false };
    }
  }

  /**
   * Create a client from environment variables
   *
   * Reads OLLAMA_HOST and OLLAMA_MODEL from environment.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): OllamaClient {
    return new OllamaClientBuilder()
      .baseUrlFromEnv(env)
      .defaultModelFromEnv(env)
      .build();
  }
}
