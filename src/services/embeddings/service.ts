/**
 * Ollama Integration - Embeddings Service
 *
 * Service for generating text embeddings using Ollama.
 */

import type { OllamaConfig } from '../../config/types.js';
import type { HttpTransport } from '../../transport/types.js';
import type { EmbeddingsRequest, EmbeddingsResponse } from '../../types/embeddings.js';
import { EmbeddingsResponseSchema } from '../../types/embeddings.js';
import { OllamaError } from '../../types/errors.js';
import { buildBody } from '../request-body.js';
import { parseBody } from '../response-body.js';

/**
 * Dependencies for EmbeddingsService
 */
export interface EmbeddingsServiceDeps {
  config: OllamaConfig;
  transport: HttpTransport;
}

/**
 * Embeddings service for generating vector embeddings
 */
export class EmbeddingsService {
  private readonly config: OllamaConfig;
  private readonly transport: HttpTransport;

  constructor(deps: EmbeddingsServiceDeps) {
    this.config = deps.config;
    this.transport = deps.transport;
  }

  /**
   * Generate an embedding for text
   * POST /api/embeddings
   *
   * @example
   * ```typescript
   * const { embedding } = await embeddings.create({
   *   model: 'llama2',
   *   prompt: 'Hello, world!'
   * });
   * ```
   */
  async create(request: EmbeddingsRequest): Promise<EmbeddingsResponse> {
    if (!request.prompt) {
      throw OllamaError.validationError('Prompt is required', 'prompt');
    }

    const model = request.model || this.config.defaultModel;
    if (!model) {
      throw OllamaError.validationError('Model is required', 'model');
    }

    const body = buildBody([
      { key: 'model', value: model },
      { key: 'prompt', value: request.prompt },
      { key: 'options', value: request.options },
    ]);

    const response = await this.transport.post('/api/embeddings', body);
    return parseBody(EmbeddingsResponseSchema, response, 'embeddings');
  }

  /**
   * Generate embeddings for several texts, one request each
   */
  async createBatch(requests: EmbeddingsRequest[]): Promise<EmbeddingsResponse[]> {
    return Promise.all(requests.map((req) => this.create(req)));
  }
}
