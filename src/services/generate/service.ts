/**
 * Ollama Integration - Generate Service
 *
 * Service for text generation using Ollama's generate API.
 */

import type { OllamaConfig } from '../../config/types.js';
import type { Logger } from '../../observability/logging.js';
import { ChunkStream } from '../../streaming/chunk-stream.js';
import { createDecoder } from '../../streaming/decode.js';
import { foldGenerate } from '../../streaming/folds.js';
import type { HttpTransport } from '../../transport/types.js';
import { OllamaError } from '../../types/errors.js';
import type { GenerateChunk, GenerateRequest, GenerateResult } from '../../types/generate.js';
import { GenerateChunkSchema } from '../../types/generate.js';
import { buildBody } from '../request-body.js';

export interface GenerateServiceDeps {
  config: OllamaConfig;
  transport: HttpTransport;
}

const decodeGenerateChunk = createDecoder(GenerateChunkSchema, 'generate');

/**
 * Generate service for text completion
 *
 * The server always streams; `create` folds the stream into one result,
 * `createStream` hands it to the caller.
 */
export class GenerateService {
  private readonly config: OllamaConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(deps: GenerateServiceDeps) {
    this.config = deps.config;
    this.transport = deps.transport;
    this.logger = deps.config.logger.child({ service: 'generate' });
  }

  /**
   * Generate a complete response
   *
   * Returns the final chunk, carrying statistics and `context`, with
   * `response` holding the concatenated text.
   *
   * @throws {RequestError} On a non-2xx status
   * @throws {UpstreamError} When the server reports an error mid-stream
   * @throws {OllamaError} STREAM_ERROR when the stream ends without a final chunk
   */
  async create(request: GenerateRequest): Promise<GenerateResult> {
    const stream = await this.createStream(request);
    const result = await foldGenerate(stream);
    this.logger.debug('Generation complete', {
      model: result.model,
      evalCount: result.eval_count,
    });
    return result;
  }

  /**
   * Generate a streaming response
   *
   * The returned stream is lazy and can be iterated once.
   *
   * @throws {RequestError} On a non-2xx status, before any chunk is read
   */
  async createStream(request: GenerateRequest): Promise<ChunkStream<GenerateChunk>> {
    const body = this.buildRequestBody(request);
    const stream = await this.transport.postStreaming('/api/generate', body);
    return new ChunkStream(stream, decodeGenerateChunk, this.logger);
  }

  /**
   * Resolve model name
   *
   * @throws {OllamaError} If no model is specified and no default exists
   */
  private resolveModel(request: GenerateRequest): string {
    const model = request.model || this.config.defaultModel;
    if (!model) {
      throw OllamaError.validationError('Model is required', 'model');
    }
    return model;
  }

  /**
   * Build request body, leaving out empty fields
   */
  private buildRequestBody(request: GenerateRequest): Record<string, unknown> {
    return buildBody([
      { key: 'model', value: this.resolveModel(request) },
      { key: 'prompt', value: request.prompt },
      { key: 'system', value: request.system },
      { key: 'template', value: request.template },
      { key: 'context', value: request.context },
      { key: 'options', value: request.options },
      { key: 'format', value: request.format },
      { key: 'raw', value: request.raw },
      { key: 'images', value: request.images },
      { key: 'keep_alive', value: request.keep_alive },
    ]);
  }
}
