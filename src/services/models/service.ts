/**
 * Ollama Integration - Models Service
 *
 * Create, transfer, inspect, copy and delete local models.
 */

import type { OllamaConfig } from '../../config/types.js';
import type { Logger } from '../../observability/logging.js';
import { ChunkStream } from '../../streaming/chunk-stream.js';
import { createDecoder } from '../../streaming/decode.js';
import { foldProgress } from '../../streaming/folds.js';
import type { HttpTransport } from '../../transport/types.js';
import { OllamaError } from '../../types/errors.js';
import type { OperationStatus } from '../../types/health.js';
import type {
  CopyRequest,
  CreateRequest,
  ModelInfo,
  ModelSummary,
  TransferRequest,
} from '../../types/models.js';
import { ModelInfoSchema, ModelListSchema } from '../../types/models.js';
import type { ProgressChunk, ProgressResult } from '../../types/progress.js';
import { ProgressChunkSchema } from '../../types/progress.js';
import { buildBody } from '../request-body.js';
import { parseBody } from '../response-body.js';

export interface ModelsServiceDeps {
  config: OllamaConfig;
  transport: HttpTransport;
}

const decodeProgressChunk = createDecoder(ProgressChunkSchema, 'progress');

export class ModelsService {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(deps: ModelsServiceDeps) {
    this.transport = deps.transport;
    this.logger = deps.config.logger.child({ service: 'models' });
  }

  /**
   * Create a model from a Modelfile
   * POST /api/create
   */
  async create(request: CreateRequest): Promise<ProgressResult> {
    return this.fold('create', await this.createStream(request));
  }

  /**
   * Create a model, streaming progress
   */
  async createStream(request: CreateRequest): Promise<ChunkStream<ProgressChunk>> {
    requireName(request.name);
    if (!request.path && !request.modelfile) {
      throw OllamaError.validationError('Either path or modelfile is required', 'path');
    }

    const body = buildBody([
      { key: 'name', value: request.name },
      { key: 'path', value: request.path },
      { key: 'modelfile', value: request.modelfile },
    ]);
    return this.openProgress('/api/create', body);
  }

  /**
   * Pull a model from the registry
   * POST /api/pull
   *
   * Cancelled pulls are resumed by the server from where they left off.
   */
  async pull(request: TransferRequest): Promise<ProgressResult> {
    return this.fold('pull', await this.pullStream(request));
  }

  /**
   * Pull a model, streaming progress
   */
  async pullStream(request: TransferRequest): Promise<ChunkStream<ProgressChunk>> {
    return this.openProgress('/api/pull', this.transferBody(request));
  }

  /**
   * Push a model to the registry
   * POST /api/push
   */
  async push(request: TransferRequest): Promise<ProgressResult> {
    return this.fold('push', await this.pushStream(request));
  }

  /**
   * Push a model, streaming progress
   */
  async pushStream(request: TransferRequest): Promise<ChunkStream<ProgressChunk>> {
    return this.openProgress('/api/push', this.transferBody(request));
  }

  /**
   * List all locally available models
   * GET /api/tags
   */
  async list(): Promise<ModelSummary[]> {
    const response = await this.transport.get('/api/tags');
    const parsed = parseBody(ModelListSchema, response, 'list');
    return parsed.models ?? [];
  }

  /**
   * Show model details
   * POST /api/show
   */
  async show(name: string): Promise<ModelInfo> {
    requireName(name);
    const response = await this.transport.post('/api/show', { name });
    return parseBody(ModelInfoSchema, response, 'show');
  }

  /**
   * Copy a model under a new name
   * POST /api/copy
   */
  async copy(request: CopyRequest): Promise<OperationStatus> {
    requireName(request.source, 'source');
    requireName(request.destination, 'destination');
    await this.transport.post('/api/copy', {
      source: request.source,
      destination: request.destination,
    });
    this.logger.info('Model copied', { ...request });
    return { status: 'success' };
  }

  /**
   * Delete a local model and its data
   * DELETE /api/delete
   */
  async delete(name: string): Promise<OperationStatus> {
    requireName(name);
    await this.transport.delete('/api/delete', { name });
    this.logger.info('Model deleted', { name });
    return { status: 'success' };
  }

  private transferBody(request: TransferRequest): Record<string, unknown> {
    requireName(request.name);
    return buildBody([
      { key: 'name', value: request.name },
      { key: 'insecure', value: request.insecure },
    ]);
  }

  private async openProgress(
    path: string,
    body: Record<string, unknown>
  ): Promise<ChunkStream<ProgressChunk>> {
    const stream = await this.transport.postStreaming(path, body);
    return new ChunkStream(stream, decodeProgressChunk, this.logger);
  }

  private async fold(operation: string, stream: ChunkStream<ProgressChunk>): Promise<ProgressResult> {
    const result = await foldProgress(stream);
    this.logger.debug('Progress stream complete', {
      operation,
      layers: Object.keys(result.layers).length,
      lastStatus: result.last?.status,
    });
    return result;
  }
}

function requireName(name: string, field = 'name'): void {
  if (!name || name.trim() === '') {
    throw OllamaError.validationError(`${field} is required`, field);
  }
}
