/**
 * Ollama Integration - Chat Service
 *
 * Service for multi-turn conversations using Ollama's chat API.
 */

import type { OllamaConfig } from '../../config/types.js';
import type { Logger } from '../../observability/logging.js';
import { ChunkStream } from '../../streaming/chunk-stream.js';
import { createDecoder } from '../../streaming/decode.js';
import { foldChat } from '../../streaming/folds.js';
import type { HttpTransport } from '../../transport/types.js';
import type { ChatChunk, ChatRequest, ChatResult } from '../../types/chat.js';
import { ChatChunkSchema } from '../../types/chat.js';
import { OllamaError } from '../../types/errors.js';
import { buildBody } from '../request-body.js';

export interface ChatServiceDeps {
  config: OllamaConfig;
  transport: HttpTransport;
}

const decodeChatChunk = createDecoder(ChatChunkSchema, 'chat');

/**
 * Chat service
 */
export class ChatService {
  private readonly config: OllamaConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(deps: ChatServiceDeps) {
    this.config = deps.config;
    this.transport = deps.transport;
    this.logger = deps.config.logger.child({ service: 'chat' });
  }

  /**
   * Send a conversation and wait for the whole assistant reply
   *
   * @throws {RequestError} On a non-2xx status
   * @throws {UpstreamError} When the server reports an error mid-stream
   * @throws {OllamaError} STREAM_ERROR when the stream ends without a final chunk
   */
  async create(request: ChatRequest): Promise<ChatResult> {
    const result = await foldChat(await this.createStream(request));
    this.logger.debug('Chat complete', {
      model: result.model,
      evalCount: result.eval_count,
    });
    return result;
  }

  /**
   * Send a conversation and stream the reply
   *
   * @throws {RequestError} On a non-2xx status, before any chunk is read
   */
  async createStream(request: ChatRequest): Promise<ChunkStream<ChatChunk>> {
    const model = request.model || this.config.defaultModel;
    if (!model) {
      throw OllamaError.validationError('Model is required', 'model');
    }

    const body = buildBody([
      { key: 'model', value: model },
      { key: 'messages', value: request.messages },
      { key: 'format', value: request.format },
      { key: 'options', value: request.options },
      { key: 'keep_alive', value: request.keep_alive },
    ]);
    const stream = await this.transport.postStreaming('/api/chat', body);
    return new ChunkStream(stream, decodeChatChunk, this.logger);
  }
}
