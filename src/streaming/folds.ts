/**
 * Folds reducing a chunk stream to one result
 */

import type { ChatChunk, ChatResult } from '../types/chat.js';
import type { GenerateChunk, GenerateResult } from '../types/generate.js';
import type { ProgressChunk, ProgressResult, ProgressUpdate } from '../types/progress.js';
import { OllamaError } from '../types/errors.js';

/**
 * Concatenate `response` fragments until the chunk marked `done`.
 *
 * The done chunk is returned with `response` replaced by the full text.
 * Anything after it is not read.
 *
 * @throws {OllamaError} STREAM_ERROR when the stream ends without a done chunk
 */
export async function foldGenerate(chunks: AsyncIterable<GenerateChunk>): Promise<GenerateResult> {
  let text = '';

  for await (const chunk of chunks) {
    if (chunk.response) {
      text += chunk.response;
    }
    if (chunk.done) {
      return { ...chunk, response: text, done: true, status: 'success' };
    }
  }

  throw OllamaError.streamError('Generation stream ended before a final chunk', text);
}

/**
 * Concatenate assistant `message.content` fragments until the chunk marked `done`.
 *
 * The done chunk is returned with `message` replaced by the whole reply.
 *
 * @throws {OllamaError} STREAM_ERROR when the stream ends without a done chunk
 */
export async function foldChat(chunks: AsyncIterable<ChatChunk>): Promise<ChatResult> {
  let text = '';

  for await (const chunk of chunks) {
    if (chunk.message?.content) {
      text += chunk.message.content;
    }
    if (chunk.done) {
      return {
        ...chunk,
        message: { role: 'assistant', content: text },
        done: true,
        status: 'success',
      };
    }
  }

  throw OllamaError.streamError('Chat stream ended before a final chunk', text);
}

/**
 * Drain a progress stream, keeping the last update per layer digest.
 */
export async function foldProgress(chunks: AsyncIterable<ProgressChunk>): Promise<ProgressResult> {
  const layers: Record<string, ProgressUpdate> = {};
  let last: ProgressChunk | undefined;

  for await (const chunk of chunks) {
    last = chunk;
    const { digest, ...update } = chunk;
    if (digest) {
      layers[digest] = update;
    }
  }

  return last === undefined ? { status: 'success', layers } : { status: 'success', layers, last };
}
