/**
 * Fold tests
 */

import { describe, it, expect } from 'vitest';
import { foldChat, foldGenerate, foldProgress } from '../streaming/folds.js';
import { ChunkStream } from '../streaming/chunk-stream.js';
import { createDecoder } from '../streaming/decode.js';
import { NoopLogger } from '../observability/logging.js';
import { OllamaError, OllamaErrorCode, UpstreamError } from '../types/errors.js';
import type { ChatChunk } from '../types/chat.js';
import type { GenerateChunk } from '../types/generate.js';
import { GenerateChunkSchema } from '../types/generate.js';
import type { ProgressChunk } from '../types/progress.js';
import { ProgressChunkSchema } from '../types/progress.js';
import { captureError, ndjsonParts, trackedStream } from './helpers.js';

async function* chunksOf<T>(...items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('foldGenerate', () => {
  it('should concatenate fragments into the done chunk', async () => {
    const result = await foldGenerate(
      chunksOf<GenerateChunk>(
        { response: 'Hel', done: false },
        { response: 'lo', done: true }
      )
    );

    expect(result).toEqual({ response: 'Hello', done: true, status: 'success' });
  });

  it('should keep the metrics of the final chunk', async () => {
    const result = await foldGenerate(
      chunksOf<GenerateChunk>(
        { model: 'llama2', response: 'The sky', done: false },
        { model: 'llama2', response: ' is blue.', done: false },
        { model: 'llama2', response: '', done: true, context: [1, 2, 3], eval_count: 5 }
      )
    );

    expect(result).toEqual({
      model: 'llama2',
      response: 'The sky is blue.',
      done: true,
      context: [1, 2, 3],
      eval_count: 5,
      status: 'success',
    });
  });

  it('should stop reading after the done chunk', async () => {
    const { stream, state } = trackedStream(
      ndjsonParts(
        { response: 'a', done: false },
        { response: 'b', done: true },
        { response: 'ignored', done: false }
      )
    );

    const result = await foldGenerate(
      new ChunkStream(stream, createDecoder(GenerateChunkSchema, 'generate'), new NoopLogger())
    );

    expect(result.response).toBe('ab');
    expect(state.pulled).toBe(2);
    expect(state.cancelled).toBe(true);
  });

  it('should fail with the partial text when no done chunk arrives', async () => {
    const error = await captureError(
      foldGenerate(
        chunksOf<GenerateChunk>({ response: 'Once upon', done: false }, { response: ' a time', done: false })
      )
    );

    expect(error).toBeInstanceOf(OllamaError);
    expect(error).toHaveProperty('code', OllamaErrorCode.STREAM_ERROR);
    expect(error).toHaveProperty('details', { partialResponse: 'Once upon a time' });
  });

  it('should propagate an upstream error mid-stream', async () => {
    const { stream } = trackedStream(
      ndjsonParts({ response: 'a', done: false }, { error: 'context window exceeded' })
    );

    const error = await captureError(
      foldGenerate(
        new ChunkStream(stream, createDecoder(GenerateChunkSchema, 'generate'), new NoopLogger())
      )
    );

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toHaveProperty('message', 'context window exceeded');
  });
});

describe('foldProgress', () => {
  it('should keep the last update per digest without the digest key', async () => {
    const result = await foldProgress(
      chunksOf<ProgressChunk>(
        { digest: 'sha:aaa', status: 'downloading', completed: 10 },
        { digest: 'sha:aaa', status: 'downloading', completed: 50 }
      )
    );

    expect(result.status).toBe('success');
    expect(result.layers).toEqual({
      'sha:aaa': { status: 'downloading', completed: 50 },
    });
  });

  it('should track several layers and remember the last chunk', async () => {
    const result = await foldProgress(
      chunksOf<ProgressChunk>(
        { status: 'pulling manifest' },
        { digest: 'sha:aaa', status: 'downloading', total: 100, completed: 0 },
        { digest: 'sha:bbb', status: 'downloading', total: 20, completed: 20 },
        { digest: 'sha:aaa', status: 'downloading', total: 100, completed: 100 },
        { status: 'verifying sha256 digest' },
        { status: 'success' }
      )
    );

    expect(result).toEqual({
      status: 'success',
      layers: {
        'sha:aaa': { status: 'downloading', total: 100, completed: 100 },
        'sha:bbb': { status: 'downloading', total: 20, completed: 20 },
      },
      last: { status: 'success' },
    });
  });

  it('should return an empty layer map for a stream without digests', async () => {
    const result = await foldProgress(
      chunksOf<ProgressChunk>({ status: 'creating model layer' }, { status: 'success' })
    );

    expect(result).toEqual({ status: 'success', layers: {}, last: { status: 'success' } });
  });

  it('should return no last chunk for an empty stream', async () => {
    const result = await foldProgress(chunksOf<ProgressChunk>());

    expect(result).toEqual({ status: 'success', layers: {} });
  });

  it('should decode progress chunks from a response body', async () => {
    const { stream } = trackedStream([
      '{"status":"pushing","digest":"sha:ccc","total":8,"completed":4}\n{"status":"push',
      'ing","digest":"sha:ccc","total":8,"completed":8}\n{"status":"success"}',
    ]);

    const result = await foldProgress(
      new ChunkStream(stream, createDecoder(ProgressChunkSchema, 'progress'), new NoopLogger())
    );

    expect(result.layers).toEqual({ 'sha:ccc': { status: 'pushing', total: 8, completed: 8 } });
    expect(result.last).toEqual({ status: 'success' });
  });
});

describe('foldChat', () => {
  it('should concatenate assistant fragments into the done chunk', async () => {
    const result = await foldChat(
      chunksOf<ChatChunk>(
        { model: 'llama2', message: { role: 'assistant', content: 'Hi' }, done: false },
        { model: 'llama2', message: { role: 'assistant', content: ' there' }, done: false },
        { model: 'llama2', done: true, eval_count: 2 }
      )
    );

    expect(result).toEqual({
      model: 'llama2',
      message: { role: 'assistant', content: 'Hi there' },
      done: true,
      eval_count: 2,
      status: 'success',
    });
  });

  it('should fail with the partial reply when no done chunk arrives', async () => {
    const error = await captureError(
      foldChat(chunksOf<ChatChunk>({ message: { role: 'assistant', content: 'Hi' }, done: false }))
    );

    expect(error).toBeInstanceOf(OllamaError);
    expect(error).toHaveProperty('code', OllamaErrorCode.STREAM_ERROR);
    expect(error).toHaveProperty('details', { partialResponse: 'Hi' });
  });
});
