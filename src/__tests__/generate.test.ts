/**
 * Generate service tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { OllamaClient } from '../client.js';
import { OllamaError, OllamaErrorCode, RequestError, UpstreamError } from '../types/errors.js';
import type { GenerateChunk } from '../types/generate.js';
import { captureError, FakeTransport, ndjsonParts, testConfig } from './helpers.js';

describe('GenerateService', () => {
  let transport: FakeTransport;
  let client: OllamaClient;

  beforeEach(() => {
    transport = new FakeTransport();
    client = new OllamaClient(testConfig(), transport);
  });

  describe('request body', () => {
    it('should send only the fields that carry a value', async () => {
      transport.streamParts = ndjsonParts({ response: '', done: true });

      await client.generate.create({
        model: 'llama2',
        prompt: 'Why is the sky blue?',
        system: '',
        template: '',
        context: [],
        options: {},
        raw: false,
      });

      expect(transport.calls).toEqual([
        {
          method: 'POST_STREAM',
          path: '/api/generate',
          body: { model: 'llama2', prompt: 'Why is the sky blue?' },
        },
      ]);
    });

    it('should forward every non-empty optional field', async () => {
      transport.streamParts = ndjsonParts({ response: '', done: true });

      await client.generate.create({
        model: 'llama2',
        prompt: 'Continue',
        system: 'Be brief.',
        template: '{{ .Prompt }}',
        context: [7, 8],
        options: { temperature: 0.2 },
        format: 'json',
        raw: true,
        images: ['aGVsbG8='],
        keep_alive: '5m',
      });

      expect(transport.calls[0]?.body).toEqual({
        model: 'llama2',
        prompt: 'Continue',
        system: 'Be brief.',
        template: '{{ .Prompt }}',
        context: [7, 8],
        options: { temperature: 0.2 },
        format: 'json',
        raw: true,
        images: ['aGVsbG8='],
        keep_alive: '5m',
      });
    });

    it('should omit an empty prompt', async () => {
      transport.streamParts = ndjsonParts({ response: '', done: true });

      await client.generate.create({ model: 'llama2', prompt: '' });

      expect(transport.calls[0]?.body).toEqual({ model: 'llama2' });
    });

    it('should fall back to the default model', async () => {
      const withDefault = new OllamaClient(testConfig({ defaultModel: 'mistral' }), transport);
      transport.streamParts = ndjsonParts({ response: '', done: true });

      await withDefault.generate.create({ prompt: 'Hi' });

      expect(transport.calls[0]?.body).toEqual({ model: 'mistral', prompt: 'Hi' });
    });

    it('should require a model when there is no default', async () => {
      const error = await captureError(client.generate.create({ prompt: 'Hi' }));

      expect(error).toBeInstanceOf(OllamaError);
      expect(error).toHaveProperty('code', OllamaErrorCode.VALIDATION_ERROR);
      expect(transport.calls).toEqual([]);
    });
  });

  describe('create', () => {
    it('should fold the stream into one result', async () => {
      transport.streamParts = ndjsonParts(
        { response: 'Hel', done: false },
        { response: 'lo', done: true }
      );

      const result = await client.generate.create({ model: 'llama2', prompt: 'Say hello' });

      expect(result).toEqual({ response: 'Hello', done: true, status: 'success' });
    });

    it('should surface an in-band error', async () => {
      transport.streamParts = ndjsonParts({ error: 'model "llama2" not found, try pulling it first' });

      const error = await captureError(client.generate.create({ model: 'llama2', prompt: 'Hi' }));

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toHaveProperty('message', 'model "llama2" not found, try pulling it first');
    });

    it('should propagate a request error', async () => {
      transport.failure = new RequestError(500, '{"error":"boom"}', 'boom');

      const error = await captureError(client.generate.create({ model: 'llama2', prompt: 'Hi' }));

      expect(error).toBe(transport.failure);
    });
  });

  describe('createStream', () => {
    it('should hand back the chunks lazily', async () => {
      transport.streamParts = ndjsonParts(
        { response: 'a', done: false },
        { response: 'b', done: false },
        { response: '', done: true, eval_count: 2 }
      );

      const stream = await client.generate.createStream({ model: 'llama2', prompt: 'Hi' });
      expect(transport.lastStream?.pulled).toBe(0);

      const seen: GenerateChunk[] = [];
      for await (const chunk of stream) {
        seen.push(chunk);
      }

      expect(seen).toEqual([
        { response: 'a', done: false },
        { response: 'b', done: false },
        { response: '', done: true, eval_count: 2 },
      ]);
    });
  });
});
