/**
 * Lazy chunk stream over a streaming response body
 */

import type { Logger } from '../observability/logging.js';
import { OllamaError } from '../types/errors.js';
import type { ChunkDecoder } from './decode.js';
import { NdjsonParser } from './ndjson-parser.js';

/**
 * Single-pass async iterable of decoded chunks.
 *
 * Chunks are read from the network only as the consumer pulls them. Leaving
 * the loop early, an error thrown by the decoder or the loop body, and
 * `close()` all cancel the response body so the connection is released.
 *
 * @example
 * ```typescript
 * for await (const chunk of await client.generate.createStream(request)) {
 *   process.stdout.write(chunk.response);
 * }
 * ```
 */
export class ChunkStream<T> implements AsyncIterable<T> {
  private readonly body: ReadableStream<Uint8Array>;
  private readonly decode: ChunkDecoder<T>;
  private readonly logger: Logger;
  private consumed = false;
  private reading = false;
  private cancelled = false;

  constructor(body: ReadableStream<Uint8Array>, decode: ChunkDecoder<T>, logger: Logger) {
    this.body = body;
    this.decode = decode;
    this.logger = logger;
  }

  /**
   * Whether iteration has started or the stream was closed
   */
  get isConsumed(): boolean {
    return this.consumed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw OllamaError.streamError('Stream has already been consumed');
    }
    this.consumed = true;
    const chunks = this.iterate();

    // A generator that never started skips its finally block, so the body is
    // cancelled here when the iterator is closed before the first read.
    return {
      next: () => chunks.next(),
      return: async () => {
        await this.cancelUnread();
        return chunks.return(undefined);
      },
      throw: async (error?: unknown) => {
        await this.cancelUnread();
        return chunks.throw(error);
      },
    };
  }

  /**
   * Abandon the stream
   *
   * Cancels the body unless an iteration is already reading it; that
   * iteration releases the body itself when it is left.
   */
  async close(): Promise<void> {
    this.consumed = true;
    await this.cancelUnread();
  }

  private async cancelUnread(): Promise<void> {
    if (this.reading || this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.logger.debug('Stream closed before reading, cancelling response body');
    await this.body.cancel();
  }

  private async *iterate(): AsyncGenerator<T, void, undefined> {
    if (this.cancelled) {
      return;
    }
    this.reading = true;
    const reader = this.body.getReader();
    const parser = new NdjsonParser();
    let exhausted = false;
    let count = 0;

    try {
      const source = (async function* () {
        while (true) {
          const { done, value } = await reader.read().catch((error: unknown) => {
            throw OllamaError.streamError(
              `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`
            );
          });
          if (done) {
            return;
          }
          yield value;
        }
      })();

      for await (const value of parser.parse(source)) {
        const chunk = this.decode(value);
        count++;
        yield chunk;
      }
      exhausted = true;
      this.logger.trace('Stream exhausted', { chunks: count });
    } finally {
      if (!exhausted) {
        this.logger.debug('Stream abandoned, cancelling response body', { chunks: count });
        await reader.cancel().catch((error: unknown) => {
          this.logger.debug('Failed to cancel response body', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      }
      reader.releaseLock();
    }
  }
}
