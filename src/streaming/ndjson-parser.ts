/**
 * NDJSON Stream Parser
 *
 * Parses newline-delimited JSON (NDJSON) streams from the Ollama API.
 */

import { OllamaError } from '../types/errors.js';

/**
 * Parser for newline-delimited JSON streams
 *
 * Handles:
 * - Buffering of partial lines across reads
 * - UTF-8 decoding of characters split across reads
 * - Skipping empty lines
 * - A final line without trailing newline
 *
 * A line that is not valid JSON fails the stream.
 */
export class NdjsonParser {
  private buffer = '';
  private decoder = new TextDecoder('utf-8');

  /**
   * Parse NDJSON stream
   *
   * Yields one parsed value per non-empty line, only as the consumer pulls.
   *
   * @param stream - Async iterable of raw bytes
   */
  async *parse(stream: AsyncIterable<Uint8Array>): AsyncGenerator<unknown, void, undefined> {
    try {
      for await (const chunk of stream) {
        this.buffer += this.decoder.decode(chunk, { stream: true });
        yield* this.drainLines();
      }

      // Flush decoder and emit whatever is left without a newline
      this.buffer += this.decoder.decode();
      const rest = this.buffer.trim();
      this.buffer = '';
      if (rest) {
        yield parseLine(rest);
      }
    } finally {
      this.buffer = '';
      this.decoder = new TextDecoder('utf-8');
    }
  }

  private *drainLines(): Generator<unknown, void, undefined> {
    let newlineIndex = this.buffer.indexOf('\n');

    while (newlineIndex !== -1) {
      const line = this.buffer.slice(0, newlineIndex).trim();
      this.buffer = this.buffer.slice(newlineIndex + 1);

      if (line) {
        yield parseLine(line);
      }

      newlineIndex = this.buffer.indexOf('\n');
    }
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    throw OllamaError.streamError(
      `Invalid JSON line in stream: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
