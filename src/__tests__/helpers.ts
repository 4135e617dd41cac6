/**
 * Shared test fixtures: in-process byte streams and a recording transport.
 */

import { vi } from 'vitest';
import type { OllamaConfig } from '../config/types.js';
import { InMemoryLogger } from '../observability/logging.js';
import type { HttpResponse, HttpTransport } from '../transport/types.js';

export interface StreamState {
  /** Parts handed to the reader so far */
  pulled: number;
  /** Whether the consumer cancelled the stream */
  cancelled: boolean;
}

/**
 * A byte stream that only produces a part when the reader asks for one.
 */
export function trackedStream(parts: Array<string | Uint8Array>): {
  stream: ReadableStream<Uint8Array>;
  state: StreamState;
} {
  const encoder = new TextEncoder();
  const state: StreamState = { pulled: 0, cancelled: false };

  const stream = new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        if (state.pulled >= parts.length) {
          controller.close();
          return;
        }
        const part = parts[state.pulled];
        state.pulled++;
        controller.enqueue(typeof part === 'string' ? encoder.encode(part) : part);
      },
      cancel() {
        state.cancelled = true;
      },
    },
    { highWaterMark: 0 }
  );

  return { stream, state };
}

/**
 * One line per object, each delivered as its own read.
 */
export function ndjsonParts(...objects: unknown[]): string[] {
  return objects.map((o) => `${JSON.stringify(o)}\n`);
}

export function testConfig(overrides: Partial<OllamaConfig> = {}): OllamaConfig {
  return {
    baseUrl: 'http://localhost:11434',
    timeoutMs: 5000,
    defaultHeaders: {},
    logger: new InMemoryLogger(),
    fetch: vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(),
    ...overrides,
  };
}

export interface RecordedCall {
  method: 'GET' | 'POST' | 'DELETE' | 'HEAD' | 'POST_STREAM';
  path: string;
  body?: unknown;
}

/**
 * Transport fake that records requests and serves canned replies.
 */
export class FakeTransport implements HttpTransport {
  readonly calls: RecordedCall[] = [];
  jsonBody: unknown = {};
  streamParts: Array<string | Uint8Array> = [];
  lastStream?: StreamState;
  failure?: Error;

  async get(path: string): Promise<HttpResponse> {
    this.calls.push({ method: 'GET', path });
    return this.reply();
  }

  async post<T>(path: string, body: T): Promise<HttpResponse> {
    this.calls.push({ method: 'POST', path, body });
    return this.reply();
  }

  async delete<T>(path: string, body: T): Promise<HttpResponse> {
    this.calls.push({ method: 'DELETE', path, body });
    return this.reply();
  }

  async head(path: string): Promise<number> {
    this.calls.push({ method: 'HEAD', path });
    if (this.failure) {
      throw this.failure;
    }
    return 200;
  }

  async postStreaming<T>(path: string, body: T): Promise<ReadableStream<Uint8Array>> {
    this.calls.push({ method: 'POST_STREAM', path, body });
    if (this.failure) {
      throw this.failure;
    }
    const { stream, state } = trackedStream(this.streamParts);
    this.lastStream = state;
    return stream;
  }

  private reply(): HttpResponse {
    if (this.failure) {
      throw this.failure;
    }
    return { status: 200, body: this.jsonBody };
  }
}

/**
 * Resolve to the rejection reason of a promise, or fail if it resolves.
 */
export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    (value) => {
      throw new Error(`Expected rejection, got ${JSON.stringify(value)}`);
    },
    (error: unknown) => error
  );
}
