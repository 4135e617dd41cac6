/**
 * Streaming exports
 */

export { NdjsonParser } from './ndjson-parser.js';
export { ChunkStream } from './chunk-stream.js';
export { classifyChunk, createDecoder } from './decode.js';
export type { ChunkDecoder, DecodedChunk } from './decode.js';
export { foldChat, foldGenerate, foldProgress } from './folds.js';
