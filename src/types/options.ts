/**
 * Ollama Integration - Model Options
 *
 * Runtime parameters forwarded verbatim in the `options` field.
 */

/**
 * Model inference options
 *
 * The server accepts more keys than listed here; unknown keys are passed through.
 */
export interface ModelOptions {
  /** Sampling temperature. Higher is more random. */
  temperature?: number;
  /** Nucleus sampling threshold. */
  top_p?: number;
  /** Sample only from the k most likely tokens. */
  top_k?: number;
  /** Maximum tokens to predict, -1 for unbounded. */
  num_predict?: number;
  /** Stop sequences. */
  stop?: string[];
  /** Context window size in tokens. */
  num_ctx?: number;
  /** Number of layers to offload to the GPU. */
  num_gpu?: number;
  /** Penalty applied to repeated tokens. */
  repeat_penalty?: number;
  /** Random seed for reproducible output. */
  seed?: number;
  [key: string]: unknown;
}
