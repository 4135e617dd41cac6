/**
 * Ollama Integration - Model Management Types
 *
 * Types for model listing, details, and management.
 */

import { z } from 'zod';

/**
 * Model details
 *
 * Metadata about model architecture and configuration.
 */
export interface ModelDetails {
  /** Model format, e.g. "gguf" */
  format?: string;
  /** Model family, e.g. "llama" */
  family?: string;
  /** All model families */
  families?: string[] | null;
  /** Parameter size, e.g. "7B" */
  parameter_size?: string;
  /** Quantization level, e.g. "Q4_0" */
  quantization_level?: string;
  [key: string]: unknown;
}

/**
 * Model summary
 *
 * One entry of the local model list.
 */
export interface ModelSummary {
  /**
   * Model name including tag
   */
  name: string;

  /**
   * Last modified timestamp (ISO 8601)
   */
  modified_at?: string;

  /**
   * Model size in bytes
   */
  size?: number;

  /**
   * Manifest digest
   */
  digest?: string;

  /**
   * Model details
   */
  details?: ModelDetails;

  [key: string]: unknown;
}

/**
 * Model information returned by show
 */
export interface ModelInfo {
  /** Model license */
  license?: string;
  /** Modelfile contents */
  modelfile?: string;
  /** Serialized parameter configuration */
  parameters?: string;
  /** Prompt template */
  template?: string;
  /** Default system prompt */
  system?: string;
  /** Model details */
  details?: ModelDetails;
  [key: string]: unknown;
}

/**
 * Create request
 *
 * Either `path` (a Modelfile on the server's filesystem) or `modelfile`
 * (its contents) must be given.
 */
export interface CreateRequest {
  /** Name of the model to create */
  name: string;
  /** Path to a Modelfile */
  path?: string;
  /** Modelfile contents */
  modelfile?: string;
}

/**
 * Pull and push request
 */
export interface TransferRequest {
  /** Model name, optionally with registry namespace and tag */
  name: string;
  /** Allow insecure connections to the registry */
  insecure?: boolean;
}

/**
 * Copy request
 */
export interface CopyRequest {
  /** Existing model */
  source: string;
  /** Name of the new model */
  destination: string;
}

const ModelDetailsSchema = z
  .object({
    format: z.string().optional(),
    family: z.string().optional(),
    families: z.array(z.string()).nullish(),
    parameter_size: z.string().optional(),
    quantization_level: z.string().optional(),
  })
  .passthrough();

export const ModelSummarySchema: z.ZodType<ModelSummary, z.ZodTypeDef, unknown> = z
  .object({
    name: z.string(),
    modified_at: z.string().optional(),
    size: z.number().optional(),
    digest: z.string().optional(),
    details: ModelDetailsSchema.optional(),
  })
  .passthrough();

export const ModelListSchema = z
  .object({
    models: z.array(ModelSummarySchema).nullish(),
  })
  .passthrough();

export const ModelInfoSchema: z.ZodType<ModelInfo, z.ZodTypeDef, unknown> = z
  .object({
    license: z.string().optional(),
    modelfile: z.string().optional(),
    parameters: z.string().optional(),
    template: z.string().optional(),
    system: z.string().optional(),
    details: ModelDetailsSchema.optional(),
  })
  .passthrough();
