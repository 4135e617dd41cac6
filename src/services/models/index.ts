/**
 * Models Service - Re-exports
 *
 * Provides model management capabilities for the Ollama client.
 */

export { ModelsService, type ModelsServiceDeps } from './service.js';
