/**
 * Generate Service - Re-exports
 */

export { GenerateService, type GenerateServiceDeps } from './service.js';
