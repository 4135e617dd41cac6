/**
 * Chat Service - Re-exports
 */

export { ChatService, type ChatServiceDeps } from './service.js';
