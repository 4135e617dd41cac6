/**
 * Transport Layer Exports
 */

export type { HttpTransport, HttpResponse, HttpMethod } from './types.js';
export { HttpTransportImpl } from './http.js';
