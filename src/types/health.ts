/**
 * Ollama Integration - Status Types
 */

/**
 * Outcome of an operation whose response carries no data
 */
export interface OperationStatus {
  status: 'success';
}

/**
 * Health status
 *
 * Indicates whether the Ollama server is running and accessible.
 */
export interface HealthStatus {
  /**
   * True if the server is reachable and responding
   */
  running: boolean;
}
