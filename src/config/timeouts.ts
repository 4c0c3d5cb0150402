/**
 * Centralized timeout configuration
 *
 * Provider SDK clients are created with these values; the pipeline itself never
 * waits on anything else except retry backoff.
 */

/**
 * Timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Timeout for a single provider request (5 minutes)
   * Long chapters on slow models routinely take several minutes.
   */
  AI_REQUEST: 300000,

  /**
   * Timeout for testing provider connections (30 seconds)
   * Used for: validating credentials and model ids
   */
  TEST_CONNECTION: 30000,
} as const;

/**
 * Helper to get timeout in seconds (for display purposes)
 */
export function getTimeoutInSeconds(timeout: number): number {
  return Math.round(timeout / 1000);
}
