/**
 * @shardvault/runtime: Retry with exponential backoff, in blocks.
 *
 * Components cannot sleep. A retry is a request re-issued with
 * `delayBlocks`, so backoff is measured in block heights.
 *
 * Backoff formula: min(baseDelayBlocks * 2^attempt + jitter, maxDelayBlocks)
 * where jitter = random(0, jitterBlocks), rounded down
 */

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 3 */
  readonly maxAttempts: number;
  /** Base delay in blocks before the first retry. Default: 1 */
  readonly baseDelayBlocks: number;
  /** Maximum delay in blocks between retries. Default: 16 */
  readonly maxDelayBlocks: number;
  /** Maximum random jitter in blocks added to each delay. Default: 0 */
  readonly jitterBlocks: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayBlocks: 1,
  maxDelayBlocks: 16,
  jitterBlocks: 0,
};

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 * @param random - Source of jitter in [0, 1). Default: Math.random
 * @returns Delay in whole blocks
 */
export function computeDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayBlocks * Math.pow(2, attempt);
  const jitter = Math.floor(random() * (config.jitterBlocks + 1));
  return Math.min(exponential + jitter, config.maxDelayBlocks);
}

/**
 * Whether another attempt is allowed after `attemptsMade` attempts.
 */
export function canRetry(attemptsMade: number, config: RetryConfig): boolean {
  return attemptsMade < config.maxAttempts;
}
