// =============================================================================
// FakeTrace - Retry Backoff
// =============================================================================

export interface RetryConfig {
  /** Unconfirmed attempts after which a stalled call is reported as a warning. */
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  jitterFactor: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
}

/**
 * Delay before the next try after `attempt` failed tries (1-based):
 * initialDelay * multiplier^(attempt-1), jittered by ±jitterFactor/2, capped at maxDelay.
 */
export function computeBackoff(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1)
  const delay = Math.min(config.initialDelayMs * config.backoffMultiplier ** exponent, config.maxDelayMs)
  const jitter = delay * config.jitterFactor * (random() - 0.5)
  return Math.max(0, Math.round(Math.min(delay + jitter, config.maxDelayMs)))
}

