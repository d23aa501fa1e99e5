export const RECONNECT_BASE_DELAY_MS = 1000
export const RECONNECT_MAX_DELAY_MS = 10_000
export const MAX_RECONNECT_ATTEMPTS = 5

export interface ReconnectPolicy {
  baseDelayMs: number
  maxDelayMs: number
  maxAttempts: number
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: RECONNECT_BASE_DELAY_MS,
  maxDelayMs: RECONNECT_MAX_DELAY_MS,
  maxAttempts: MAX_RECONNECT_ATTEMPTS,
}

/** Delay before retry number `attempt` (0-based), or null once the policy is exhausted. */
export function computeReconnectDelay(
  attempt: number,
  policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY,
): number | null {
  if (attempt < 0 || attempt >= policy.maxAttempts) {
    return null
  }

  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs)
}
