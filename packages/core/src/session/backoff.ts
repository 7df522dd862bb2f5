import {
  DEFAULT_RECONNECT_ATTEMPTS,
  DEFAULT_RECONNECT_BASE_DELAY,
  DEFAULT_RECONNECT_MAX_DELAY,
} from '@rexec/shared';

export interface ReconnectPolicy {
  /** Total connect attempts per establish, including the first. */
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  maxAttempts: DEFAULT_RECONNECT_ATTEMPTS,
  baseDelay: DEFAULT_RECONNECT_BASE_DELAY,
  maxDelay: DEFAULT_RECONNECT_MAX_DELAY,
};

export function resolvePolicy(overrides: Partial<ReconnectPolicy> = {}): ReconnectPolicy {
  return {
    maxAttempts: Math.max(1, overrides.maxAttempts ?? DEFAULT_RECONNECT_POLICY.maxAttempts),
    baseDelay: overrides.baseDelay ?? DEFAULT_RECONNECT_POLICY.baseDelay,
    maxDelay: overrides.maxDelay ?? DEFAULT_RECONNECT_POLICY.maxDelay,
  };
}

/**
 * Exponential backoff with jitter for the given 1-based attempt, capped at
 * `maxDelay`.
 */
export function backoffDelay(
  attempt: number,
  policy: ReconnectPolicy,
  random: () => number = Math.random,
): number {
  const exponentialDelay = policy.baseDelay * Math.pow(2, Math.min(attempt - 1, 10));
  const jitter = random() * policy.baseDelay;
  return Math.min(exponentialDelay + jitter, policy.maxDelay);
}
