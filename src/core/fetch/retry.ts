import type { FetchFailureReason } from "../../types/scrape.js";

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Fraction of each delay that may be shaved off at random (0 disables jitter). */
  jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1_000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterRatio: 0.2,
};

export type StatusClass = "ok" | "transient" | "terminal";

export const classifyStatus = (statusCode: number): StatusClass => {
  if (statusCode >= 200 && statusCode < 300) return "ok";
  if (statusCode === 429 || statusCode >= 500) return "transient";
  return "terminal";
};

export const isTransient = (reason: FetchFailureReason): boolean =>
  reason.kind !== "http-client-error";

export interface RetryState {
  /** Attempts made so far. */
  attempt: number;
  /** Un-jittered delay to wait before the next attempt. */
  nextDelayMs: number;
}

export type RetryStep =
  | { action: "retry"; delayMs: number; state: RetryState }
  | { action: "stop"; state: RetryState };

export const initialRetryState = (policy: RetryPolicy): RetryState => ({
  attempt: 0,
  nextDelayMs: Math.min(policy.initialDelayMs, policy.maxDelayMs),
});

export const recordAttempt = (state: RetryState): RetryState => ({
  ...state,
  attempt: state.attempt + 1,
});

export const applyJitter = (
  delayMs: number,
  jitterRatio: number,
  random: () => number,
): number => {
  if (jitterRatio <= 0 || delayMs <= 0) return delayMs;
  const ratio = Math.min(1, jitterRatio);
  return Math.round(delayMs * (1 - ratio * random()));
};

/**
 * Decide what follows a failed attempt. Pure: the caller owns the clock and
 * performs the sleep.
 */
export const nextRetryStep = (
  policy: RetryPolicy,
  state: RetryState,
  reason: FetchFailureReason,
  random: () => number = Math.random,
): RetryStep => {
  if (!isTransient(reason) || state.attempt >= policy.maxAttempts) {
    return { action: "stop", state };
  }

  return {
    action: "retry",
    delayMs: applyJitter(state.nextDelayMs, policy.jitterRatio, random),
    state: {
      attempt: state.attempt,
      nextDelayMs: Math.min(
        state.nextDelayMs * policy.backoffMultiplier,
        policy.maxDelayMs,
      ),
    },
  };
};
