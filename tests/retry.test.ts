import { describe, expect, it } from "vitest";
import {
  applyJitter,
  classifyStatus,
  initialRetryState,
  nextRetryStep,
  recordAttempt,
  type RetryPolicy,
} from "../src/core/fetch/retry.js";
import type { FetchFailureReason } from "../src/types/scrape.js";

const policy: RetryPolicy = {
  maxAttempts: 4,
  initialDelayMs: 100,
  maxDelayMs: 250,
  backoffMultiplier: 2,
  jitterRatio: 0,
};

const serverError: FetchFailureReason = {
  kind: "http-error",
  statusCode: 503,
  message: "HTTP 503 Service Unavailable",
};

describe("classifyStatus", () => {
  it("separates success, transient and terminal statuses", () => {
    expect(classifyStatus(200)).toBe("ok");
    expect(classifyStatus(204)).toBe("ok");
    expect(classifyStatus(429)).toBe("transient");
    expect(classifyStatus(500)).toBe("transient");
    expect(classifyStatus(503)).toBe("transient");
    expect(classifyStatus(404)).toBe("terminal");
    expect(classifyStatus(403)).toBe("terminal");
  });
});

describe("nextRetryStep", () => {
  it("doubles the delay up to the cap and stops at maxAttempts", () => {
    const delays: number[] = [];
    let state = initialRetryState(policy);

    while (true) {
      state = recordAttempt(state);
      const step = nextRetryStep(policy, state, serverError);
      if (step.action === "stop") break;
      delays.push(step.delayMs);
      state = step.state;
    }

    expect(delays).toEqual([100, 200, 250]);
    expect(state.attempt).toBe(4);
  });

  it("stops immediately on a client error", () => {
    const state = recordAttempt(initialRetryState(policy));
    const step = nextRetryStep(policy, state, {
      kind: "http-client-error",
      statusCode: 404,
      message: "HTTP 404 Not Found",
    });

    expect(step.action).toBe("stop");
  });

  it("retries timeouts and network errors", () => {
    const state = recordAttempt(initialRetryState(policy));

    expect(
      nextRetryStep(policy, state, { kind: "timeout", message: "slow" }).action,
    ).toBe("retry");
    expect(
      nextRetryStep(policy, state, { kind: "network-error", message: "reset" }).action,
    ).toBe("retry");
  });
});

describe("applyJitter", () => {
  it("shaves at most the jitter ratio off the delay", () => {
    expect(applyJitter(1_000, 0.2, () => 0.5)).toBe(900);
    expect(applyJitter(1_000, 0.2, () => 0)).toBe(1_000);
  });

  it("returns the delay untouched when jitter is disabled", () => {
    expect(applyJitter(1_000, 0, () => 0.9)).toBe(1_000);
  });
});
