import { describeError, logger } from "../../logger.js";
import type {
  FetchFailure,
  FetchFailureReason,
  FetchResult,
  RetryEvent,
} from "../../types/scrape.js";
import { buildPageUrl } from "../jobs/url.js";
import type { RateLimiter } from "../limits/rate-limiter.js";
import type { IdentityPool } from "./identity.js";
import {
  classifyStatus,
  DEFAULT_RETRY_POLICY,
  initialRetryState,
  nextRetryStep,
  recordAttempt,
  type RetryPolicy,
} from "./retry.js";

export const DEFAULT_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "accept-language": "en-US,en;q=0.5",
};

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface PageFetcherOptions {
  urlTemplate: string;
  limiter: RateLimiter;
  identities: IdentityPool;
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  headers?: Record<string, string>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface FetchPageHooks {
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Anything the orchestrator can pull listing markup from.
 */
export interface PageSource {
  fetch(pageNumber: number, hooks?: FetchPageHooks): Promise<FetchResult>;
}

type AttemptOutcome =
  | { ok: true; url: string; markup: string; statusCode: number }
  | { ok: false; reason: FetchFailureReason };

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

const discardBody = async (response: Response, url: string) => {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug("Failed to discard response body", {
      url,
      error: describeError(error),
    });
  }
};

/**
 * Fetches one listing page per call. Each attempt takes its own rate-limiter
 * slot and identity; failures come back as a `fail` result, never as a
 * rejection.
 */
export class PageFetcher implements PageSource {
  private readonly urlTemplate: string;
  private readonly limiter: RateLimiter;
  private readonly identities: IdentityPool;
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: PageFetcherOptions) {
    this.urlTemplate = options.urlTemplate;
    this.limiter = options.limiter;
    this.identities = options.identities;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = { ...DEFAULT_REQUEST_HEADERS, ...(options.headers ?? {}) };
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async fetch(pageNumber: number, hooks: FetchPageHooks = {}): Promise<FetchResult> {
    const url = buildPageUrl(this.urlTemplate, pageNumber);
    let state = initialRetryState(this.retryPolicy);

    while (true) {
      state = recordAttempt(state);
      const outcome = await this.attempt(url, pageNumber, state.attempt);

      if (outcome.ok) {
        logger.info("Fetched listing page", {
          pageNumber,
          url: outcome.url,
          status: outcome.statusCode,
          attempts: state.attempt,
          bytes: Buffer.byteLength(outcome.markup, "utf8"),
        });
        return {
          status: "success",
          url: outcome.url,
          markup: outcome.markup,
          statusCode: outcome.statusCode,
          attempts: state.attempt,
        };
      }

      const step = nextRetryStep(
        this.retryPolicy,
        state,
        outcome.reason,
        this.random,
      );

      if (step.action === "stop") {
        return this.buildFailure(url, pageNumber, outcome.reason, state.attempt);
      }

      logger.warn("Retrying listing page", {
        pageNumber,
        url,
        attempt: state.attempt,
        delayMs: step.delayMs,
        reason: outcome.reason.kind,
        message: outcome.reason.message,
      });
      hooks.onRetry?.({
        pageNumber,
        attempt: state.attempt,
        delayMs: step.delayMs,
        reason: outcome.reason,
      });

      state = step.state;
      await this.sleep(step.delayMs);
    }
  }

  /**
   * Single request, no retries. The timeout covers reading the body too.
   */
  private async attempt(
    url: string,
    pageNumber: number,
    attempt: number,
  ): Promise<AttemptOutcome> {
    const release = await this.limiter.acquire();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          ...this.headers,
          "user-agent": this.identities.pick(pageNumber, attempt),
        },
        signal: controller.signal,
        redirect: "follow",
      });

      const statusClass = classifyStatus(response.status);
      if (statusClass === "ok") {
        // Relative links on the page resolve against where redirects ended.
        return {
          ok: true,
          url: response.url || url,
          markup: await response.text(),
          statusCode: response.status,
        };
      }

      await discardBody(response, url);
      const message = `HTTP ${response.status} ${response.statusText}`.trim();
      return {
        ok: false,
        reason:
          statusClass === "transient"
            ? { kind: "http-error", statusCode: response.status, message }
            : { kind: "http-client-error", statusCode: response.status, message },
      };
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          ok: false,
          reason: {
            kind: "timeout",
            message: `Request timed out after ${this.timeoutMs}ms`,
          },
        };
      }

      return {
        ok: false,
        reason: { kind: "network-error", message: describeError(error) },
      };
    } finally {
      clearTimeout(timeout);
      release();
    }
  }

  private buildFailure(
    url: string,
    pageNumber: number,
    reason: FetchFailureReason,
    attempts: number,
  ): FetchFailure {
    logger.error("Listing page fetch failed", {
      pageNumber,
      url,
      attempts,
      reason: reason.kind,
      message: reason.message,
    });
    return { status: "fail", url, reason, attempts };
  }
}

/**
 * One unretried GET of the first listing page, used as a readiness check.
 */
export const verifyTarget = async (
  urlTemplate: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<void> => {
  const url = buildPageUrl(urlTemplate, 1);
  const response = await fetch(url, {
    method: "GET",
    headers: { ...DEFAULT_REQUEST_HEADERS },
    signal: AbortSignal.timeout(timeoutMs),
  });
  await discardBody(response, url);

  if (!response.ok) {
    throw new Error(
      `Target healthcheck failed with status ${response.status} ${response.statusText}`,
    );
  }
};
