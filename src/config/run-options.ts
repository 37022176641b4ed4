import { z } from "zod";
import { assertUrlTemplate } from "../core/jobs/url.js";
import type { RetryPolicy } from "../core/fetch/retry.js";
import type { IdentityStrategy } from "../core/fetch/identity.js";
import { getEnv, type RuntimeEnv } from "./env.js";
import { ConfigurationError } from "./errors.js";
import type { SiteProfile } from "./site-profile.js";

/**
 * Per-run overrides supplied by the CLI or an HTTP request. Anything left out
 * falls back to the environment, then to the site profile.
 */
export const runOverridesSchema = z
  .object({
    urlTemplate: z.string().trim().min(1).optional(),
    pageCount: z.number().int().min(1, "Page count must be at least 1").optional(),
    concurrency: z.number().int().min(1, "Concurrency must be at least 1").optional(),
    requestsPerSecond: z.number().min(0).optional(),
    timeoutMs: z.number().int().min(1).optional(),
    maxAttempts: z.number().int().min(1).optional(),
    backoffBaseMs: z.number().int().min(0).optional(),
    backoffMaxMs: z.number().int().min(0).optional(),
    jitterRatio: z.number().min(0).max(1).optional(),
    userAgents: z.array(z.string().trim().min(1)).min(1).optional(),
    identityStrategy: z.enum(["random", "rotate"]).optional(),
  })
  .strict();

export type RunOverrides = z.infer<typeof runOverridesSchema>;

export interface RunOptions {
  profile: SiteProfile;
  urlTemplate: string;
  pageCount: number;
  concurrency: number;
  requestsPerSecond: number;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  userAgents?: string[];
  userAgentPoolSize: number;
  identityStrategy: IdentityStrategy;
}

export const resolveRunOptions = (
  profile: SiteProfile,
  overrides: unknown = {},
  env: RuntimeEnv = getEnv(),
): RunOptions => {
  const parsed = runOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid run options: ${issues}`, "invalid_option", issues);
  }

  const input = parsed.data;
  const initialDelayMs = input.backoffBaseMs ?? env.SCRAPER_BACKOFF_BASE_MS;
  const userAgents =
    input.userAgents ??
    (env.SCRAPER_USER_AGENTS && env.SCRAPER_USER_AGENTS.length > 0
      ? env.SCRAPER_USER_AGENTS
      : undefined);

  return {
    profile,
    urlTemplate: assertUrlTemplate(
      input.urlTemplate ?? env.SCRAPER_URL_TEMPLATE ?? profile.urlTemplate,
    ),
    pageCount: input.pageCount ?? env.SCRAPER_PAGE_COUNT,
    concurrency: input.concurrency ?? env.SCRAPER_CONCURRENCY,
    requestsPerSecond: input.requestsPerSecond ?? env.SCRAPER_REQUESTS_PER_SECOND,
    timeoutMs: input.timeoutMs ?? env.SCRAPER_TIMEOUT_MS,
    retryPolicy: {
      maxAttempts: input.maxAttempts ?? env.SCRAPER_MAX_ATTEMPTS,
      initialDelayMs,
      maxDelayMs: Math.max(initialDelayMs, input.backoffMaxMs ?? env.SCRAPER_BACKOFF_MAX_MS),
      backoffMultiplier: 2,
      jitterRatio: input.jitterRatio ?? env.SCRAPER_BACKOFF_JITTER,
    },
    userAgents,
    userAgentPoolSize: env.SCRAPER_USER_AGENT_POOL_SIZE,
    identityStrategy: input.identityStrategy ?? env.SCRAPER_IDENTITY_STRATEGY,
  };
};
