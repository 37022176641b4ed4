import {
  getEnv,
  loadSiteProfile,
  resolveRunOptions,
  type RunOptions,
} from "./config/index.js";
import { createIdentityPool } from "./core/fetch/identity.js";
import { PageFetcher } from "./core/fetch/page-fetcher.js";
import {
  intervalFromRequestsPerSecond,
  RateLimiter,
} from "./core/limits/rate-limiter.js";
import { createPageParser } from "./core/parse/page-parser.js";
import { Orchestrator } from "./core/pipeline/orchestrator.js";
import type { RunEventListener, RunSummary } from "./types/scrape.js";

export interface ScrapeRunHooks {
  onEvent?: RunEventListener;
  /** Replaces backoff and spacing waits; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Wire one run: a limiter shared by every fetch of the run, the identity
 * pool, the fetcher, the profile-driven parser and the orchestrator.
 */
export const createScrapeRun = (
  options: RunOptions,
  hooks: ScrapeRunHooks = {},
): Orchestrator => {
  const limiter = new RateLimiter({
    maxConcurrent: options.concurrency,
    minIntervalMs: intervalFromRequestsPerSecond(options.requestsPerSecond),
    sleep: hooks.sleep,
  });

  const identities = createIdentityPool({
    userAgents: options.userAgents,
    size: options.userAgentPoolSize,
    strategy: options.identityStrategy,
    random: hooks.random,
  });

  const source = new PageFetcher({
    urlTemplate: options.urlTemplate,
    limiter,
    identities,
    retryPolicy: options.retryPolicy,
    timeoutMs: options.timeoutMs,
    headers: options.profile.headers,
    sleep: hooks.sleep,
    random: hooks.random,
  });

  return new Orchestrator({
    pageCount: options.pageCount,
    concurrency: options.concurrency,
    source,
    parse: createPageParser(options.profile),
    defaultCurrency: options.profile.currency,
    onEvent: hooks.onEvent,
  });
};

export const runScrape = (
  options: RunOptions,
  hooks: ScrapeRunHooks = {},
): Promise<RunSummary> => createScrapeRun(options, hooks).run();

/**
 * Load a site profile and resolve overrides against it. Throws
 * `ConfigurationError` before any network activity.
 */
export const prepareRun = async (
  overrides: unknown = {},
  profilePath?: string,
): Promise<RunOptions> => {
  const profile = await loadSiteProfile(
    profilePath ?? getEnv().SCRAPER_SITE_PROFILE,
  );
  return resolveRunOptions(profile, overrides);
};
