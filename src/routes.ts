import { randomUUID } from "node:crypto";
import { zValidator } from "@hono/zod-validator";
import type { Hono } from "hono";
import { streamText } from "hono/streaming";
import { z } from "zod";
import {
  ConfigurationError,
  type RunOptions,
  type RunOverrides,
} from "./config/index.js";
import { PAGE_PLACEHOLDER } from "./core/jobs/url.js";
import { verifyTarget } from "./core/fetch/page-fetcher.js";
import { describeError, logger } from "./logger.js";
import { prepareRun, runScrape, type ScrapeRunHooks } from "./scraper.js";
import type { RunEvent } from "./types/scrape.js";

export const MAX_PAGES_PER_REQUEST = 500;

/**
 * Shape of the `/runs` payload. Omitted fields fall back to the environment
 * and the bundled site profile.
 */
export const runRequestSchema = z
  .object({
    pages: z.number().int().min(1).max(MAX_PAGES_PER_REQUEST).optional(),
    concurrency: z.number().int().min(1).max(50).optional(),
    urlTemplate: z
      .string()
      .trim()
      .url()
      .refine((value) => value.includes(PAGE_PLACEHOLDER), {
        message: `URL template must contain ${PAGE_PLACEHOLDER}`,
      })
      .optional(),
    requestsPerSecond: z.number().min(0).max(100).optional(),
    maxAttempts: z.number().int().min(1).max(10).optional(),
    timeoutMs: z.number().int().min(100).max(120_000).optional(),
    backoffBaseMs: z.number().int().min(0).max(60_000).optional(),
    userAgents: z.array(z.string().trim().min(1)).min(1).optional(),
  })
  .strict();

export type RunRequest = z.infer<typeof runRequestSchema>;

export const buildRunOverrides = (request: RunRequest): RunOverrides => ({
  pageCount: request.pages,
  concurrency: request.concurrency,
  urlTemplate: request.urlTemplate,
  requestsPerSecond: request.requestsPerSecond,
  maxAttempts: request.maxAttempts,
  timeoutMs: request.timeoutMs,
  backoffBaseMs: request.backoffBaseMs,
  userAgents: request.userAgents,
});

export interface RouteOptions {
  profilePath?: string;
  runHooks?: ScrapeRunHooks;
}

/**
 * Register health and run routes. The run handler emits one JSON line per
 * run event and finishes with a summary line, so clients can render progress
 * without waiting for the whole run.
 */
export const registerRoutes = (app: Hono, options: RouteOptions = {}) => {
  app.get("/health", async (c) => {
    try {
      const runOptions = await prepareRun({}, options.profilePath);
      await verifyTarget(runOptions.urlTemplate, runOptions.timeoutMs);
      return c.json({ status: "healthy" });
    } catch (error) {
      const message = describeError(error);
      logger.error("Health check failed", { message });
      return c.json({ status: "unhealthy", error: message }, 503);
    }
  });

  app.post(
    "/runs",
    zValidator("json", runRequestSchema, (result, c) => {
      if (!result.success) {
        return c.json(
          {
            ok: false,
            error: "Invalid request payload",
            details: result.error.flatten(),
          },
          400,
        );
      }
    }),
    async (c) => {
      const request = c.req.valid("json");

      let runOptions: RunOptions;
      try {
        runOptions = await prepareRun(buildRunOverrides(request), options.profilePath);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          return c.json({ ok: false, error: error.message, issue: error.issue }, 400);
        }
        throw error;
      }

      const runId = randomUUID();
      logger.info("Accepted scrape run", {
        runId,
        pageCount: runOptions.pageCount,
        concurrency: runOptions.concurrency,
      });

      return streamText(c, async (stream) => {
        let writes = Promise.resolve();
        const onEvent = (event: RunEvent) => {
          writes = writes.then(async () => {
            await stream.writeln(JSON.stringify({ runId, ...event }));
          });
        };

        const summary = await runScrape(runOptions, {
          ...options.runHooks,
          onEvent,
        });

        await writes;
        // The summary line tells streaming readers the run is over.
        await stream.writeln(JSON.stringify({ runId, type: "summary", summary }));
      });
    },
  );
};
