import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../src/config/errors.js";
import type { FetchPageHooks, PageSource } from "../src/core/fetch/page-fetcher.js";
import { createPageParser } from "../src/core/parse/page-parser.js";
import { Orchestrator } from "../src/core/pipeline/orchestrator.js";
import type { FetchResult, RunEvent } from "../src/types/scrape.js";
import { ATTIC, listingPage, TEST_PROFILE, VELVET } from "./fixtures/listing.js";

const NOW = new Date("2024-05-01T10:00:00.000Z");

const pageUrl = (pageNumber: number) =>
  `https://shop.test/catalogue/page-${pageNumber}.html`;

const success = (pageNumber: number, markup: string): FetchResult => ({
  status: "success",
  url: pageUrl(pageNumber),
  markup,
  statusCode: 200,
  attempts: 1,
});

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-memory page source: answers from a fixed table, optionally after a
 * per-page delay, and records how many fetches overlap.
 */
class StubSource implements PageSource {
  readonly calls: number[] = [];
  active = 0;
  peak = 0;

  constructor(
    private readonly pages: (pageNumber: number, hooks: FetchPageHooks) => FetchResult,
    private readonly delays: Record<number, number> = {},
  ) {}

  async fetch(pageNumber: number, hooks: FetchPageHooks = {}): Promise<FetchResult> {
    this.calls.push(pageNumber);
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    await delay(this.delays[pageNumber] ?? 1);
    this.active -= 1;
    return this.pages(pageNumber, hooks);
  }
}

const mixedRun = () =>
  new StubSource((pageNumber, hooks) => {
    if (pageNumber === 1) return success(1, listingPage([ATTIC, VELVET]));
    if (pageNumber === 2) {
      hooks.onRetry?.({
        pageNumber: 2,
        attempt: 1,
        delayMs: 100,
        reason: { kind: "http-error", statusCode: 500, message: "HTTP 500 Internal Server Error" },
      });
      return {
        status: "fail",
        url: pageUrl(2),
        reason: { kind: "http-error", statusCode: 500, message: "HTTP 500 Internal Server Error" },
        attempts: 3,
      };
    }
    return success(pageNumber, listingPage([{ ...ATTIC, price: "Contact us" }]));
  });

const createOrchestrator = (
  source: PageSource,
  overrides: { pageCount?: number; concurrency?: number; onEvent?: (event: RunEvent) => void } = {},
) =>
  new Orchestrator({
    pageCount: overrides.pageCount ?? 3,
    concurrency: overrides.concurrency ?? 2,
    source,
    parse: createPageParser(TEST_PROFILE),
    defaultCurrency: TEST_PROFILE.currency,
    onEvent: overrides.onEvent,
    now: () => NOW,
  });

describe("Orchestrator.run", () => {
  it("collects records and errors from a mixed run", async () => {
    const summary = await createOrchestrator(mixedRun()).run();

    expect(summary.records.map((record) => [record.pageNumber, record.name])).toEqual([
      [1, "A Light in the Attic"],
      [1, "Tipping the Velvet"],
    ]);
    expect(summary.records[0]).toMatchObject({
      position: 0,
      price: 51.77,
      currency: "GBP",
      availability: "in-stock",
      url: "https://shop.test/catalogue/a-light-in-the-attic_1000/index.html",
      scrapedAt: "2024-05-01T10:00:00.000Z",
    });
    expect(summary.errors).toEqual([
      {
        pageNumber: 2,
        reason: "http-error",
        message: "HTTP 500 Internal Server Error",
        attempts: 3,
        statusCode: 500,
      },
      {
        pageNumber: 3,
        position: 0,
        reason: "unparsable-price",
        message: 'Unparsable price: "Contact us"',
      },
    ]);
    expect(summary).toMatchObject({
      pagesAttempted: 3,
      pagesFetched: 2,
      pagesSucceeded: 1,
      pagesFailed: 2,
      startedAt: "2024-05-01T10:00:00.000Z",
      finishedAt: "2024-05-01T10:00:00.000Z",
      durationMs: 0,
    });
  });

  it("emits page events in processing order", async () => {
    const events: RunEvent[] = [];

    await createOrchestrator(mixedRun(), {
      concurrency: 1,
      onEvent: (event) => events.push(event),
    }).run();

    expect(events.map((event) => `${event.type}:${event.pageNumber}`)).toEqual([
      "page-start:1",
      "page-success:1",
      "page-start:2",
      "page-retry:2",
      "page-failure:2",
      "page-start:3",
      "page-failure:3",
    ]);
    expect(events.at(-1)).toEqual({
      type: "page-failure",
      pageNumber: 3,
      reason: "unparsable-price",
      message: 'Unparsable price: "Contact us"',
      records: 0,
      rejected: 1,
      progress: { completed: 3, remaining: 0, succeeded: 1, failed: 2 },
    });
  });

  it("restores page order when pages finish out of order", async () => {
    const source = new StubSource(
      (pageNumber) =>
        success(pageNumber, listingPage([{ ...ATTIC, name: `Book ${pageNumber}` }])),
      { 1: 30, 2: 15, 3: 1 },
    );

    const summary = await createOrchestrator(source, { concurrency: 3 }).run();

    expect(summary.records.map((record) => record.name)).toEqual([
      "Book 1",
      "Book 2",
      "Book 3",
    ]);
  });

  it("keeps at most `concurrency` pages in flight", async () => {
    const source = new StubSource(
      (pageNumber) => success(pageNumber, listingPage([ATTIC])),
      { 1: 5, 2: 5, 3: 5, 4: 5, 5: 5, 6: 5 },
    );

    const summary = await createOrchestrator(source, { pageCount: 6, concurrency: 2 }).run();

    expect(source.peak).toBe(2);
    expect([...source.calls].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(summary.pagesSucceeded).toBe(6);
  });

  it("treats a fetched page without containers as failed but fetched", async () => {
    const source = new StubSource((pageNumber) =>
      success(pageNumber, "<html><body>Nothing here</body></html>"),
    );
    const events: RunEvent[] = [];

    const summary = await createOrchestrator(source, {
      pageCount: 1,
      onEvent: (event) => events.push(event),
    }).run();

    expect(summary).toMatchObject({
      pagesAttempted: 1,
      pagesFetched: 1,
      pagesSucceeded: 0,
      pagesFailed: 1,
      records: [],
      errors: [],
    });
    expect(events.at(-1)).toMatchObject({
      type: "page-failure",
      reason: "no-records",
      message: "Page contained no product containers",
    });
  });

  it("finishes immediately when there are no pages", async () => {
    const source = new StubSource(() => success(1, ""));

    const summary = await createOrchestrator(source, { pageCount: 0 }).run();

    expect(source.calls).toEqual([]);
    expect(summary).toMatchObject({
      pagesAttempted: 0,
      pagesFetched: 0,
      pagesSucceeded: 0,
      pagesFailed: 0,
      records: [],
      errors: [],
    });
  });

  it("records an unexpected error when the source throws", async () => {
    const source: PageSource = {
      fetch: vi.fn(async () => {
        throw new Error("socket exploded");
      }),
    };

    const summary = await createOrchestrator(source, { pageCount: 1 }).run();

    expect(summary.errors).toEqual([
      { pageNumber: 1, reason: "unexpected", message: "socket exploded" },
    ]);
    expect(summary.pagesFailed).toBe(1);
  });

  it("keeps running when a listener throws", async () => {
    const summary = await createOrchestrator(mixedRun(), {
      onEvent: () => {
        throw new Error("listener failed");
      },
    }).run();

    expect(summary.records).toHaveLength(2);
  });

  it("runs only once", async () => {
    const orchestrator = createOrchestrator(mixedRun());
    expect(orchestrator.state).toBe("idle");

    await orchestrator.run();

    expect(orchestrator.state).toBe("finished");
    await expect(orchestrator.run()).rejects.toThrow(
      'Orchestrator cannot run from state "finished"',
    );
  });

  it("rejects invalid limits before running", () => {
    const source = mixedRun();

    expect(() => createOrchestrator(source, { concurrency: 0 })).toThrow(ConfigurationError);
    expect(() => createOrchestrator(source, { pageCount: -1 })).toThrow(ConfigurationError);
  });
});
