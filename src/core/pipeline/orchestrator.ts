import { ConfigurationError } from "../../config/errors.js";
import { describeError, logger } from "../../logger.js";
import type {
  PageTask,
  ProductRecord,
  RunError,
  RunEvent,
  RunEventListener,
  RunProgress,
  RunState,
  RunSummary,
} from "../../types/scrape.js";
import type { PageSource } from "../fetch/page-fetcher.js";
import type { PageParser } from "../parse/page-parser.js";
import {
  type RecordValidator,
  validateRecord,
} from "../validate/record-validator.js";

export interface OrchestratorOptions {
  pageCount: number;
  concurrency: number;
  source: PageSource;
  parse: PageParser;
  validate?: RecordValidator;
  defaultCurrency?: string;
  onEvent?: RunEventListener;
  now?: () => Date;
}

interface PageOutcome {
  pageNumber: number;
  fetched: boolean;
  records: ProductRecord[];
  errors: RunError[];
}

const compareErrors = (left: RunError, right: RunError) =>
  left.pageNumber - right.pageNumber ||
  (left.position ?? -1) - (right.position ?? -1);

/**
 * Drives one run: `idle -> running -> finished`. Page tasks execute on a
 * bounded pool of workers; the orchestrator is the only writer of the summary
 * and restores page order when it assembles the final records.
 */
export class Orchestrator {
  private readonly options: OrchestratorOptions;
  private readonly validate: RecordValidator;
  private readonly now: () => Date;
  private current: RunState = "idle";

  constructor(options: OrchestratorOptions) {
    if (!Number.isInteger(options.pageCount) || options.pageCount < 0) {
      throw new ConfigurationError(
        `Page count must be a non-negative integer, received ${options.pageCount}`,
        "invalid_option",
        "pageCount",
      );
    }
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ConfigurationError(
        `Concurrency must be a positive integer, received ${options.concurrency}`,
        "invalid_option",
        "concurrency",
      );
    }

    this.options = options;
    this.validate = options.validate ?? validateRecord;
    this.now = options.now ?? (() => new Date());
  }

  get state(): RunState {
    return this.current;
  }

  async run(): Promise<RunSummary> {
    if (this.current !== "idle") {
      throw new Error(`Orchestrator cannot run from state "${this.current}"`);
    }
    this.current = "running";

    const { pageCount, concurrency } = this.options;
    const startedAt = this.now();
    const tasks: PageTask[] = Array.from({ length: pageCount }, (_, index) => ({
      pageNumber: index + 1,
    }));
    const outcomes: PageOutcome[] = [];
    const progress: RunProgress = {
      completed: 0,
      remaining: pageCount,
      succeeded: 0,
      failed: 0,
    };

    logger.info("Starting scrape run", { pageCount, concurrency });

    const queue = [...tasks];
    const worker = async () => {
      for (let task = queue.shift(); task; task = queue.shift()) {
        const outcome = await this.processPage(task, pageCount);
        outcomes.push(outcome);
        this.recordProgress(outcome, progress);
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(concurrency, pageCount) }, () => worker()),
    );

    outcomes.sort((left, right) => left.pageNumber - right.pageNumber);

    const finishedAt = this.now();
    const pagesSucceeded = outcomes.filter((outcome) => outcome.records.length > 0).length;
    const summary: RunSummary = {
      pagesAttempted: outcomes.length,
      pagesFetched: outcomes.filter((outcome) => outcome.fetched).length,
      pagesSucceeded,
      pagesFailed: outcomes.length - pagesSucceeded,
      records: outcomes.flatMap((outcome) => outcome.records),
      errors: outcomes.flatMap((outcome) => outcome.errors).sort(compareErrors),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };

    this.current = "finished";

    logger.info("Scrape run complete", {
      pagesAttempted: summary.pagesAttempted,
      pagesSucceeded: summary.pagesSucceeded,
      pagesFailed: summary.pagesFailed,
      records: summary.records.length,
      errors: summary.errors.length,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async processPage(task: PageTask, total: number): Promise<PageOutcome> {
    const { pageNumber } = task;
    this.emit({ type: "page-start", pageNumber, total });

    try {
      const fetched = await this.options.source.fetch(pageNumber, {
        onRetry: (event) => this.emit({ type: "page-retry", ...event }),
      });

      if (fetched.status === "fail") {
        const reason = fetched.reason;
        return {
          pageNumber,
          fetched: false,
          records: [],
          errors: [
            {
              pageNumber,
              reason: reason.kind,
              message: reason.message,
              attempts: fetched.attempts,
              ...("statusCode" in reason ? { statusCode: reason.statusCode } : {}),
            },
          ],
        };
      }

      const scrapedAt = this.now().toISOString();
      const records: ProductRecord[] = [];
      const errors: RunError[] = [];

      this.options.parse(fetched.markup).forEach((raw, position) => {
        const result = this.validate(raw, {
          pageNumber,
          pageUrl: fetched.url,
          position,
          scrapedAt,
          defaultCurrency: this.options.defaultCurrency,
        });

        if (result.status === "valid") {
          records.push(result.record);
          return;
        }

        logger.debug("Rejected product record", {
          pageNumber,
          position,
          reason: result.reason,
        });
        errors.push({
          pageNumber,
          position,
          reason: result.reason,
          message: result.message,
        });
      });

      return { pageNumber, fetched: true, records, errors };
    } catch (error) {
      const message = describeError(error);
      logger.error("Unexpected error while processing page", {
        pageNumber,
        error: message,
      });
      return {
        pageNumber,
        fetched: false,
        records: [],
        errors: [{ pageNumber, reason: "unexpected", message }],
      };
    }
  }

  private recordProgress(outcome: PageOutcome, progress: RunProgress) {
    const succeeded = outcome.records.length > 0;
    progress.completed += 1;
    progress.remaining -= 1;
    if (succeeded) {
      progress.succeeded += 1;
    } else {
      progress.failed += 1;
    }

    const snapshot = { ...progress };
    const rejected = outcome.errors.filter((error) => error.position !== undefined).length;

    if (succeeded) {
      this.emit({
        type: "page-success",
        pageNumber: outcome.pageNumber,
        records: outcome.records.length,
        rejected,
        progress: snapshot,
      });
      return;
    }

    const [firstError] = outcome.errors;
    this.emit({
      type: "page-failure",
      pageNumber: outcome.pageNumber,
      reason: firstError?.reason ?? "no-records",
      message: firstError?.message ?? "Page contained no product containers",
      records: 0,
      rejected,
      progress: snapshot,
    });
  }

  private emit(event: RunEvent) {
    const { type, ...payload } = event;
    if (type === "page-failure") {
      logger.warn("Page produced no records", { event: type, ...payload });
    } else {
      logger.debug("Run event", { event: type, ...payload });
    }

    if (!this.options.onEvent) return;
    try {
      this.options.onEvent(event);
    } catch (error) {
      logger.debug("Failed to report run event", {
        event: type,
        error: describeError(error),
      });
    }
  }
}
