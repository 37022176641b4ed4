export type Availability = "in-stock" | "out-of-stock" | "unknown";

export type RawField =
  | "name"
  | "price"
  | "availability"
  | "link"
  | "rating"
  | "image";

/**
 * Unvalidated field-set lifted from one product container. Missing
 * sub-elements are `null`, never an exception.
 */
export type RawRecord = Record<RawField, string | null>;

export interface PageTask {
  readonly pageNumber: number;
}

export interface ProductRecord {
  readonly pageNumber: number;
  /** Zero-based container index on the page. */
  readonly position: number;
  readonly name: string;
  readonly price: number;
  readonly currency?: string;
  readonly availability: Availability;
  readonly url?: string;
  readonly rating?: number;
  readonly imageUrl?: string;
  readonly scrapedAt: string;
}

export type RejectionReason = "missing-name" | "unparsable-price";

export type ValidationResult =
  | { status: "valid"; record: ProductRecord }
  | { status: "rejected"; reason: RejectionReason; message: string };

export type FetchFailureReason =
  | { kind: "timeout"; message: string }
  | { kind: "http-error"; statusCode: number; message: string }
  | { kind: "http-client-error"; statusCode: number; message: string }
  | { kind: "network-error"; message: string };

export type FetchFailureKind = FetchFailureReason["kind"];

export interface FetchSuccess {
  status: "success";
  url: string;
  markup: string;
  statusCode: number;
  attempts: number;
}

export interface FetchFailure {
  status: "fail";
  url: string;
  reason: FetchFailureReason;
  attempts: number;
}

export type FetchResult = FetchSuccess | FetchFailure;

export type RunErrorReason = FetchFailureKind | RejectionReason | "unexpected";

export interface RunError {
  pageNumber: number;
  reason: RunErrorReason;
  message: string;
  statusCode?: number;
  attempts?: number;
  position?: number;
}

export interface RunProgress {
  completed: number;
  remaining: number;
  succeeded: number;
  failed: number;
}

export interface RunSummary {
  pagesAttempted: number;
  /** Pages whose HTTP fetch succeeded, whatever they contained. */
  pagesFetched: number;
  /** Pages that contributed at least one valid record. */
  pagesSucceeded: number;
  pagesFailed: number;
  records: ProductRecord[];
  errors: RunError[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export type RunState = "idle" | "running" | "finished";

export interface RetryEvent {
  pageNumber: number;
  attempt: number;
  delayMs: number;
  reason: FetchFailureReason;
}

export type RunEvent =
  | { type: "page-start"; pageNumber: number; total: number }
  | ({ type: "page-retry" } & RetryEvent)
  | {
      type: "page-success";
      pageNumber: number;
      records: number;
      rejected: number;
      progress: RunProgress;
    }
  | {
      type: "page-failure";
      pageNumber: number;
      /** `no-records` marks a fetched page without usable products; it is not a RunError. */
      reason: RunErrorReason | "no-records";
      message: string;
      records: number;
      rejected: number;
      progress: RunProgress;
    };

export type RunEventListener = (event: RunEvent) => void;
