import type { ProductRecord, RunErrorReason, RunSummary } from "../types/scrape.js";

export type RatingDistribution = Record<1 | 2 | 3 | 4 | 5, number>;

export interface RecordStats {
  totalProducts: number;
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  /** Set only when every record that names a currency names the same one. */
  currency?: string;
  inStock: number;
  inStockRatio: number;
  averageRating: number | null;
  ratingDistribution: RatingDistribution;
}

const RULE = "=".repeat(70);

const isRatingKey = (value: number): value is keyof RatingDistribution =>
  value === 1 || value === 2 || value === 3 || value === 4 || value === 5;

export const summarizeRecords = (
  records: readonly ProductRecord[],
): RecordStats | null => {
  if (records.length === 0) return null;

  const prices = records.map((record) => record.price);
  const currencies = new Set(
    records.flatMap((record) => (record.currency ? [record.currency] : [])),
  );
  const ratings = records.flatMap((record) =>
    record.rating !== undefined ? [record.rating] : [],
  );
  const ratingDistribution: RatingDistribution = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  for (const rating of ratings) {
    if (isRatingKey(rating)) ratingDistribution[rating] += 1;
  }
  const inStock = records.filter((record) => record.availability === "in-stock").length;
  const [onlyCurrency] = currencies;

  return {
    totalProducts: records.length,
    averagePrice: prices.reduce((sum, price) => sum + price, 0) / records.length,
    minPrice: prices.reduce((min, price) => Math.min(min, price), Number.POSITIVE_INFINITY),
    maxPrice: prices.reduce((max, price) => Math.max(max, price), Number.NEGATIVE_INFINITY),
    ...(currencies.size === 1 && onlyCurrency ? { currency: onlyCurrency } : {}),
    inStock,
    inStockRatio: inStock / records.length,
    averageRating:
      ratings.length > 0
        ? ratings.reduce((sum, rating) => sum + rating, 0) / ratings.length
        : null,
    ratingDistribution,
  };
};

export const formatAmount = (value: number, currency?: string): string =>
  currency ? `${currency} ${value.toFixed(2)}` : value.toFixed(2);

const line = (label: string, value: string) => `${`${label}:`.padEnd(23)}${value}`;

export const countErrorsByReason = (
  summary: RunSummary,
): Array<[RunErrorReason, number]> => {
  const counts = new Map<RunErrorReason, number>();
  for (const error of summary.errors) {
    counts.set(error.reason, (counts.get(error.reason) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([left], [right]) => left.localeCompare(right));
};

/**
 * Human-readable block printed after a run.
 */
export const formatRunReport = (summary: RunSummary): string => {
  const stats = summarizeRecords(summary.records);
  const lines = [
    RULE,
    "Summary",
    line(
      "Pages",
      `${summary.pagesAttempted} attempted, ${summary.pagesFetched} fetched, ` +
        `${summary.pagesSucceeded} succeeded, ${summary.pagesFailed} failed`,
    ),
    line("Duration", `${(summary.durationMs / 1000).toFixed(1)}s`),
  ];

  if (!stats) {
    lines.push("No data collected");
  } else {
    lines.push(
      line("Total products", String(stats.totalProducts)),
      line("Average price", formatAmount(stats.averagePrice, stats.currency)),
      line(
        "Price range",
        `${formatAmount(stats.minPrice, stats.currency)} - ${formatAmount(stats.maxPrice, stats.currency)}`,
      ),
      line(
        "In stock",
        `${stats.inStock} (${(stats.inStockRatio * 100).toFixed(1)}%)`,
      ),
      line(
        "Average rating",
        stats.averageRating === null ? "n/a" : `${stats.averageRating.toFixed(2)}/5`,
      ),
    );

    if (stats.averageRating !== null) {
      lines.push("Rating distribution:");
      for (const rating of [1, 2, 3, 4, 5] as const) {
        lines.push(`  ${rating}: ${stats.ratingDistribution[rating]}`);
      }
    }
  }

  lines.push(line("Errors", String(summary.errors.length)));
  for (const [reason, count] of countErrorsByReason(summary)) {
    lines.push(`  ${reason}: ${count}`);
  }
  lines.push(RULE);

  return lines.join("\n");
};
