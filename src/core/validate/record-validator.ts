import type {
  Availability,
  ProductRecord,
  RawRecord,
  ValidationResult,
} from "../../types/scrape.js";
import { resolveLink } from "../jobs/url.js";

export interface ValidationContext {
  pageNumber: number;
  /** URL the markup was fetched from; relative links resolve against it. */
  pageUrl: string;
  position: number;
  scrapedAt: string;
  /** Used when the price text carries no recognisable currency. */
  defaultCurrency?: string;
}

export type RecordValidator = (
  raw: RawRecord,
  context: ValidationContext,
) => ValidationResult;

export interface ParsedPrice {
  amount: number;
  currency?: string;
}

const CURRENCY_SYMBOLS: Record<string, string> = {
  $: "USD",
  "£": "GBP",
  "€": "EUR",
  "¥": "JPY",
  "₹": "INR",
  "₩": "KRW",
  "₽": "RUB",
  "₺": "TRY",
  "zł": "PLN",
};

const ISO_CURRENCIES = [
  "USD",
  "EUR",
  "GBP",
  "JPY",
  "CHF",
  "CAD",
  "AUD",
  "NZD",
  "INR",
  "CNY",
  "SEK",
  "NOK",
  "DKK",
  "PLN",
  "CZK",
  "TRY",
];

const ISO_CURRENCY_PATTERN = new RegExp(`\\b(${ISO_CURRENCIES.join("|")})\\b`);

// Space- or apostrophe-grouped thousands first ("1 234,50", "1'234.50"),
// then any run of digits and separators.
const AMOUNT_PATTERN = /\d{1,3}(?:[ \u00a0\u202f']\d{3})+(?:[.,]\d+)?|\d[\d.,]*/;

// A minus sign sits directly against the amount or its currency symbol;
// "Sale - £12.99" uses the dash as a separator.
const NEGATIVE_PREFIX = /(?:^|[^\p{L}\p{N}])-(?:\p{Sc}\s*)?$/u;

const OUT_OF_STOCK_MARKERS = [
  "out of stock",
  "out-of-stock",
  "outofstock",
  "sold out",
  "not in stock",
  "not available",
  "unavailable",
];

const IN_STOCK_MARKERS = ["in stock", "in-stock", "instock", "available"];

const RATING_WORDS = new Map<string, number>([
  ["one", 1],
  ["two", 2],
  ["three", 3],
  ["four", 4],
  ["five", 5],
]);

export const normalizeText = (value: string | null | undefined): string =>
  (value ?? "").replace(/\s+/g, " ").trim();

export const detectCurrency = (text: string): string | undefined => {
  const code = text.match(ISO_CURRENCY_PATTERN);
  if (code?.[1]) return code[1];

  for (const [symbol, currency] of Object.entries(CURRENCY_SYMBOLS)) {
    if (text.includes(symbol)) return currency;
  }
  return undefined;
};

const normalizeAmountToken = (token: string): string => {
  const compact = token.replace(/[ \u00a0\u202f']/g, "").replace(/[.,]+$/, "");
  const lastComma = compact.lastIndexOf(",");
  const lastDot = compact.lastIndexOf(".");

  if (lastComma !== -1 && lastDot !== -1) {
    // Whichever separator comes last is the decimal mark.
    return lastComma > lastDot
      ? compact.replace(/\./g, "").replace(",", ".")
      : compact.replace(/,/g, "");
  }

  if (lastComma !== -1) {
    return /^\d{1,3}(,\d{3})+$/.test(compact)
      ? compact.replace(/,/g, "")
      : compact.replace(/,/g, ".");
  }

  if ((compact.match(/\./g) ?? []).length > 1) {
    return compact.replace(/\./g, "");
  }

  return compact;
};

/**
 * Pull a non-negative amount out of free-form price text, dropping currency
 * symbols and thousands separators. Returns `null` when nothing numeric is
 * recoverable or the amount is negative.
 */
export const parsePrice = (text: string | null | undefined): ParsedPrice | null => {
  const normalized = normalizeText(text);
  if (!normalized) return null;

  const match = AMOUNT_PATTERN.exec(normalized);
  if (!match) return null;

  if (NEGATIVE_PREFIX.test(normalized.slice(0, match.index))) return null;

  const amount = Number(normalizeAmountToken(match[0]));
  if (!Number.isFinite(amount) || amount < 0) return null;

  const currency = detectCurrency(normalized);
  return currency ? { amount, currency } : { amount };
};

export const normalizeAvailability = (
  text: string | null | undefined,
): Availability => {
  const value = normalizeText(text).toLowerCase();
  if (!value) return "unknown";
  if (OUT_OF_STOCK_MARKERS.some((marker) => value.includes(marker))) {
    return "out-of-stock";
  }
  if (IN_STOCK_MARKERS.some((marker) => value.includes(marker))) {
    return "in-stock";
  }
  return "unknown";
};

export const parseRating = (text: string | null | undefined): number | undefined => {
  const value = normalizeText(text).toLowerCase();
  if (!value) return undefined;

  for (const word of value.split(/[^a-z]+/)) {
    const rating = RATING_WORDS.get(word);
    if (rating !== undefined) return rating;
  }

  const digit = value.match(/(?:^|[^\d.])([1-5])(?![\d])/);
  return digit?.[1] ? Number(digit[1]) : undefined;
};

/**
 * Turn a raw field-set into a product record or a tagged rejection. Pure: the
 * scrape timestamp comes in through the context.
 */
export const validateRecord: RecordValidator = (raw, context) => {
  const name = normalizeText(raw.name);
  if (!name) {
    return {
      status: "rejected",
      reason: "missing-name",
      message: "Product name is empty",
    };
  }

  const price = parsePrice(raw.price);
  if (!price) {
    return {
      status: "rejected",
      reason: "unparsable-price",
      message: `Unparsable price: ${JSON.stringify(normalizeText(raw.price))}`,
    };
  }

  const currency = price.currency ?? context.defaultCurrency;
  const url = resolveLink(raw.link, context.pageUrl);
  const imageUrl = resolveLink(raw.image, context.pageUrl);
  const rating = parseRating(raw.rating);

  const record: ProductRecord = {
    pageNumber: context.pageNumber,
    position: context.position,
    name,
    price: price.amount,
    ...(currency ? { currency } : {}),
    availability: normalizeAvailability(raw.availability),
    ...(url ? { url } : {}),
    ...(rating !== undefined ? { rating } : {}),
    ...(imageUrl ? { imageUrl } : {}),
    scrapedAt: context.scrapedAt,
  };

  return { status: "valid", record: Object.freeze(record) };
};
