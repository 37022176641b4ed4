import { ConfigurationError } from "../../config/errors.js";

export type UrlNormalizationIssue = "invalid_url" | "unsupported_protocol";

export class UrlNormalizationError extends Error {
  constructor(
    message: string,
    readonly issue: UrlNormalizationIssue,
    readonly detail?: string,
  ) {
    super(message);
    this.name = "UrlNormalizationError";
  }
}

export const SUPPORTED_PROTOCOLS = new Set<string>(["http:", "https:"]);

export const PAGE_PLACEHOLDER = "{page}";

const trimPathname = (pathname: string): string => {
  if (pathname === "/") return pathname;
  const trimmed = pathname.replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
};

/**
 * Drop the fragment, trim trailing slashes and sort the query so the same
 * product reached through different links compares equal.
 */
export const canonicalizeUrl = (rawUrl: string, base?: string): string => {
  let parsed: URL;

  try {
    parsed = new URL(rawUrl, base);
  } catch {
    throw new UrlNormalizationError(
      `Invalid URL: ${rawUrl}`,
      "invalid_url",
      rawUrl,
    );
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new UrlNormalizationError(
      `Unsupported URL protocol: ${parsed.protocol}`,
      "unsupported_protocol",
      parsed.protocol,
    );
  }

  parsed.hash = "";
  parsed.pathname = trimPathname(parsed.pathname);

  if (parsed.search) {
    parsed.searchParams.sort();
    const sortedQuery = parsed.searchParams.toString();
    parsed.search = sortedQuery ? `?${sortedQuery}` : "";
  }

  return parsed.toString();
};

/**
 * Resolve a scraped link against the page it came from. Links that cannot be
 * turned into an http(s) URL yield `undefined` instead of failing the record.
 */
export const resolveLink = (
  rawLink: string | null | undefined,
  pageUrl: string,
): string | undefined => {
  const candidate = rawLink?.trim();
  if (!candidate) return undefined;

  try {
    return canonicalizeUrl(candidate, pageUrl);
  } catch (error) {
    if (error instanceof UrlNormalizationError) return undefined;
    throw error;
  }
};

export const buildPageUrl = (template: string, pageNumber: number): string =>
  new URL(template.split(PAGE_PLACEHOLDER).join(String(pageNumber))).toString();

export const assertUrlTemplate = (template: string): string => {
  const trimmed = template.trim();

  if (!trimmed) {
    throw new ConfigurationError(
      "URL template must not be empty",
      "invalid_url_template",
    );
  }

  if (!trimmed.includes(PAGE_PLACEHOLDER)) {
    throw new ConfigurationError(
      `URL template must contain the ${PAGE_PLACEHOLDER} placeholder: ${trimmed}`,
      "invalid_url_template",
      trimmed,
    );
  }

  try {
    canonicalizeUrl(buildPageUrl(trimmed, 1));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `URL template does not produce a valid http(s) URL: ${message}`,
      "invalid_url_template",
      trimmed,
    );
  }

  return trimmed;
};
