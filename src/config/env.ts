import { z } from "zod";

/**
 * Accept common textual boolean representations so collaborators can set env
 * vars without memorising exact casing.
 */
const booleanLike = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => {
    if (["1", "true", "yes", "on"].includes(value)) return true;
    if (["0", "false", "no", "off", ""].includes(value)) return false;
    throw new Error(`Invalid boolean string: ${value}`);
  });

const booleanFromEnv = z.boolean().or(booleanLike);

const commaSeparated = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

/**
 * Central definition of runtime settings. Every value has a fallback so a bare
 * `shelf-scraper run` works against the bundled site profile; CLI flags and
 * request bodies override these per run.
 */
const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .catch("development"),
    LOG_LEVEL: z.enum(LOG_LEVELS).catch("info"),
    SCRAPER_LOG_FILE: z.string().trim().min(1).optional(),
    SCRAPER_SITE_PROFILE: z.string().trim().min(1).optional(),
    SCRAPER_URL_TEMPLATE: z.string().trim().min(1).optional(),
    SCRAPER_PAGE_COUNT: z.coerce.number().int().min(1).max(10_000).catch(10),
    SCRAPER_CONCURRENCY: z.coerce.number().int().min(1).max(100).catch(5),
    SCRAPER_REQUESTS_PER_SECOND: z.coerce.number().min(0).max(1_000).catch(5),
    SCRAPER_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .min(100)
      .max(120_000)
      .catch(10_000),
    SCRAPER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).catch(3),
    SCRAPER_BACKOFF_BASE_MS: z.coerce
      .number()
      .int()
      .min(0)
      .max(60_000)
      .catch(1_000),
    SCRAPER_BACKOFF_MAX_MS: z.coerce
      .number()
      .int()
      .min(0)
      .max(300_000)
      .catch(30_000),
    SCRAPER_BACKOFF_JITTER: z.coerce.number().min(0).max(1).catch(0.2),
    SCRAPER_USER_AGENTS: commaSeparated.optional(),
    SCRAPER_USER_AGENT_POOL_SIZE: z.coerce.number().int().min(1).max(50).catch(5),
    SCRAPER_IDENTITY_STRATEGY: z.enum(["random", "rotate"]).catch("random"),
    SCRAPER_OUTPUT: z.string().trim().min(1).catch("products.xlsx"),
    SCRAPER_TIMESTAMP_OUTPUT: booleanFromEnv.catch(true),
    PORT: z.coerce.number().int().min(1).max(65_535).catch(3_000),
  })
  .passthrough();

export type RuntimeEnv = z.infer<typeof envSchema>;

let cachedEnv: RuntimeEnv | null = null;

export const parseEnv = (source: NodeJS.ProcessEnv): RuntimeEnv =>
  envSchema.parse(source);

export const getEnv = (): RuntimeEnv => {
  if (!cachedEnv) {
    cachedEnv = parseEnv(process.env);
  }
  return cachedEnv;
};

export const isProduction = () => getEnv().NODE_ENV === "production";
