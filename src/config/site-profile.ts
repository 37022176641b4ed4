import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const fieldSelectorSchema = z
  .object({
    selector: z.string().trim().min(1),
    attribute: z.string().trim().min(1).optional(),
  })
  .strict();

/**
 * Everything site-specific lives here: pointing the scraper at another shop
 * means writing another profile, not touching the parser.
 */
export const siteProfileSchema = z
  .object({
    name: z.string().trim().min(1),
    urlTemplate: z.string().trim().min(1),
    currency: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{3}$/, "Currency must be a three-letter ISO code")
      .transform((value) => value.toUpperCase())
      .optional(),
    container: z.string().trim().min(1),
    fields: z
      .object({
        name: fieldSelectorSchema,
        price: fieldSelectorSchema,
        availability: fieldSelectorSchema,
        link: fieldSelectorSchema,
        rating: fieldSelectorSchema.optional(),
        image: fieldSelectorSchema.optional(),
      })
      .strict(),
    headers: z
      .record(z.string().trim(), z.string().trim())
      .optional()
      .transform((headers) =>
        headers
          ? Object.fromEntries(
              Object.entries(headers).map(([key, value]) => [
                key.toLowerCase(),
                value,
              ]),
            )
          : undefined,
      ),
  })
  .strict();

export type SiteProfile = z.infer<typeof siteProfileSchema>;
export type FieldSelector = z.infer<typeof fieldSelectorSchema>;

export const DEFAULT_PROFILE_PATH = fileURLToPath(
  new URL("../../profiles/books-catalogue.json", import.meta.url),
);

export const parseSiteProfile = (input: unknown, source = "inline"): SiteProfile => {
  const result = siteProfileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(
      `Invalid site profile ${source}: ${issues}`,
      "invalid_profile",
      source,
    );
  }
  return result.data;
};

export const loadSiteProfile = async (
  path: string = DEFAULT_PROFILE_PATH,
): Promise<SiteProfile> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Unable to read site profile ${path}: ${message}`,
      "invalid_profile",
      path,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Site profile ${path} is not valid JSON: ${message}`,
      "invalid_profile",
      path,
    );
  }

  return parseSiteProfile(json, path);
};
