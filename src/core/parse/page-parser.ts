import * as cheerio from "cheerio";
import type { FieldSelector, SiteProfile } from "../../config/site-profile.js";
import type { RawRecord } from "../../types/scrape.js";

export type PageParser = (markup: string) => RawRecord[];

/**
 * Lift one raw field-set per product container. Structure that is missing
 * degrades single fields to `null`; a page with no containers yields `[]`.
 */
export const parsePage = (markup: string, profile: SiteProfile): RawRecord[] => {
  const $ = cheerio.load(markup);
  const { fields } = profile;

  return $(profile.container)
    .toArray()
    .map((element) => {
      const container = $(element);

      const read = (field: FieldSelector | undefined): string | null => {
        if (!field) return null;

        const match = container.find(field.selector).first();
        if (match.length === 0) return null;

        if (field.attribute) {
          return match.attr(field.attribute) ?? null;
        }
        return match.text();
      };

      return {
        name: read(fields.name),
        price: read(fields.price),
        availability: read(fields.availability),
        link: read(fields.link),
        rating: read(fields.rating),
        image: read(fields.image),
      };
    });
};

export const createPageParser =
  (profile: SiteProfile): PageParser =>
  (markup) =>
    parsePage(markup, profile);
