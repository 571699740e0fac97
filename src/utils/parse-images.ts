/**
 * Image Reference Parser
 * Extracts canonical image URLs from HTML markup
 */

import { load } from "cheerio";
import { resolveUrl } from "./resolve-url";

/**
 * Substrings marking ads, trackers, placeholders and site chrome
 */
export const DEFAULT_EXCLUDE_KEYWORDS: readonly string[] = [
  "adServer",
  "scorecardresearch.com",
  "1px",
  "avatar",
  "profile",
  "logo",
  "static",
  ".svg",
];

const STORABLE_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Parse image tags from HTML markup
 *
 * - Skips `<img>` tags without a `src`, or whose raw `src` contains an excluded keyword
 * - Resolves each source against the base URL and removes its fragment
 * - Keeps only http(s) URLs, since others have no hostname to store under
 * - Removes duplicates, keeping first-occurrence document order
 *
 * Different raw sources can resolve to the same URL (`two.jpg`, `two.jpg#a`,
 * `/x/../two.jpg`), so deduplication runs on the resolved values.
 */
export function parseImages(
  markup: string,
  baseUrl: string,
  excludeKeywords: readonly string[] = DEFAULT_EXCLUDE_KEYWORDS,
): string[] {
  const $ = load(markup);
  const urls = new Set<string>();

  $("img[src]").each((_i, el) => {
    const src = $(el).attr("src");
    if (!src) return;
    if (excludeKeywords.some((keyword) => src.includes(keyword))) return;
    if (!URL.canParse(src, baseUrl)) return;

    const resolved = resolveUrl(src, baseUrl);
    if (STORABLE_PROTOCOLS.has(new URL(resolved).protocol)) {
      urls.add(resolved);
    }
  });

  return [...urls];
}
