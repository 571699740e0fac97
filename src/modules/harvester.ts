/**
 * Harvester Module
 * Fetches pages concurrently and extracts their image URLs
 */

import {
  fetchPage,
  parseImages,
  settle,
  describeError,
  HarvestError,
  ParseError,
} from "../utils";
import type { HarvestContext, PageImages } from "../types";

/**
 * Fetch one page and parse its image references
 *
 * Relative references resolve against the final URL, so redirects across
 * paths or hosts still resolve correctly.
 */
export async function harvest(
  pageUrl: string,
  ctx: HarvestContext,
): Promise<string[]> {
  const { request, parser } = ctx.config;
  const page = await fetchPage(pageUrl, {
    timeout: request.timeout,
    userAgent: request.userAgent,
  });

  try {
    return parseImages(page.body, page.url, parser.excludeKeywords);
  } catch (error) {
    if (error instanceof HarvestError) throw error;
    throw new ParseError(`Failed to parse ${pageUrl}: ${describeError(error)}`, {
      url: pageUrl,
      cause: error,
    });
  }
}

/**
 * Harvest every page concurrently
 *
 * Failed pages are logged and left out of the result; pages without images
 * are kept with an empty list. Result order follows the input order.
 */
export async function harvestAll(
  pageUrls: readonly string[],
  ctx: HarvestContext,
): Promise<PageImages[]> {
  const { logger, tracker, config } = ctx;
  tracker.setTotalPages(pageUrls.length);

  const outcomes = await settle(
    pageUrls,
    (url) => url,
    (url) => harvest(url, ctx),
    config.concurrency.pages,
  );

  const pages: PageImages[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      logger.debug(`Found ${outcome.value.length} images on ${outcome.subject}`);
      tracker.incrementHarvested();
      pages.push({ pageUrl: outcome.subject, imageUrls: outcome.value });
    } else {
      logger.warn(
        `Could not harvest ${outcome.subject}: ${describeError(outcome.error)}`,
      );
      tracker.trackError(outcome.subject, outcome.error, "page");
      tracker.incrementPagesFailed();
    }
  }

  return pages;
}
