/**
 * Downloader Module
 * Drives the store writer over forward-moving batches until the target count is met
 */

import { settle, describeError } from "../utils";
import type {
  BatchOutcome,
  HarvestContext,
  ImageCandidate,
  StoreImage,
} from "../types";
import { createImageTarget, downloadAndRotate } from "./store-writer";

/**
 * Download and rotate candidates in batches
 *
 * The first batch is `[0, targetCount)`. Every following batch starts where the
 * previous one ended and is sized to the shortfall (`targetCount - successes`).
 * Failed candidates are never retried; fresh candidates make up for them.
 * Stops once the target is met or the candidate list is exhausted.
 */
export async function downloadAndRotateAll(
  candidates: readonly ImageCandidate[],
  targetCount: number,
  ctx: HarvestContext,
  store: StoreImage = downloadAndRotate,
): Promise<BatchOutcome> {
  const { logger, tracker, config } = ctx;
  const total: BatchOutcome = { errors: 0, successes: 0 };

  let from = 0;
  let to = targetCount;
  let batch = 0;

  for (;;) {
    batch++;
    const slice = candidates.slice(from, to);
    logger.info(
      `Batch ${batch}: candidates ${from}-${Math.min(to, candidates.length)} of ${candidates.length}`,
    );
    tracker.incrementBatches();

    const outcomes = await settle(
      slice,
      (candidate) => candidate.imageUrl,
      (candidate) => store(createImageTarget(candidate), ctx),
      config.concurrency.downloads,
    );

    for (const outcome of outcomes) {
      if (outcome.ok) {
        total.successes++;
        tracker.incrementImagesDownloaded();
        logger.debug(`Stored ${outcome.value.outputPath}`);
      } else {
        total.errors++;
        tracker.trackError(outcome.subject, outcome.error, "image");
        tracker.incrementImagesFailed();
        logger.warn(
          `Could not store ${outcome.subject}: ${describeError(outcome.error)}`,
        );
      }
    }

    logger.info(
      `Batch ${batch} done: ${total.successes}/${targetCount} stored, ${total.errors} failed`,
    );

    if (to >= candidates.length || total.successes >= targetCount) {
      break;
    }

    from = to;
    to = from + (targetCount - total.successes);
  }

  return total;
}
