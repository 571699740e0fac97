/**
 * Pipeline - harvest run orchestrator
 * Coordinates harvest, mix and download; the modules hold the logic
 */

import type { HarvestContext, RunResult, StoreImage } from "./types";
import { readLineList } from "./utils";
import * as modules from "./modules";

export class Pipeline {
  constructor(
    private ctx: HarvestContext,
    private store: StoreImage = modules.downloadAndRotate,
  ) {}

  /**
   * Run one harvest over the configured page list
   */
  async run(): Promise<RunResult> {
    const { config, logger, tracker } = this.ctx;

    const pageUrls = await readLineList(config.input);
    logger.info(`Harvesting ${pageUrls.length} pages from ${config.input}`);

    const pages = await modules.harvestAll(pageUrls, this.ctx);
    const candidates = modules.mix(pages);
    tracker.setCandidates(candidates.length);
    logger.info(
      `Mixed ${candidates.length} candidates from ${pages.length} pages`,
    );

    if (candidates.length === 0) {
      logger.warn("No image candidates found, nothing to download");
      return {
        status: "no-candidates",
        pages: pages.length,
        candidates: 0,
        errors: 0,
        successes: 0,
      };
    }

    const target = config.images.count;
    const { errors, successes } = await modules.downloadAndRotateAll(
      candidates,
      target,
      this.ctx,
      this.store,
    );

    logger.info(
      `Stored ${successes}/${target} images (${errors} failed, ${candidates.length} candidates)`,
    );

    return {
      status: successes >= target ? "success" : "partial",
      pages: pages.length,
      candidates: candidates.length,
      errors,
      successes,
    };
  }
}

/**
 * Process exit code for a run status
 */
export function exitCode(result: RunResult): number {
  switch (result.status) {
    case "success":
      return 0;
    case "partial":
      return 1;
    case "no-candidates":
      return 2;
  }
}
