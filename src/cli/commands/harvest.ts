/**
 * Harvest command - Loads config and runs the harvest pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, createLogger, Tracker } from "../../utils";
import { HarvestConfigSchema } from "../../types";
import type { HarvestContext } from "../../types";
import * as modules from "../../modules";
import { Pipeline, exitCode } from "../../pipeline";

const HarvestOptionsSchema = z.object({
  input: z.string().optional(),
  count: z.coerce.number().int().positive().optional(),
  originals: z.string().optional(),
  output: z.string().optional(),
  timeout: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof HarvestOptionsSchema>;

export async function harvestCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  let ctx: HarvestContext;
  try {
    // Validate CLI options
    const options = HarvestOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config: loaded, errors } = await loadConfig(options.config);

    // Override with CLI options
    const config = HarvestConfigSchema.parse({
      ...loaded,
      input: options.input ?? loaded.input,
      images: { ...loaded.images, count: options.count ?? loaded.images.count },
      request: {
        ...loaded.request,
        timeout: options.timeout ?? loaded.request.timeout,
      },
      storage: {
        originals: options.originals ?? loaded.storage.originals,
        output: options.output ?? loaded.storage.output,
      },
      logging: {
        ...loaded.logging,
        level: options.verbose ? "debug" : loaded.logging.level,
      },
    });

    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const logger = await createLogger(
      config.logging.level,
      config.logging.directory,
    );

    ctx = { config, logger, tracker, verbose: options.verbose };
    spinner.succeed(`Target: ${config.images.count} images from ${config.input}`);
  } catch (error) {
    spinner.fail("Initialization failed");
    console.error(error);
    process.exit(1);
  }

  try {
    const result = await new Pipeline(ctx).run();
    await modules.stats(ctx, result);
    process.exitCode = exitCode(result);
  } catch (error) {
    ctx.logger.error(
      "Harvest failed",
      error instanceof Error ? error : new Error(String(error)),
    );
    process.exitCode = 1;
  } finally {
    await ctx.logger.close();
  }
}
