import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stats, formatDuration } from "./stats";
import { Logger, Tracker, DEFAULT_EXCLUDE_KEYWORDS, STATS_FILENAME } from "../utils";
import type { HarvestContext } from "../types";

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});

describe("stats", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exports the stats file to the output root", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const output = await mkdtemp(join(tmpdir(), "harvest-summary-"));
    const tracker = new Tracker();
    tracker.setTotalPages(1);
    tracker.incrementHarvested();
    tracker.setCandidates(2);
    tracker.incrementBatches();
    tracker.incrementImagesDownloaded();
    tracker.incrementImagesDownloaded();

    const ctx: HarvestContext = {
      config: {
        input: "urls.txt",
        images: { count: 2 },
        request: { timeout: 1000, userAgent: "test-agent" },
        storage: { originals: "originals", output },
        concurrency: { pages: 1, downloads: 1 },
        parser: { excludeKeywords: [...DEFAULT_EXCLUDE_KEYWORDS] },
        logging: { level: "error", directory: null },
      },
      logger: new Logger("error"),
      tracker,
    };

    await stats(ctx, {
      status: "success",
      pages: 1,
      candidates: 2,
      errors: 0,
      successes: 2,
    });

    const exported = JSON.parse(
      await readFile(join(output, STATS_FILENAME), "utf-8"),
    );
    expect(exported.summary.downloadedImages).toBe(2);
    expect(exported.summary.candidates).toBe(2);
    expect(log).toHaveBeenCalled();
  });

  it("warns and still prints the summary when the stats file cannot be written", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const dir = await mkdtemp(join(tmpdir(), "harvest-summary-"));
    const output = join(dir, "not-a-directory");
    await writeFile(output, "");

    const ctx: HarvestContext = {
      config: {
        input: "urls.txt",
        images: { count: 1 },
        request: { timeout: 1000, userAgent: "test-agent" },
        storage: { originals: "originals", output },
        concurrency: { pages: 1, downloads: 1 },
        parser: { excludeKeywords: [...DEFAULT_EXCLUDE_KEYWORDS] },
        logging: { level: "warn", directory: null },
      },
      logger: new Logger("warn"),
      tracker: new Tracker(),
    };

    await expect(
      stats(ctx, {
        status: "success",
        pages: 1,
        candidates: 1,
        errors: 0,
        successes: 1,
      }),
    ).resolves.toBeUndefined();

    expect(warn).toHaveBeenCalledWith(
      expect.stringMatching(/^\[WARN\] Could not write stats: /),
    );
    expect(log).toHaveBeenCalled();
  });
});
