import { describe, it, expect } from "vitest";
import { mkdtemp, readFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Tracker, STATS_FILENAME } from "./tracker";
import { DecodeError, DownloadError, FetchError, IOError } from "./errors";
import { HarvestConfigSchema } from "../types";

describe("Tracker", () => {
  it("maps page errors to reasons", () => {
    const tracker = new Tracker();
    const url = "http://example.org/";

    tracker.trackError(url, new FetchError("Timed out after 5ms", { url, timedOut: true }), "page");
    tracker.trackError(url, new FetchError("HTTP 500: Internal Server Error", { url, status: 500 }), "page");
    tracker.trackError(url, new FetchError("fetch failed", { url }), "page");

    expect(tracker.getIssues("page").map((issue) => issue.reason)).toEqual([
      "timeout",
      "invalid-response",
      "fetch-failed",
    ]);
  });

  it("maps image errors to reasons and keeps the status reached", () => {
    const tracker = new Tracker();
    const url = "http://img.example/a.png";
    const notFound = new FetchError("HTTP 404: Not Found", { url, status: 404 });

    tracker.trackError(
      url,
      new DownloadError("Download failed", { url, cause: notFound, reached: "not-processed" }),
      "image",
    );
    tracker.trackError(url, new IOError("disk full", { url, reached: "not-processed" }), "image");
    tracker.trackError(url, new DecodeError("bad", { url, reached: "downloaded" }), "image");

    expect(tracker.getIssues("image")).toEqual([
      { type: "image", path: url, reason: "invalid-response", status: "not-processed", details: "Download failed" },
      { type: "image", path: url, reason: "write-failed", status: "not-processed", details: "disk full" },
      { type: "image", path: url, reason: "decode-failed", status: "downloaded", details: "bad" },
    ]);
  });

  it("maps config errors to reasons", () => {
    const tracker = new Tracker();
    const invalid = HarvestConfigSchema.safeParse({});

    tracker.trackError("a.json", invalid.error, "resource");
    tracker.trackError("b.json", new SyntaxError("Unexpected token"), "resource");
    tracker.trackError("c.json", new Error("EACCES"), "resource");

    expect(tracker.getIssues("resource").map((issue) => issue.reason)).toEqual([
      "schema-validation",
      "invalid-json",
      "read-error",
    ]);
  });

  it("exports a summary with issues grouped by reason", async () => {
    const tracker = new Tracker();
    tracker.setTotalPages(3);
    tracker.incrementHarvested();
    tracker.incrementHarvested();
    tracker.incrementPagesFailed();
    tracker.setCandidates(4);
    tracker.incrementBatches();
    tracker.incrementImagesDownloaded();
    tracker.incrementImagesFailed();
    tracker.trackError(
      "http://b.example/",
      new FetchError("HTTP 500: Internal Server Error", { url: "http://b.example/", status: 500 }),
      "page",
    );

    const dir = join(await mkdtemp(join(tmpdir(), "harvest-stats-")), "out");
    const path = await tracker.exportStats(dir);

    expect(path).toBe(join(dir, STATS_FILENAME));
    const exported = JSON.parse(await readFile(path, "utf-8"));
    expect(exported.summary).toMatchObject({
      totalPages: 3,
      harvestedPages: 2,
      failedPages: 1,
      candidates: 4,
      batches: 1,
      downloadedImages: 1,
      failedImages: 1,
    });
    expect(exported.issues.page["invalid-response"]).toEqual([
      {
        type: "page",
        path: "http://b.example/",
        reason: "invalid-response",
        details: "HTTP 500: Internal Server Error",
      },
    ]);
    expect(exported.issues.image).toEqual({});
  });
});
