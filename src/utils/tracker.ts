/**
 * Harvest Tracker
 * Unified tracking for stats and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  PageIssue,
  ImageIssue,
  ResourceIssue,
  PageIssueReason,
  ImageIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../types";
import {
  DecodeError,
  DownloadError,
  FetchError,
  HarvestError,
  IOError,
  describeError,
} from "./errors";

export const STATS_FILENAME = "harvest-stats.json";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: describeError(error),
  };
}

function mapPageError(error: unknown): IssueInfo<PageIssueReason> {
  const details = describeError(error);

  if (error instanceof FetchError) {
    if (error.timedOut) return { reason: "timeout", details };
    if (error.status !== undefined) {
      return { reason: "invalid-response", details };
    }
    return { reason: "fetch-failed", details };
  }
  return { reason: "parse-failed", details };
}

function mapImageError(error: unknown): IssueInfo<ImageIssueReason> {
  const details = describeError(error);

  if (error instanceof DownloadError) {
    if (error.timedOut) return { reason: "timeout", details };
    if (error.status !== undefined) {
      return { reason: "invalid-response", details };
    }
    return { reason: "download-failed", details };
  }
  if (error instanceof IOError) {
    return { reason: "write-failed", details };
  }
  if (error instanceof DecodeError) {
    return { reason: "decode-failed", details };
  }
  return { reason: "download-failed", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalPages = 0;
  private harvestedPages = 0;
  private failedPages = 0;
  private candidates = 0;
  private batches = 0;
  private downloadedImages = 0;
  private failedImages = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalPages(count: number): void {
    this.totalPages = count;
  }

  incrementHarvested(): void {
    this.harvestedPages++;
  }

  incrementPagesFailed(): void {
    this.failedPages++;
  }

  setCandidates(count: number): void {
    this.candidates = count;
  }

  incrementBatches(): void {
    this.batches++;
  }

  incrementImagesDownloaded(): void {
    this.downloadedImages++;
  }

  incrementImagesFailed(): void {
    this.failedImages++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(path: string, error: unknown, type: IssueType): void {
    switch (type) {
      case "page": {
        const { reason, details } = mapPageError(error);
        this.issues.push({ type: "page", path, reason, details });
        break;
      }
      case "image": {
        const { reason, details } = mapImageError(error);
        const status =
          error instanceof HarvestError ? error.reached : undefined;
        this.issues.push({ type: "image", path, reason, status, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  getIssues(type: "page"): PageIssue[];
  getIssues(type: "image"): ImageIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return [...this.issues];
    return this.issues.filter((issue) => issue.type === type);
  }

  // ============================================================================
  // Stats
  // ============================================================================

  getStats(): ProcessingStats {
    return {
      totalPages: this.totalPages,
      harvestedPages: this.harvestedPages,
      failedPages: this.failedPages,
      candidates: this.candidates,
      batches: this.batches,
      downloadedImages: this.downloadedImages,
      failedImages: this.failedImages,
      issues: [...this.issues],
      duration: Date.now() - this.startTime.getTime(),
    };
  }

  async exportStats(outputDir: string): Promise<string> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalPages: stats.totalPages,
        harvestedPages: stats.harvestedPages,
        failedPages: stats.failedPages,
        candidates: stats.candidates,
        batches: stats.batches,
        downloadedImages: stats.downloadedImages,
        failedImages: stats.failedImages,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, STATS_FILENAME);
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
    return outputPath;
  }

  private groupIssuesByTypeAndReason(): Record<
    IssueType,
    Record<string, Issue[]>
  > {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      page: {},
      image: {},
      resource: {},
    };

    for (const issue of this.issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
