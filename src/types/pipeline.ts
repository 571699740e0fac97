/**
 * Pipeline stage data types
 */

import type { HarvestContext } from "./context";

// ============================================================================
// Harvest Types
// ============================================================================

/**
 * Image URLs found on one page, in first-occurrence order
 */
export interface PageImages {
  pageUrl: string;
  imageUrls: string[];
}

export interface ImageCandidate {
  pageUrl: string;
  imageUrl: string;
}

export interface FetchedResource {
  url: string; // Final URL after redirects
  body: Buffer;
  contentType: string | null;
}

// ============================================================================
// Image Stage Types
// ============================================================================

export type ImageStatus = "not-processed" | "downloaded" | "processed";

export interface ImageTarget {
  status: "not-processed";
  url: string;
  pageUrl: string;
  directory: string;
  filename: string;
}

export interface DownloadedImage extends Omit<ImageTarget, "status"> {
  status: "downloaded";
  originalPath: string;
  contentType: string | null;
}

export interface ProcessedImage extends Omit<DownloadedImage, "status"> {
  status: "processed";
  outputPath: string;
}

export type StoreImage = (
  target: ImageTarget,
  ctx: HarvestContext,
) => Promise<ProcessedImage>;

// ============================================================================
// Outcome Types
// ============================================================================

export type Outcome<T> =
  | { ok: true; subject: string; value: T }
  | { ok: false; subject: string; error: unknown };

export interface BatchOutcome {
  errors: number;
  successes: number;
}

export type RunStatus = "success" | "partial" | "no-candidates";

export interface RunResult extends BatchOutcome {
  status: RunStatus;
  pages: number;
  candidates: number;
}
