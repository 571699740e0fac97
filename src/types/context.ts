/**
 * Harvest context - flows through the entire pipeline
 */

import type { HarvestConfig } from "./config";
import type { ImageStatus } from "./pipeline";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

export interface HarvestContext {
  config: HarvestConfig;
  logger: Logger;
  tracker: Tracker;
  verbose?: boolean;
}

// ============================================================================
// Tracker Types
// ============================================================================

export type PageIssueReason =
  | "timeout"
  | "invalid-response"
  | "fetch-failed"
  | "parse-failed";
export type ImageIssueReason =
  | "timeout"
  | "invalid-response"
  | "download-failed"
  | "write-failed"
  | "decode-failed";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface PageIssue {
  type: "page";
  path: string;
  reason: PageIssueReason;
  details?: string;
}

export interface ImageIssue {
  type: "image";
  path: string;
  reason: ImageIssueReason;
  status?: ImageStatus;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = PageIssue | ImageIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalPages: number;
  harvestedPages: number;
  failedPages: number;
  candidates: number;
  batches: number;
  downloadedImages: number;
  failedImages: number;
  issues: Issue[];
  duration: number;
}
