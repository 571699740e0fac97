/**
 * Central type exports
 */

// Configuration
export type {
  HarvestConfig,
  PartialHarvestConfig,
  ImagesConfig,
  RequestConfig,
  StorageConfig,
  ConcurrencyConfig,
  ParserConfig,
  LogLevel,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  HarvestConfigSchema,
  PartialHarvestConfigSchema,
  LogLevelSchema,
} from "./config";

// Pipeline
export type {
  PageImages,
  ImageCandidate,
  FetchedResource,
  ImageStatus,
  ImageTarget,
  DownloadedImage,
  ProcessedImage,
  StoreImage,
  Outcome,
  BatchOutcome,
  RunStatus,
  RunResult,
} from "./pipeline";

// Context
export type {
  HarvestContext,
  Issue,
  IssueType,
  PageIssue,
  ImageIssue,
  ResourceIssue,
  PageIssueReason,
  ImageIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
