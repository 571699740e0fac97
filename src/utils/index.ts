/**
 * Utility exports
 */

// URL utilities
export { resolveUrl } from "./resolve-url";
export { parseImages, DEFAULT_EXCLUDE_KEYWORDS } from "./parse-images";
export { urlToFilename, quotePlus } from "./url-to-filename";
export type { StoragePath } from "./url-to-filename";
export { extensionsFor, repairExtension } from "./guess-extension";

// Network utilities
export { fetchResource, fetchPage } from "./fetch-page";
export type { FetchOptions } from "./fetch-page";

// Concurrency utilities
export { settle } from "./settle";

// Filesystem utilities
export { readLineList } from "./read-line-list";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Errors
export {
  HarvestError,
  FetchError,
  ParseError,
  IOError,
  DecodeError,
  DownloadError,
  describeError,
} from "./errors";

// Classes
export { Logger, createLogger, logFilename } from "./logger";
export { Tracker, STATS_FILENAME } from "./tracker";
