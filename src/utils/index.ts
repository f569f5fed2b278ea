/**
 * Utility exports
 */

// Naming utilities
export { extractResourceId } from "./extract-resource-id";
export { sanitizeFilename } from "./sanitize-filename";

// Filesystem utilities
export { fileExists, nodeFileSystem } from "./file-system";
export type { FileSystem } from "./file-system";
export { readRecords, parseRecords, toRecord } from "./read-records";

// Timing utilities
export { sleep, uniform } from "./sleep";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { ConfigError } from "./load-config";

// Classes
export { RunTracker } from "./run-tracker";
export { OutputChannel, formatEvent } from "./output-channel";
export type { FetchEvent, OutputSink } from "./output-channel";
