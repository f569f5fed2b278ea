/**
 * Central type exports
 */

// Configuration
export type {
  DownloaderConfig,
  PartialDownloaderConfig,
  InputConfig,
  OutputConfig,
  JitterConfig,
  DownloadConfig,
  TransportConfig,
  TransportKind,
  PhotoColumn,
  ColumnsConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "./config";

// Tasks
export type {
  BatchDescriptor,
  PhotoRecord,
  DownloadTask,
  Outcome,
  FetchIssue,
  FetchIssueReason,
  FetchResult,
  BatchSummary,
  BatchReport,
  RunSummary,
} from "./tasks";

// Context
export type {
  RunContext,
  Issue,
  IssueType,
  TaskIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunStats,
} from "./context";

// Tracker
export type { RunTracker } from "../utils/run-tracker";
