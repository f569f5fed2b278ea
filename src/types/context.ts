/**
 * Run context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { DownloaderConfig } from "./config";
import type { BatchDescriptor, RunSummary } from "./tasks";
import type { Transport } from "../transports";
import type { FileSystem } from "../utils/file-system";
import type { OutputChannel } from "../utils/output-channel";
import type { RunTracker } from "../utils/run-tracker";

// Re-export types from run-tracker
export type {
  Issue,
  IssueType,
  TaskIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunStats,
} from "../utils/run-tracker";

export interface RunContext {
  // Input - provided at initialization
  config: DownloaderConfig;
  transport: Transport;
  fs: FileSystem;
  output: OutputChannel;

  // Unified tracking for per-batch summaries and issues
  tracker: RunTracker;

  dryRun?: boolean;
  verbose?: boolean;

  // Overridable for tests
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;

  batches?: BatchDescriptor[]; // Written by discovery
  summary?: RunSummary; // Written by runner
}
