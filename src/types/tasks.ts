/**
 * Download task, outcome and summary types
 */

/**
 * One photo-links CSV file. The label is the file name without the batch suffix.
 */
export interface BatchDescriptor {
  label: string;
  path: string;
}

/**
 * One row of a batch. Absent fields read as an empty string.
 */
export interface PhotoRecord {
  field(name: string): string;
}

export interface DownloadTask {
  readonly resourceId: string;
  readonly destinationPath: string;
}

export type Outcome = "success" | "skipped" | "error";

export type FetchIssueReason =
  | "timeout"
  | "rate-limited"
  | "retries-exhausted"
  | "transport-error";

export interface FetchIssue {
  reason: FetchIssueReason;
  details: string;
}

export interface FetchResult {
  task: DownloadTask;
  outcome: Outcome;
  // Transport invocations made for this task (0 when skipped)
  attempts: number;
  issue?: FetchIssue;
}

export interface BatchSummary {
  downloaded: number;
  skipped: number;
  errors: number;
}

export interface BatchReport {
  batch: BatchDescriptor;
  tasks: number;
  summary: BatchSummary;
}

export interface RunSummary {
  batches: BatchReport[];
  total: BatchSummary;
}
