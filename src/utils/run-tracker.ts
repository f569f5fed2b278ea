/**
 * Run Tracker
 * Unified tracking for batch summaries and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  BatchDescriptor,
  BatchReport,
  BatchSummary,
  FetchIssueReason,
  FetchResult,
} from "../types/tasks";
import { mergeSummaries } from "../modules/aggregator";

// ============================================================================
// Issue types
// ============================================================================

export type IssueType = "task" | "resource";

export type ResourceIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export interface TaskIssue {
  type: "task";
  batch: string;
  path: string;
  resourceId: string;
  reason: FetchIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = TaskIssue | ResourceIssue;

export interface RunStats {
  batches: BatchReport[];
  total: BatchSummary;
  tasks: number;
  issues: Issue[];
  duration: number;
}

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
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

// ============================================================================
// RunTracker - Main tracker class
// ============================================================================

export class RunTracker {
  private batches: BatchReport[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Batch results
  // ============================================================================

  /**
   * Record a finished batch and the issues of its failed tasks
   */
  recordBatch(
    batch: BatchDescriptor,
    tasks: number,
    results: readonly FetchResult[],
    summary: BatchSummary,
  ): BatchReport {
    const report: BatchReport = { batch, tasks, summary };
    this.batches.push(report);

    for (const result of results) {
      if (result.outcome === "error" && result.issue) {
        this.issues.push({
          type: "task",
          batch: batch.label,
          path: result.task.destinationPath,
          resourceId: result.task.resourceId,
          reason: result.issue.reason,
          details: result.issue.details,
        });
      }
    }

    return report;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track a resource issue, auto-detecting the reason based on error type
   */
  trackError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(): Issue[] {
    return this.issues;
  }

  getIssuesOfType<T extends IssueType>(type: T): Extract<Issue, { type: T }>[] {
    return this.issues.filter(
      (i): i is Extract<Issue, { type: T }> => i.type === type,
    );
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    const duration = new Date().getTime() - this.startTime.getTime();
    const total = mergeSummaries(this.batches.map((b) => b.summary));

    return {
      batches: this.batches,
      total,
      tasks: this.batches.reduce((sum, b) => sum + b.tasks, 0),
      issues: this.issues,
      duration,
    };
  }

  /**
   * Group issues as { type: { reason: [issues] } }
   */
  private groupIssuesByTypeAndReason(): Record<string, Record<string, Issue[]>> {
    const grouped: Record<string, Record<string, Issue[]>> = {};
    for (const issue of this.issues) {
      const byReason = (grouped[issue.type] ??= {});
      (byReason[issue.reason] ??= []).push(issue);
    }
    return grouped;
  }

  /**
   * Write stats.json to the output directory
   */
  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        batches: stats.batches.length,
        tasks: stats.tasks,
        downloaded: stats.total.downloaded,
        skipped: stats.total.skipped,
        errors: stats.total.errors,
        duration: stats.duration,
      },
      batches: stats.batches.map((b) => ({
        label: b.batch.label,
        path: b.batch.path,
        tasks: b.tasks,
        ...b.summary,
      })),
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(outputDir, { recursive: true });
    await writeFile(
      join(outputDir, "stats.json"),
      JSON.stringify(exported, null, 2),
      "utf-8",
    );
  }
}
