/**
 * Batch Aggregator
 * Folds task outcomes into per-batch and grand-total summaries
 */

import type { BatchSummary, Outcome } from "../types";

export function emptySummary(): BatchSummary {
  return { downloaded: 0, skipped: 0, errors: 0 };
}

/**
 * Count one outcome into a summary, returning a new summary
 */
export function tally(summary: BatchSummary, outcome: Outcome): BatchSummary {
  switch (outcome) {
    case "success":
      return { ...summary, downloaded: summary.downloaded + 1 };
    case "skipped":
      return { ...summary, skipped: summary.skipped + 1 };
    case "error":
      return { ...summary, errors: summary.errors + 1 };
  }
}

export function summarize(outcomes: Iterable<Outcome>): BatchSummary {
  let summary = emptySummary();
  for (const outcome of outcomes) {
    summary = tally(summary, outcome);
  }
  return summary;
}

export function mergeSummaries(summaries: Iterable<BatchSummary>): BatchSummary {
  const total = emptySummary();
  for (const summary of summaries) {
    total.downloaded += summary.downloaded;
    total.skipped += summary.skipped;
    total.errors += summary.errors;
  }
  return total;
}

/**
 * Number of outcomes folded into a summary
 */
export function summaryTotal(summary: BatchSummary): number {
  return summary.downloaded + summary.skipped + summary.errors;
}
