/**
 * Runner Module
 * Processes batches one after another, downloading each batch's tasks through the worker pool
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import type {
  BatchDescriptor,
  BatchReport,
  DownloadTask,
  FetchResult,
  PhotoRecord,
  RunContext,
  RunSummary,
} from "../types";
import { readRecords } from "../utils";
import { buildTasks } from "./task-builder";
import { fetchTask } from "./fetcher";
import { runPool } from "./scheduler";
import { mergeSummaries, summarize } from "./aggregator";

function recoverTask(task: DownloadTask, error: unknown): FetchResult {
  return {
    task,
    outcome: "error",
    attempts: 0,
    issue: {
      reason: "transport-error",
      details: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * List the tasks of a batch without downloading anything
 */
async function previewTasks(
  ctx: RunContext,
  tasks: DownloadTask[],
): Promise<FetchResult[]> {
  const results: FetchResult[] = [];
  for (const task of tasks) {
    const exists = await ctx.fs.exists(task.destinationPath);
    ctx.output.send({
      type: "message",
      level: "info",
      text: `  ${exists ? "=" : "+"} ${path.basename(task.destinationPath)}`,
    });
    if (exists) {
      results.push({ task, outcome: "skipped", attempts: 0 });
    }
  }
  return results;
}

/**
 * Read, build and download one batch. Returns null when the batch file can't be read.
 */
export async function runBatch(
  ctx: RunContext,
  batch: BatchDescriptor,
  outputDir: string,
): Promise<BatchReport | null> {
  const { config, tracker, output } = ctx;

  let records: PhotoRecord[];
  try {
    records = await readRecords(batch.path, config.input.encoding);
  } catch (error) {
    tracker.trackError(batch.path, error);
    output.send({
      type: "message",
      level: "error",
      text: `\nCould not read ${path.basename(batch.path)}: ${error instanceof Error ? error.message : String(error)}`,
    });
    return null;
  }

  const tasks = buildTasks(batch, records, outputDir, config.columns);
  output.send({
    type: "batch-start",
    label: batch.label,
    file: path.basename(batch.path),
    tasks: tasks.length,
    workers: config.download.workers,
  });

  const results = ctx.dryRun
    ? await previewTasks(ctx, tasks)
    : await runPool(
        tasks,
        (task) =>
          fetchTask(
            task,
            {
              transport: ctx.transport,
              fs: ctx.fs,
              output,
              sleep: ctx.sleep,
              random: ctx.random,
            },
            {
              maxRetries: config.download.retries,
              timeoutMs: config.download.timeout,
              jitter: config.download.jitter,
            },
          ),
        { concurrency: config.download.workers, recover: recoverTask },
      );

  const summary = summarize(results.map((r) => r.outcome));
  output.send({ type: "batch-summary", label: batch.label, summary });
  await output.flush();

  return tracker.recordBatch(batch, tasks.length, results, summary);
}

/**
 * Runs every discovered batch in order and populates ctx.summary
 */
export async function runBatches(ctx: RunContext): Promise<RunSummary> {
  if (!ctx.batches) {
    throw new Error("Discovery must run before the runner");
  }

  const outputDir = path.resolve(ctx.config.output.directory);
  if (!ctx.dryRun) {
    await mkdir(outputDir, { recursive: true });
  }

  const reports: BatchReport[] = [];
  for (const batch of ctx.batches) {
    const report = await runBatch(ctx, batch, outputDir);
    if (report) reports.push(report);
  }

  ctx.summary = {
    batches: reports,
    total: mergeSummaries(reports.map((r) => r.summary)),
  };
  return ctx.summary;
}
