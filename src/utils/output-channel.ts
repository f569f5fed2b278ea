/**
 * Output Channel
 * Serialized console reporting shared by all download workers.
 * Workers send events; a single drain loop writes them in send order.
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { BatchSummary, LogLevel } from "../types";

export type FetchEvent =
  | { type: "downloaded"; file: string }
  | { type: "rate-limited"; file: string; waitSeconds: number }
  | { type: "timeout-retry"; file: string }
  | { type: "timeout"; file: string }
  | { type: "failed"; file: string; attempts: number }
  | { type: "error"; file: string; message: string }
  | {
      type: "batch-start";
      label: string;
      file: string;
      tasks: number;
      workers: number;
    }
  | { type: "batch-summary"; label: string; summary: BatchSummary }
  | { type: "message"; level: LogLevel; text: string };

export type OutputSink = (line: string) => void | Promise<void>;

export interface OutputChannelOptions {
  sink?: OutputSink;
  level?: LogLevel;
  color?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function eventLevel(event: FetchEvent): LogLevel {
  switch (event.type) {
    case "message":
      return event.level;
    case "rate-limited":
    case "timeout-retry":
      return "warn";
    case "timeout":
    case "failed":
    case "error":
      return "error";
    default:
      return "info";
  }
}

/**
 * Render an event as one or more console lines
 */
export function formatEvent(event: FetchEvent, paint: ChalkInstance): string {
  switch (event.type) {
    case "downloaded":
      return `  ${paint.green("✓")} ${event.file}`;
    case "rate-limited":
      return `  ${paint.yellow("⏸")} Rate limit hit, waiting ${event.waitSeconds.toFixed(1)}s... ${paint.dim(event.file)}`;
    case "timeout-retry":
      return `  ${paint.yellow("⏱")} Timeout, retrying... ${event.file}`;
    case "timeout":
      return `  ${paint.red("✗")} Timeout: ${event.file}`;
    case "failed":
      return `  ${paint.red("✗")} Failed after ${event.attempts} attempts: ${event.file}`;
    case "error":
      return `  ${paint.red("✗")} Error: ${event.file} - ${event.message}`;
    case "batch-start":
      return [
        "",
        `${paint.bold("Processing:")} ${event.file}`,
        `District: ${event.label}`,
        `  Downloading ${event.tasks} photos with ${event.workers} parallel workers...`,
      ].join("\n");
    case "batch-summary":
      return [
        "",
        `Summary for ${event.label}:`,
        `  Downloaded: ${event.summary.downloaded}`,
        `  Skipped (existing): ${event.summary.skipped}`,
        `  Errors: ${event.summary.errors}`,
      ].join("\n");
    case "message":
      return event.text;
  }
}

export class OutputChannel {
  private readonly sink: OutputSink;
  private readonly level: LogLevel;
  private readonly paint: ChalkInstance;
  private pending: FetchEvent[] = [];
  private draining: Promise<void> | null = null;
  private failure: unknown = null;

  constructor(options: OutputChannelOptions = {}) {
    this.sink = options.sink ?? ((line) => console.log(line));
    this.level = options.level ?? "info";
    this.paint = options.color === false ? new Chalk({ level: 0 }) : chalk;
  }

  /**
   * Queue an event for output. Never blocks the sender.
   */
  send(event: FetchEvent): void {
    if (LEVEL_ORDER[eventLevel(event)] < LEVEL_ORDER[this.level]) {
      return;
    }

    this.pending.push(event);
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /**
   * Resolve once every event sent so far has been written
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
    if (this.failure !== null) {
      const error = this.failure;
      this.failure = null;
      throw error;
    }
  }

  private async drain(): Promise<void> {
    // send() must store this promise before the loop can finish
    await Promise.resolve();
    try {
      let event = this.pending.shift();
      while (event) {
        await this.sink(formatEvent(event, this.paint));
        event = this.pending.shift();
      }
    } catch (error) {
      this.failure = error;
      this.pending = [];
    } finally {
      this.draining = null;
    }
  }
}
