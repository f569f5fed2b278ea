/**
 * Fetch Executor
 * Downloads one task through the transport with skip, jitter, retry and backoff
 */

import { basename } from "node:path";
import type { DownloadTask, FetchIssue, FetchResult } from "../types";
import {
  TransportTimeoutError,
  type Transport,
  type TransportResult,
} from "../transports";
import type { FileSystem } from "../utils/file-system";
import type { OutputChannel } from "../utils/output-channel";
import { sleep as defaultSleep, uniform } from "../utils/sleep";

export interface FetchDependencies {
  transport: Transport;
  fs: FileSystem;
  output: OutputChannel;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface FetchOptions {
  maxRetries?: number;
  timeoutMs?: number;
  jitter?: { min: number; max: number }; // In milliseconds
}

export const DEFAULT_FETCH_OPTIONS = {
  maxRetries: 3,
  timeoutMs: 90_000,
  jitter: { min: 500, max: 2000 },
} as const;

const RATE_LIMIT_TERMS = ["quota", "limit", "too many"];
const TIMEOUT_RETRY_DELAY = 2000;

export function isRateLimited(diagnostic: string): boolean {
  const message = diagnostic.toLowerCase();
  return RATE_LIMIT_TERMS.some((term) => message.includes(term));
}

/**
 * Seconds to wait after a rate-limited attempt: 2^attempt * (1 + r), r in [0, 1)
 */
export function rateLimitBackoff(attempt: number, random: () => number): number {
  return 2 ** attempt * (1 + random());
}

/**
 * Download a single task.
 *
 * Existing destinations are skipped without touching the transport. Failed
 * attempts are retried up to `maxRetries` in total; rate-limit diagnostics
 * back off exponentially, other failures wait 1-2s, timeouts wait 2s. A
 * transport fault that is not a timeout ends the task at once.
 *
 * Never rejects: every failure is reported and returned as an "error" result.
 */
export async function fetchTask(
  task: DownloadTask,
  deps: FetchDependencies,
  options: FetchOptions = {},
): Promise<FetchResult> {
  const { transport, fs, output } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const maxRetries = options.maxRetries ?? DEFAULT_FETCH_OPTIONS.maxRetries;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs;
  const jitter = options.jitter ?? DEFAULT_FETCH_OPTIONS.jitter;

  const file = basename(task.destinationPath);
  let attempts = 0;

  const fail = (issue: FetchIssue): FetchResult => ({
    task,
    outcome: "error",
    attempts,
    issue,
  });

  try {
    if (await fs.exists(task.destinationPath)) {
      return { task, outcome: "skipped", attempts };
    }

    // Spread the first request of concurrent workers
    await sleep(uniform(jitter.min, jitter.max, random));

    let lastDiagnostic = "";
    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const hasNext = attempt < maxRetries - 1;
      attempts++;

      let result: TransportResult;
      try {
        result = await transport.fetch(
          task.resourceId,
          task.destinationPath,
          timeoutMs,
        );
      } catch (error) {
        if (!(error instanceof TransportTimeoutError)) {
          throw error;
        }
        if (hasNext) {
          output.send({ type: "timeout-retry", file });
          await sleep(TIMEOUT_RETRY_DELAY);
          continue;
        }
        output.send({ type: "timeout", file });
        return fail({ reason: "timeout", details: error.message });
      }

      if (result.ok && (await fs.exists(task.destinationPath))) {
        if ((await fs.size(task.destinationPath)) > 0) {
          output.send({ type: "downloaded", file });
          return { task, outcome: "success", attempts };
        }
        // Empty file: drop it and treat the attempt as failed
        await fs.remove(task.destinationPath);
      }

      lastDiagnostic = result.diagnostic.trim();
      if (isRateLimited(result.diagnostic)) {
        if (hasNext) {
          const waitSeconds = rateLimitBackoff(attempt, random);
          output.send({ type: "rate-limited", file, waitSeconds });
          await sleep(waitSeconds * 1000);
          continue;
        }
        output.send({ type: "failed", file, attempts });
        return fail({ reason: "rate-limited", details: lastDiagnostic });
      }

      if (hasNext) {
        await sleep(uniform(1000, 2000, random));
        continue;
      }
    }

    output.send({ type: "failed", file, attempts });
    return fail({
      reason: "retries-exhausted",
      details: lastDiagnostic || "empty or missing file after download",
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.send({ type: "error", file, message });
    return fail({ reason: "transport-error", details: message });
  }
}
