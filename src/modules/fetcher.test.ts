import { describe, it, expect, vi } from "vitest";
import { fetchTask, isRateLimited, rateLimitBackoff } from "./fetcher";
import type { DownloadTask } from "../types";
import {
  MemoryFileSystem,
  ScriptedTransport,
  collectingOutput,
  recordingSleep,
  type TransportStep,
} from "../testing/fakes";

const task: DownloadTask = {
  resourceId: "ABC123",
  destinationPath: "/photos/1-A-4-B-PS007-Auxiliary-PSB-ABC123.jpg",
};
const file = "1-A-4-B-PS007-Auxiliary-PSB-ABC123.jpg";

function setup(script: (call: number) => TransportStep) {
  const fs = new MemoryFileSystem();
  const transport = new ScriptedTransport(fs, script);
  const { output, lines } = collectingOutput();
  const { sleep, delays } = recordingSleep();
  const deps = { transport, fs, output, sleep, random: () => 0.5 };
  return { fs, transport, output, lines, delays, deps };
}

describe("isRateLimited", () => {
  it("detects quota, limit and too many wording in any case", () => {
    expect(isRateLimited("Download quota exceeded")).toBe(true);
    expect(isRateLimited("RATE LIMIT reached")).toBe(true);
    expect(isRateLimited("HTTP 429: Too Many Requests")).toBe(true);
  });

  it("ignores other failures", () => {
    expect(isRateLimited("Connection reset by peer")).toBe(false);
    expect(isRateLimited("")).toBe(false);
  });
});

describe("rateLimitBackoff", () => {
  it("doubles with each attempt", () => {
    expect(rateLimitBackoff(0, () => 0)).toBe(1);
    expect(rateLimitBackoff(1, () => 0.5)).toBe(3);
    expect(rateLimitBackoff(2, () => 0.25)).toBe(5);
  });
});

describe("fetchTask", () => {
  it("skips an existing destination without calling the transport", async () => {
    const { fs, transport, delays, deps } = setup(() => ({ ok: true }));
    fs.files.set(task.destinationPath, 42);

    const result = await fetchTask(task, deps);

    expect(result).toEqual({ task, outcome: "skipped", attempts: 0 });
    expect(transport.calls).toHaveLength(0);
    expect(delays).toEqual([]);
  });

  it("downloads on the first attempt after the jitter delay", async () => {
    const { transport, output, lines, delays, deps } = setup(() => ({
      ok: true,
      size: 2048,
    }));

    const result = await fetchTask(task, deps);
    await output.flush();

    expect(result).toEqual({ task, outcome: "success", attempts: 1 });
    expect(transport.calls).toEqual([
      {
        resourceId: "ABC123",
        destinationPath: task.destinationPath,
        timeoutMs: 90_000,
      },
    ]);
    // 500 + (2000 - 500) * 0.5
    expect(delays).toEqual([1250]);
    expect(lines).toEqual([`  ✓ ${file}`]);
  });

  it("exhausts every attempt when the transport keeps reporting a rate limit", async () => {
    const { transport, output, lines, delays, deps } = setup(() => ({
      ok: false,
      diagnostic: "Too many users have viewed or downloaded this file recently",
    }));

    const result = await fetchTask(task, deps, { maxRetries: 3 });
    await output.flush();

    expect(result.outcome).toBe("error");
    expect(result.attempts).toBe(3);
    expect(result.issue?.reason).toBe("rate-limited");
    expect(transport.calls).toHaveLength(3);
    // jitter, then 2^0 * 1.5s and 2^1 * 1.5s
    expect(delays).toEqual([1250, 1500, 3000]);
    expect(lines).toEqual([
      `  ⏸ Rate limit hit, waiting 1.5s... ${file}`,
      `  ⏸ Rate limit hit, waiting 3.0s... ${file}`,
      `  ✗ Failed after 3 attempts: ${file}`,
    ]);
  });

  it("succeeds on the second attempt after a generic failure", async () => {
    const { transport, delays, deps } = setup((call) =>
      call === 1
        ? { ok: false, diagnostic: "Failed to retrieve file url" }
        : { ok: true, size: 10 },
    );

    const result = await fetchTask(task, deps);

    expect(result).toEqual({ task, outcome: "success", attempts: 2 });
    expect(transport.calls).toHaveLength(2);
    expect(delays).toEqual([1250, 1500]);
  });

  it("deletes a zero-byte result and retries", async () => {
    const { fs, deps } = setup((call) =>
      call === 1 ? { ok: true, size: 0 } : { ok: true, size: 3 },
    );

    const result = await fetchTask(task, deps);

    expect(result.outcome).toBe("success");
    expect(result.attempts).toBe(2);
    expect(fs.removed).toEqual([task.destinationPath]);
    expect(fs.files.get(task.destinationPath)).toBe(3);
  });

  it("reports an error when every attempt yields an empty file", async () => {
    const { fs, output, lines, deps } = setup(() => ({ ok: true, size: 0 }));

    const result = await fetchTask(task, deps);
    await output.flush();

    expect(result.outcome).toBe("error");
    expect(result.issue).toEqual({
      reason: "retries-exhausted",
      details: "empty or missing file after download",
    });
    expect(fs.files.has(task.destinationPath)).toBe(false);
    expect(lines).toEqual([`  ✗ Failed after 3 attempts: ${file}`]);
  });

  it("retries when the transport succeeds without writing a file", async () => {
    const { transport, deps } = setup((call) =>
      call === 1 ? { ok: true } : { ok: true, size: 7 },
    );

    const result = await fetchTask(task, deps);

    expect(result.outcome).toBe("success");
    expect(transport.calls).toHaveLength(2);
  });

  it("gives up with the last diagnostic after generic failures", async () => {
    const { delays, deps } = setup(() => ({
      ok: false,
      diagnostic: "Access denied\n",
    }));

    const result = await fetchTask(task, deps);

    expect(result.issue).toEqual({
      reason: "retries-exhausted",
      details: "Access denied",
    });
    expect(delays).toEqual([1250, 1500, 1500]);
  });

  it("waits two seconds and retries after a timeout", async () => {
    const { output, lines, delays, deps } = setup((call) =>
      call === 1 ? { timeout: true } : { ok: true, size: 1 },
    );

    const result = await fetchTask(task, deps);
    await output.flush();

    expect(result.outcome).toBe("success");
    expect(delays).toEqual([1250, 2000]);
    expect(lines).toEqual([`  ⏱ Timeout, retrying... ${file}`, `  ✓ ${file}`]);
  });

  it("reports a timeout error once attempts run out", async () => {
    const { transport, output, lines, deps } = setup(() => ({
      timeout: true,
    }));

    const result = await fetchTask(task, deps, { maxRetries: 2, timeoutMs: 5 });
    await output.flush();

    expect(result.outcome).toBe("error");
    expect(result.issue).toEqual({
      reason: "timeout",
      details: "Timed out after 5ms fetching ABC123",
    });
    expect(transport.calls).toHaveLength(2);
    expect(lines).toEqual([
      `  ⏱ Timeout, retrying... ${file}`,
      `  ✗ Timeout: ${file}`,
    ]);
  });

  it("fails fast on a non-timeout transport fault", async () => {
    const { transport, output, lines, deps } = setup(() => ({
      fault: new Error("spawn gdown ENOENT"),
    }));

    const result = await fetchTask(task, deps);
    await output.flush();

    expect(result).toEqual({
      task,
      outcome: "error",
      attempts: 1,
      issue: { reason: "transport-error", details: "spawn gdown ENOENT" },
    });
    expect(transport.calls).toHaveLength(1);
    expect(lines).toEqual([`  ✗ Error: ${file} - spawn gdown ENOENT`]);
  });

  it("turns a failing existence check into an error result", async () => {
    const { fs, transport, output, lines, deps } = setup(() => ({
      ok: true,
      size: 1,
    }));
    vi.spyOn(fs, "exists").mockRejectedValue(new Error("EACCES: permission denied"));

    await expect(fetchTask(task, deps)).resolves.toEqual({
      task,
      outcome: "error",
      attempts: 0,
      issue: { reason: "transport-error", details: "EACCES: permission denied" },
    });
    await output.flush();

    expect(transport.calls).toHaveLength(0);
    expect(lines).toEqual([`  ✗ Error: ${file} - EACCES: permission denied`]);
  });

  it("stops when the downloaded file cannot be measured", async () => {
    const { fs, transport, deps } = setup(() => ({ ok: true, size: 5 }));
    vi.spyOn(fs, "size").mockRejectedValue(new Error("EIO: i/o error"));

    await expect(fetchTask(task, deps)).resolves.toEqual({
      task,
      outcome: "error",
      attempts: 1,
      issue: { reason: "transport-error", details: "EIO: i/o error" },
    });
    expect(transport.calls).toHaveLength(1);
  });

  it("stops when an empty file cannot be removed", async () => {
    const { fs, transport, deps } = setup(() => ({ ok: true, size: 0 }));
    vi.spyOn(fs, "remove").mockRejectedValue(new Error("EPERM: operation not permitted"));

    await expect(fetchTask(task, deps)).resolves.toEqual({
      task,
      outcome: "error",
      attempts: 1,
      issue: {
        reason: "transport-error",
        details: "EPERM: operation not permitted",
      },
    });
    expect(transport.calls).toHaveLength(1);
  });

  it("uses the configured jitter window", async () => {
    const { delays, deps } = setup(() => ({ ok: true, size: 1 }));

    await fetchTask(task, deps, { jitter: { min: 100, max: 300 } });

    expect(delays).toEqual([200]);
  });
});
