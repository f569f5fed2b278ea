/**
 * gdown Transport
 * Spawns the gdown CLI once per attempt
 */

import { execFile, type ExecFileException } from "child_process";
import type { Transport, TransportResult } from "./types";
import { TransportTimeoutError, TransportUnavailableError } from "./types";

export interface ExecOutcome {
  error: ExecFileException | null;
  stdout: string;
  stderr: string;
}

export type ExecRunner = (
  file: string,
  args: string[],
  timeoutMs: number,
) => Promise<ExecOutcome>;

/**
 * Run a command, resolving with its error instead of rejecting
 */
export const execFileRunner: ExecRunner = (file, args, timeoutMs) =>
  new Promise((resolve) => {
    execFile(
      file,
      args,
      { timeout: timeoutMs, encoding: "utf8", windowsHide: true },
      (error, stdout, stderr) => resolve({ error, stdout, stderr }),
    );
  });

export interface GdownTransportOptions {
  command?: string;
  python?: string;
  exec?: ExecRunner;
}

const VERSION_TIMEOUT = 30_000;
const INSTALL_TIMEOUT = 300_000;

export function driveDownloadUrl(resourceId: string): string {
  return `https://drive.google.com/uc?id=${resourceId}`;
}

export class GdownTransport implements Transport {
  readonly name = "gdown";
  private readonly command: string;
  private readonly python: string;
  private readonly exec: ExecRunner;

  constructor(options: GdownTransportOptions = {}) {
    this.command = options.command ?? "gdown";
    this.python = options.python ?? "python3";
    this.exec = options.exec ?? execFileRunner;
  }

  async fetch(
    resourceId: string,
    destinationPath: string,
    timeoutMs: number,
  ): Promise<TransportResult> {
    const { error, stderr } = await this.exec(
      this.command,
      [driveDownloadUrl(resourceId), "-O", destinationPath, "--quiet"],
      timeoutMs,
    );

    if (!error) {
      return { ok: true, diagnostic: stderr };
    }
    if (error.killed) {
      throw new TransportTimeoutError(resourceId, timeoutMs);
    }
    // A string code (ENOENT, EACCES) means the process never ran
    if (typeof error.code === "string") {
      throw error;
    }
    // error.message echoes the command line, destination path included
    const code = error.code ?? "unknown";
    return {
      ok: false,
      diagnostic: stderr || `${this.command} exited with code ${code}`,
    };
  }

  async ensureAvailable(report?: (message: string) => void): Promise<void> {
    if (await this.isInstalled()) {
      return;
    }

    report?.(`${this.command} is not installed. Installing...`);
    const install = await this.exec(
      this.python,
      ["-m", "pip", "install", "gdown"],
      INSTALL_TIMEOUT,
    );
    if (install.error) {
      throw new TransportUnavailableError(
        this.name,
        install.stderr.trim() || install.error.message,
      );
    }

    if (!(await this.isInstalled())) {
      throw new TransportUnavailableError(
        this.name,
        `installed with pip but "${this.command} --version" still fails`,
      );
    }
  }

  private async isInstalled(): Promise<boolean> {
    const { error } = await this.exec(
      this.command,
      ["--version"],
      VERSION_TIMEOUT,
    );
    return error === null;
  }
}
