/**
 * HTTP Transport
 * Fetches Drive files in-process with the global fetch
 */

import { writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";
import type { Transport, TransportResult } from "./types";
import { TransportTimeoutError } from "./types";

export type FetchFn = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

export interface HttpTransportOptions {
  baseUrl?: string;
  fetch?: FetchFn;
}

const DEFAULT_BASE_URL = "https://drive.google.com/uc";
const EXCERPT_LENGTH = 500;

/**
 * Visible text at the head of an error body, tags stripped
 */
async function readExcerpt(response: Response): Promise<string> {
  const text = await response.text();
  return text
    .slice(0, EXCERPT_LENGTH * 4)
    .replace(/<[^>]*>/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, EXCERPT_LENGTH);
}

function withExcerpt(message: string, excerpt: string): string {
  return excerpt ? `${message}: ${excerpt}` : message;
}

export class HttpTransport implements Transport {
  readonly name = "http";
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: HttpTransportOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  downloadUrl(resourceId: string): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("export", "download");
    url.searchParams.set("id", resourceId);
    return url.toString();
  }

  async fetch(
    resourceId: string,
    destinationPath: string,
    timeoutMs: number,
  ): Promise<TransportResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let body: Buffer;
    try {
      const response = await this.fetchImpl(this.downloadUrl(resourceId), {
        signal: controller.signal,
        redirect: "follow",
      });

      // Drive puts its quota wording in the body
      if (!response.ok) {
        return {
          ok: false,
          diagnostic: withExcerpt(
            `HTTP ${response.status}: ${response.statusText}`,
            await readExcerpt(response),
          ),
        };
      }

      // Drive answers with an HTML page for quota and virus-scan interstitials
      const contentType = response.headers.get("content-type") ?? "";
      if (contentType.startsWith("text/html")) {
        return {
          ok: false,
          diagnostic: withExcerpt(
            `Received an HTML page instead of file content for ${resourceId}`,
            await readExcerpt(response),
          ),
        };
      }

      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportTimeoutError(resourceId, timeoutMs);
      }
      // Network failures are worth another attempt
      if (error instanceof TypeError) {
        return { ok: false, diagnostic: error.message };
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    await mkdir(dirname(destinationPath), { recursive: true });
    await writeFile(destinationPath, body);
    return { ok: true, diagnostic: "" };
  }

  async ensureAvailable(): Promise<void> {
    // Nothing to install
  }
}
