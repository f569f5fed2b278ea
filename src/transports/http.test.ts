import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { HttpTransport, type FetchFn as FetchImpl } from "./http";
import { TransportTimeoutError } from "./types";
import { isRateLimited } from "../modules/fetcher";

function respondWith(response: Response): { fetch: FetchImpl; urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    fetch: async (input) => {
      urls.push(String(input));
      return response;
    },
  };
}

describe("HttpTransport", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("builds the Drive export URL", () => {
    expect(new HttpTransport().downloadUrl("ABC123")).toBe(
      "https://drive.google.com/uc?export=download&id=ABC123",
    );
  });

  it("writes the body to the destination", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "http-"));
    const destination = path.join(dir, "nested", "a.jpg");
    const { fetch, urls } = respondWith(
      new Response("jpeg-bytes", {
        status: 200,
        headers: { "content-type": "image/jpeg" },
      }),
    );

    const result = await new HttpTransport({ fetch }).fetch(
      "ABC123",
      destination,
      1000,
    );

    expect(result).toEqual({ ok: true, diagnostic: "" });
    expect(urls).toEqual([
      "https://drive.google.com/uc?export=download&id=ABC123",
    ]);
    expect(await readFile(destination, "utf-8")).toBe("jpeg-bytes");
  });

  it("reports the status line of an error response", async () => {
    const { fetch } = respondWith(
      new Response(null, { status: 429, statusText: "Too Many Requests" }),
    );

    await expect(
      new HttpTransport({ fetch }).fetch("ABC123", "/unused.jpg", 1000),
    ).resolves.toEqual({ ok: false, diagnostic: "HTTP 429: Too Many Requests" });
  });

  it("refuses an HTML interstitial", async () => {
    const { fetch } = respondWith(
      new Response("<html></html>", {
        status: 200,
        headers: { "content-type": "text/html; charset=utf-8" },
      }),
    );

    await expect(
      new HttpTransport({ fetch }).fetch("ABC123", "/unused.jpg", 1000),
    ).resolves.toEqual({
      ok: false,
      diagnostic: "Received an HTML page instead of file content for ABC123",
    });
  });

  it("keeps the text of a Drive quota page", async () => {
    const { fetch } = respondWith(
      new Response(
        "<html><head><title>Google Drive - Quota exceeded</title></head>" +
          "<body><p>Too many users have viewed or downloaded this file recently.</p></body></html>",
        { status: 200, headers: { "content-type": "text/html; charset=utf-8" } },
      ),
    );

    const result = await new HttpTransport({ fetch }).fetch(
      "ABC123",
      "/unused.jpg",
      1000,
    );

    expect(result).toEqual({
      ok: false,
      diagnostic:
        "Received an HTML page instead of file content for ABC123: " +
        "Google Drive - Quota exceeded Too many users have viewed or downloaded this file recently.",
    });
    expect(isRateLimited(result.diagnostic)).toBe(true);
  });

  it("keeps the body of a quota error response", async () => {
    const { fetch } = respondWith(
      new Response("Quota exceeded for this file", {
        status: 403,
        statusText: "Forbidden",
      }),
    );

    const result = await new HttpTransport({ fetch }).fetch(
      "ABC123",
      "/unused.jpg",
      1000,
    );

    expect(result).toEqual({
      ok: false,
      diagnostic: "HTTP 403: Forbidden: Quota exceeded for this file",
    });
    expect(isRateLimited(result.diagnostic)).toBe(true);
  });

  it("trims a long error body", async () => {
    const { fetch } = respondWith(
      new Response("x".repeat(5000), { status: 500, statusText: "Error" }),
    );

    const result = await new HttpTransport({ fetch }).fetch(
      "ABC123",
      "/unused.jpg",
      1000,
    );

    expect(result.diagnostic).toBe(`HTTP 500: Error: ${"x".repeat(500)}`);
  });

  it("reports a network failure as a failed attempt", async () => {
    const fetch: FetchImpl = async () => {
      throw new TypeError("fetch failed");
    };

    await expect(
      new HttpTransport({ fetch }).fetch("ABC123", "/unused.jpg", 1000),
    ).resolves.toEqual({ ok: false, diagnostic: "fetch failed" });
  });

  it("aborts and throws a timeout when the request hangs", async () => {
    const fetch: FetchImpl = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        });
      });

    await expect(
      new HttpTransport({ fetch }).fetch("ABC123", "/unused.jpg", 10),
    ).rejects.toBeInstanceOf(TransportTimeoutError);
  });
});
