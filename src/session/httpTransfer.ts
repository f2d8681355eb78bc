import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch as undiciFetch } from "undici";
import type { RequestInit, Response } from "undici";
import { FetchError, FetchTimeoutError, SessionExpiredError } from "../core/errors";
import { getFetchDispatcher } from "../core/fetch";

export type HttpFetch = (url: string, init: RequestInit) => Promise<Response>;

export interface SessionCookie {
  name: string;
  value: string;
}

export interface TransferOptions {
  cookies?: SessionCookie[];
  userAgent?: string;
  timeoutMs: number;
  ignoreHttpsErrors?: boolean;
  signal?: AbortSignal;
  fetchFn?: HttpFetch;
}

export interface TransferResult {
  path: string;
  originalName: string;
  bytes: number;
  contentType?: string;
}

export function cookieHeader(cookies: SessionCookie[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
}

/** File name from a Content-Disposition header, falling back to the URL path. */
export function resolveFileName(url: string, contentDisposition?: string | null): string {
  if (contentDisposition) {
    const encoded = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(contentDisposition);
    if (encoded) {
      return path.basename(decodeURIComponent(encoded[1].trim().replace(/^"|"$/g, "")));
    }
    const plain = /filename\s*=\s*"?([^";]+)"?/i.exec(contentDisposition);
    if (plain) {
      return path.basename(plain[1].trim());
    }
  }

  const pathname = new URL(url).pathname;
  const base = path.posix.basename(pathname);
  return base.length > 0 ? decodeURIComponent(base) : "download";
}

/**
 * Streams a direct asset link to disk with the session's cookies, for drivers
 * whose portal hands out plain URLs (product images, manual PDFs). The body is
 * written to `<target>.part` and renamed when complete.
 */
export async function downloadToFile(url: string, targetPath: string, options: TransferOptions): Promise<TransferResult> {
  const fetchFn = options.fetchFn ?? undiciFetch;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const headers: Record<string, string> = { accept: "*/*" };
  if (options.userAgent) {
    headers["user-agent"] = options.userAgent;
  }
  if (options.cookies && options.cookies.length > 0) {
    headers.cookie = cookieHeader(options.cookies);
  }

  const tempPath = `${targetPath}.part`;
  try {
    let response: Response;
    try {
      response = await fetchFn(url, {
        method: "GET",
        headers,
        dispatcher: getFetchDispatcher(options.ignoreHttpsErrors ?? false),
        signal: controller.signal,
        redirect: "follow",
      });
    } catch (error) {
      if (timedOut) {
        throw new FetchTimeoutError(`GET ${url} timed out after ${options.timeoutMs}ms`, options.timeoutMs);
      }
      throw new FetchError(`GET ${url} failed`, { cause: error });
    }

    if (response.status === 401 || response.status === 403) {
      throw new SessionExpiredError(`HTTP ${response.status} for ${url}`);
    }
    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} for ${url}`);
    }
    if (!response.body) {
      throw new FetchError(`empty response body for ${url}`);
    }

    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
    let bytes = 0;
    const readable = Readable.fromWeb(response.body);
    readable.on("data", (chunk: Buffer) => {
      bytes += chunk.length;
    });

    try {
      await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
      await fs.promises.rename(tempPath, targetPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      if (timedOut) {
        throw new FetchTimeoutError(`GET ${url} timed out after ${options.timeoutMs}ms`, options.timeoutMs);
      }
      throw new FetchError(`writing ${url} to ${targetPath} failed`, { cause: error });
    }

    return {
      path: targetPath,
      originalName: resolveFileName(response.url || url, response.headers.get("content-disposition")),
      bytes,
      contentType: response.headers.get("content-type") ?? undefined,
    };
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", onAbort);
  }
}
