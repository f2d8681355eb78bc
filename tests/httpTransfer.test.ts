import fs from "node:fs";
import path from "node:path";
import { Response, type RequestInit } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FetchError, FetchTimeoutError, SessionExpiredError } from "../src/core/errors";
import { downloadToFile, type HttpFetch, resolveFileName } from "../src/session";
import { makeTempDir, pdfBody } from "./helpers/fakeSession";

describe("resolveFileName", () => {
  it("prefers the Content-Disposition name", () => {
    expect(resolveFileName("https://files.example.test/dl?id=7", 'attachment; filename="LDR2 manual.pdf"')).toBe(
      "LDR2 manual.pdf",
    );
    expect(resolveFileName("https://files.example.test/dl", "attachment; filename*=UTF-8''LDR2%20catalog.pdf")).toBe(
      "LDR2 catalog.pdf",
    );
  });

  it("falls back to the last URL segment", () => {
    expect(resolveFileName("https://files.example.test/img/LDR2-32RD2%20front.jpg?w=800")).toBe("LDR2-32RD2 front.jpg");
    expect(resolveFileName("https://files.example.test/")).toBe("download");
  });
});

describe("downloadToFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("streams the body to the target with the session cookies", async () => {
    let seen: RequestInit | undefined;
    const fetchFn: HttpFetch = async (_url, init) => {
      seen = init;
      return new Response(pdfBody("manual"), {
        status: 200,
        headers: { "content-type": "application/pdf", "content-disposition": 'attachment; filename="manual.pdf"' },
      });
    };
    const target = path.join(dir, "nested", "manual.pdf");

    const result = await downloadToFile("https://files.example.test/dl/42", target, {
      cookies: [
        { name: "sid", value: "test-session" },
        { name: "lang", value: "en" },
      ],
      userAgent: "collateral-archiver/test",
      timeoutMs: 5_000,
      fetchFn,
    });

    expect(result).toEqual({
      path: target,
      originalName: "manual.pdf",
      bytes: Buffer.byteLength(pdfBody("manual")),
      contentType: "application/pdf",
    });
    expect(await fs.promises.readFile(target, "utf-8")).toBe(pdfBody("manual"));
    expect(await fs.promises.readdir(path.dirname(target))).toEqual(["manual.pdf"]);
    expect(seen?.headers).toEqual({
      accept: "*/*",
      "user-agent": "collateral-archiver/test",
      cookie: "sid=test-session; lang=en",
    });
  });

  it("reports an auth-required response as an expired session", async () => {
    const fetchFn: HttpFetch = async () => new Response("login", { status: 401 });
    const target = path.join(dir, "image.png");

    await expect(downloadToFile("https://files.example.test/a.png", target, { timeoutMs: 5_000, fetchFn })).rejects.toBeInstanceOf(
      SessionExpiredError,
    );
    expect(fs.existsSync(target)).toBe(false);
  });

  it("reports other error statuses as fetch errors", async () => {
    const fetchFn: HttpFetch = async () => new Response("oops", { status: 503 });

    await expect(
      downloadToFile("https://files.example.test/a.png", path.join(dir, "a.png"), { timeoutMs: 5_000, fetchFn }),
    ).rejects.toThrow(new FetchError("HTTP 503 for https://files.example.test/a.png"));
  });

  it("aborts a request that outlives its timeout", async () => {
    const fetchFn: HttpFetch = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });

    await expect(
      downloadToFile("https://files.example.test/slow.pdf", path.join(dir, "slow.pdf"), { timeoutMs: 10, fetchFn }),
    ).rejects.toBeInstanceOf(FetchTimeoutError);
  });
});
