import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AssetKind } from "../src/catalog";
import { FetchError, FetchTimeoutError, SessionUnusableError } from "../src/core/errors";
import { createSilentLogger } from "../src/observability";
import { AssetFetcher, type AssetFetcherOptions, type SessionCapability } from "../src/session";
import type { Product } from "../src/types";
import {
  FakeBatchSession,
  FakePortal,
  type FakeResponse,
  FakeSession,
  makeTempDir,
  pdfBody,
  stepBody,
} from "./helpers/fakeSession";

const product: Product = { modelCode: "LDR2-32RD2", order: 0 };

const stepOnly = (...responses: FakeResponse[]): Map<AssetKind, FakeResponse[]> =>
  new Map<AssetKind, FakeResponse[]>([["STEP", responses]]);

describe("AssetFetcher", () => {
  let downloadDir: string;

  const createFetcher = (session: SessionCapability, overrides: Partial<AssetFetcherOptions> = {}): AssetFetcher =>
    new AssetFetcher({
      session,
      downloadDir,
      operationTimeoutMs: 5_000,
      cadGenerationTimeoutMs: 5_000,
      cadPollIntervalMs: 1,
      cadFormatProfile: "STEP AP214",
      logger: createSilentLogger(),
      sleep: async () => undefined,
      ...overrides,
    });

  beforeEach(async () => {
    downloadDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.promises.rm(downloadDir, { recursive: true, force: true });
  });

  it("returns a delivered file inside its own work directory", async () => {
    const session = new FakeSession().addProduct(product.modelCode);
    const file = await createFetcher(session).fetch(product, "Catalog");

    expect(file.originalName).toBe("catalog.pdf");
    expect(path.dirname(file.path)).toBe(file.workDir);
    expect(path.dirname(file.workDir)).toBe(downloadDir);
    expect(await fs.promises.readFile(file.path, "utf-8")).toBe(pdfBody(`${product.modelCode} catalog`));
  });

  it("drives the CAD portal and selects the format on the first visit only", async () => {
    const first = new FakePortal({ body: stepBody(), name: "part.stp" }, { pendingPolls: 2 });
    const second = new FakePortal({ body: stepBody(), name: "part.stp" });
    const session = new FakeSession().addProduct(product.modelCode, stepOnly({ portal: first }, { portal: second }));
    const fetcher = createFetcher(session);

    const file = await fetcher.fetch(product, "STEP");
    await fetcher.fetch(product, "STEP");

    expect(file.originalName).toBe("part.stp");
    expect(first.calls).toEqual(["open", "select:STEP AP214", "start", "status", "status", "status", "download", "close"]);
    expect(second.calls).toEqual(["open", "start", "status", "download", "close"]);
  });

  it("selects the format again for a product after it was released", async () => {
    const first = new FakePortal({ body: stepBody(), name: "part.stp" });
    const second = new FakePortal({ body: stepBody(), name: "part.stp" });
    const session = new FakeSession().addProduct(product.modelCode, stepOnly({ portal: first }, { portal: second }));
    const fetcher = createFetcher(session);

    await fetcher.fetch(product, "STEP");
    fetcher.releaseProduct(product);
    await fetcher.fetch(product, "STEP");

    expect(second.calls[1]).toBe("select:STEP AP214");
  });

  it("fails when generation fails and still closes the portal", async () => {
    const portal = new FakePortal({ body: stepBody(), name: "part.stp" }, { final: "failed" });
    const session = new FakeSession().addProduct(product.modelCode, stepOnly({ portal }));

    await expect(createFetcher(session).fetch(product, "STEP")).rejects.toBeInstanceOf(FetchError);
    expect(portal.calls.at(-1)).toBe("close");
  });

  it("gives up on generation after the CAD timeout", async () => {
    const portal = new FakePortal({ body: stepBody(), name: "part.stp" }, { pendingPolls: 1_000 });
    const session = new FakeSession().addProduct(product.modelCode, stepOnly({ portal }));
    const fetcher = createFetcher(session, { cadGenerationTimeoutMs: 0 });

    await expect(fetcher.fetch(product, "STEP")).rejects.toBeInstanceOf(FetchTimeoutError);
    expect(portal.calls).toEqual(["open", "select:STEP AP214", "start", "status", "close"]);
  });

  it("keeps the downloaded file when closing the portal fails", async () => {
    const portal = new FakePortal({ body: stepBody(), name: "part.stp" }, { closeError: new Error("tab already gone") });
    const session = new FakeSession().addProduct(product.modelCode, stepOnly({ portal }));

    const file = await createFetcher(session).fetch(product, "STEP");
    expect(await fs.promises.readFile(file.path, "utf-8")).toBe(stepBody());
  });

  it("bounds the whole operation and removes its work directory", async () => {
    const hanging: SessionCapability = {
      login: async () => undefined,
      listAssets: async () => [],
      fetch: (_product, _kind, options) =>
        new Promise((_resolve, reject) => {
          options.signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    };

    await expect(createFetcher(hanging, { operationTimeoutMs: 20 }).fetch(product, "Catalog")).rejects.toBeInstanceOf(
      FetchTimeoutError,
    );
    expect(await fs.promises.readdir(downloadDir)).toEqual([]);
  });

  it("reports the timeout only once a driver ignoring the abort has finished", async () => {
    let finished = false;
    const slow: SessionCapability = {
      login: async () => undefined,
      listAssets: async () => [],
      fetch: async (_product, _kind, options) => {
        await new Promise((resolve) => setTimeout(resolve, 60));
        finished = true;
        const target = path.join(options.downloadDir, "late.pdf");
        await fs.promises.writeFile(target, pdfBody());
        return { type: "file", path: target };
      },
    };

    const fetching = createFetcher(slow, { operationTimeoutMs: 20, abortGraceMs: 1_000 }).fetch(product, "Catalog");
    await expect(fetching).rejects.toThrow(`Catalog fetch for ${product.modelCode} timed out after 20ms`);
    expect(finished).toBe(true);
    expect(await fs.promises.readdir(downloadDir)).toEqual([]);
  });

  it("gives up on a driver call that never stops and leaves its work directory alone", async () => {
    const stuck: SessionCapability = {
      login: async () => undefined,
      listAssets: () => new Promise(() => undefined),
      fetch: () => new Promise(() => undefined),
    };
    const fetcher = createFetcher(stuck, { operationTimeoutMs: 10, abortGraceMs: 10 });

    await expect(fetcher.fetch(product, "Catalog")).rejects.toBeInstanceOf(SessionUnusableError);
    expect(await fs.promises.readdir(downloadDir)).toHaveLength(1);
    await expect(fetcher.listAssets(product)).rejects.toThrow(
      `asset listing for ${product.modelCode} still running 10ms after timing out at 10ms`,
    );
  });

  it("reports per-kind outcomes of a combined retrieval", async () => {
    const session = new FakeBatchSession().addProduct(product.modelCode);
    session.dropFromBatch.add("STEP");
    const fetcher = createFetcher(session);

    expect(fetcher.supportsBatch).toBe(true);
    expect(createFetcher(new FakeSession()).supportsBatch).toBe(false);

    const outcome = await fetcher.fetchBatch(product, ["Catalog", "Dimension", "DXF", "STEP"]);
    expect([...outcome.results.keys()]).toEqual(["Catalog", "Dimension", "DXF"]);
    for (const result of outcome.results.values()) {
      expect(result).not.toBeInstanceOf(Error);
      if (!(result instanceof Error)) {
        expect(result.workDir).toBe(outcome.workDir);
      }
    }
  });
});
