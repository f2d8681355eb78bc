import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { AssetKind } from "../catalog";
import { FetchError, FetchTimeoutError, SessionUnusableError, errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import type { DownloadedFile } from "../packaging";
import type { Product } from "../types";
import type { AssetDelivery, CadPortal, DeliveredFile, FetchOptions, SessionCapability } from "./types";

export interface FetchedFile extends DownloadedFile {
  /** Scratch directory created for this request; the caller removes it. */
  workDir: string;
}

export interface AssetFetcherOptions {
  session: SessionCapability;
  downloadDir: string;
  operationTimeoutMs: number;
  abortGraceMs?: number;
  cadGenerationTimeoutMs: number;
  cadPollIntervalMs: number;
  cadFormatProfile: string;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchOutcome {
  /** Shared scratch directory of the combined retrieval; the caller removes it. */
  workDir: string;
  results: Map<AssetKind, FetchedFile | Error>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const ABORT_GRACE_MS = 5_000;

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`. The
 * returned promise settles only once the operation has, so the session is idle
 * again when the caller retries; an operation still running `graceMs` after
 * the abort rejects with `SessionUnusableError`.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  graceMs = ABORT_GRACE_MS,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const timer = setTimeout(() => {
      controller.abort();
      graceTimer = setTimeout(() => {
        reject(new SessionUnusableError(`${label} still running ${graceMs}ms after timing out at ${timeoutMs}ms`));
      }, graceMs);
    }, timeoutMs);

    const settle = (outcome: () => void): void => {
      clearTimeout(timer);
      clearTimeout(graceTimer);
      if (controller.signal.aborted) {
        reject(new FetchTimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
        return;
      }
      outcome();
    };

    operation(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });
}

/**
 * Front of the session capability used by the orchestrator. A STEP request
 * answered with a CAD portal is followed through generation here, so callers
 * only ever see a file on disk.
 */
export class AssetFetcher {
  private readonly options: AssetFetcherOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly formatSelected = new Set<string>();

  constructor(options: AssetFetcherOptions) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
  }

  get supportsBatch(): boolean {
    return typeof this.options.session.fetchBatch === "function";
  }

  /** Asset kinds the product page offers, under the same operation timeout as a fetch. */
  listAssets(product: Product): Promise<AssetKind[]> {
    return this.bounded(`asset listing for ${product.modelCode}`, () => this.options.session.listAssets(product));
  }

  async fetch(product: Product, kind: AssetKind): Promise<FetchedFile> {
    const workDir = await this.createWorkDir(product, kind);
    try {
      return await this.bounded(`${kind} fetch for ${product.modelCode}`, async (signal) => {
        const fetchOptions: FetchOptions = { downloadDir: workDir, signal };
        const delivery = await this.options.session.fetch(product, kind, fetchOptions);
        return this.resolveDelivery(product, kind, delivery, fetchOptions, workDir);
      });
    } catch (error) {
      await this.discardWorkDir(workDir, error);
      throw error;
    }
  }

  async fetchBatch(product: Product, kinds: AssetKind[]): Promise<BatchOutcome> {
    const fetchBatch = this.options.session.fetchBatch;
    if (!fetchBatch) {
      throw new FetchError("session does not support combined retrieval");
    }

    const workDir = await this.createWorkDir(product, "batch");
    let deliveries: Map<AssetKind, AssetDelivery>;
    try {
      deliveries = await this.bounded(`batch fetch for ${product.modelCode}`, (signal) =>
        fetchBatch.call(this.options.session, product, kinds, { downloadDir: workDir, signal }),
      );
    } catch (error) {
      await this.discardWorkDir(workDir, error);
      throw error;
    }

    const results = new Map<AssetKind, FetchedFile | Error>();
    for (const kind of kinds) {
      const delivery = deliveries.get(kind);
      if (!delivery) {
        continue;
      }
      try {
        const file = await this.bounded(`${kind} delivery for ${product.modelCode}`, (signal) =>
          this.resolveDelivery(product, kind, delivery, { downloadDir: workDir, signal }, workDir),
        );
        results.set(kind, file);
      } catch (error) {
        if (error instanceof SessionUnusableError) {
          throw error;
        }
        results.set(kind, error instanceof Error ? error : new FetchError(errorMessage(error)));
      }
    }

    return { workDir, results };
  }

  /** Forgets per-product portal state, e.g. once a product is done. */
  releaseProduct(product: Product): void {
    this.formatSelected.delete(product.modelCode);
  }

  private async resolveDelivery(
    product: Product,
    kind: AssetKind,
    delivery: AssetDelivery,
    fetchOptions: FetchOptions,
    workDir: string,
  ): Promise<FetchedFile> {
    const file: DeliveredFile =
      delivery.type === "file" ? delivery : await this.runCadPortal(product, delivery.portal, fetchOptions);
    return {
      path: file.path,
      originalName: file.originalName ?? path.basename(file.path),
      workDir,
    };
  }

  private async runCadPortal(product: Product, portal: CadPortal, fetchOptions: FetchOptions): Promise<DeliveredFile> {
    const { logger, cadFormatProfile } = this.options;
    logger.info("cad_portal_open", { modelCode: product.modelCode });
    await portal.open();

    try {
      if (!this.formatSelected.has(product.modelCode)) {
        await portal.selectFormat(cadFormatProfile);
        this.formatSelected.add(product.modelCode);
        logger.debug("cad_portal_format_selected", { modelCode: product.modelCode, profile: cadFormatProfile });
      }

      await portal.startGeneration();
      await this.waitForGeneration(product, portal, fetchOptions.signal);
      return await portal.download(fetchOptions);
    } finally {
      try {
        await portal.close();
      } catch (error) {
        logger.warn("cad_portal_close_failed", { modelCode: product.modelCode, error: errorMessage(error) });
      }
    }
  }

  private async waitForGeneration(product: Product, portal: CadPortal, signal: AbortSignal): Promise<void> {
    const { cadGenerationTimeoutMs, cadPollIntervalMs } = this.options;
    const deadline = Date.now() + cadGenerationTimeoutMs;

    while (true) {
      const status = await portal.generationStatus();
      if (status === "ready") {
        return;
      }
      if (status === "failed") {
        throw new FetchError(`CAD generation failed for ${product.modelCode}`);
      }
      if (signal.aborted || Date.now() >= deadline) {
        throw new FetchTimeoutError(
          `CAD generation for ${product.modelCode} not ready after ${cadGenerationTimeoutMs}ms`,
          cadGenerationTimeoutMs,
        );
      }
      await this.sleep(cadPollIntervalMs);
    }
  }

  private bounded<T>(label: string, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withTimeout(label, this.options.operationTimeoutMs, operation, this.options.abortGraceMs);
  }

  // A driver that never stopped may still be writing here; its directory is left in place.
  private async discardWorkDir(workDir: string, error: unknown): Promise<void> {
    if (error instanceof SessionUnusableError) {
      this.options.logger.warn("work_dir_abandoned", { workDir });
      return;
    }
    await fs.promises.rm(workDir, { recursive: true, force: true });
  }

  private async createWorkDir(product: Product, label: string): Promise<string> {
    const dir = path.join(
      path.resolve(this.options.downloadDir),
      `${product.modelCode}-${label}-${crypto.randomUUID().slice(0, 8)}`,
    );
    await fs.promises.mkdir(dir, { recursive: true });
    return dir;
  }
}
