import fs from "node:fs";
import path from "node:path";
import { ASSET_ORDER, type AssetKind, COMPLETE_MARKER, describeAsset, REQUIRED_KINDS } from "../catalog";
import type { RunConfig } from "../config";
import {
  ArchiveError,
  FetchError,
  SessionExpiredError,
  SessionUnusableError,
  ValidationError,
  errorClass,
  errorMessage,
  isFatal,
} from "../core/errors";
import { limitProducts, type ProductSource } from "../crawl";
import type { ResumeLedger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import type { Packager } from "../packaging";
import { AssetFetcher, type FetchedFile, type SessionCapability, SessionState } from "../session";
import type { RunStore } from "../store";
import type { Credentials, Product, ProductFailure, ProductSummary, RunSummary, RunTotals, TaskResult } from "../types";
import type { ArtifactValidator } from "../validate";

/** One exclusive browser session with its own auth lifecycle. */
export interface SessionHandle {
  id: number;
  session: SessionCapability;
  state: SessionState;
  fetcher: AssetFetcher;
}

export interface SessionHandleDeps {
  config: RunConfig;
  credentials: Credentials;
  logger: Logger;
  metrics?: MetricsRegistry;
  sleep?: (ms: number) => Promise<void>;
}

export function createSessionHandle(id: number, session: SessionCapability, deps: SessionHandleDeps): SessionHandle {
  const logger = deps.logger.child(`session_${id}`);
  return {
    id,
    session,
    state: new SessionState({
      session,
      credentials: deps.credentials,
      logger,
      metrics: deps.metrics,
      maxReauthentications: deps.config.maxReauthentications,
    }),
    fetcher: new AssetFetcher({
      session,
      downloadDir: deps.config.downloadDir,
      operationTimeoutMs: deps.config.operationTimeoutMs,
      abortGraceMs: deps.config.abortGraceMs,
      cadGenerationTimeoutMs: deps.config.cadGenerationTimeoutMs,
      cadPollIntervalMs: deps.config.cadPollIntervalMs,
      cadFormatProfile: deps.config.cadFormatProfile,
      logger,
      sleep: deps.sleep,
    }),
  };
}

export interface OrchestratorDeps {
  runId: string;
  config: RunConfig;
  ledger: ResumeLedger;
  packager: Packager;
  validator: ArtifactValidator;
  sessions: SessionHandle[];
  logger: Logger;
  metrics: MetricsRegistry;
  store?: RunStore;
  sleep?: (ms: number) => Promise<void>;
}

type Prefetched = FetchedFile | Error;

export interface ProductOutcome {
  summary: ProductSummary;
  /** Fatal error that stopped the product part-way; its unfinished kinds are reported as failed. */
  fatalError?: ArchiveError;
}

interface RunControl {
  abort?: { error: unknown };
  liveSessions: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new FetchError(errorMessage(error));
}

function emptyTotals(): RunTotals {
  return { products: 0, finalized: 0, skipped: 0, unavailable: 0, failed: 0 };
}

export class DownloadOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: OrchestratorDeps) {
    if (deps.sessions.length === 0) {
      throw new Error("DownloadOrchestrator needs at least one session");
    }
    this.deps = deps;
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Processes every product of `source` and returns the run summary. Per-asset
   * failures never stop the run; only fatal session errors (or a failing
   * source) end it early, with status `aborted`.
   */
  async run(source: ProductSource): Promise<RunSummary> {
    const { runId, config, ledger, logger, store, sessions } = this.deps;
    const startedAt = new Date().toISOString();
    await store?.startRun(runId, startedAt);

    const limited = limitProducts(source, config.maxProducts);
    logger.info("run_start", {
      source: limited.describe(),
      sessions: sessions.length,
      overwrite: config.overwrite,
      maxAttempts: config.maxAttempts,
    });

    const iterator = limited.products()[Symbol.asyncIterator]();
    const summaries: ProductSummary[] = [];
    const control: RunControl = { liveSessions: sessions.length };
    const stop = (error: unknown): void => {
      if (control.abort === undefined) {
        control.abort = { error };
      }
    };

    // Sessions pull from one shared iterator, so each product goes to exactly one of them.
    // A fatal error stops every session before it takes another product.
    const worker = async (handle: SessionHandle): Promise<void> => {
      try {
        while (control.abort === undefined) {
          const next = await iterator.next();
          if (next.done || control.abort !== undefined) {
            return;
          }
          const outcome = await this.processProduct(handle, next.value);
          summaries.push(outcome.summary);
          if (outcome.fatalError instanceof SessionUnusableError) {
            this.retireSession(handle, control, outcome.fatalError, stop);
            return;
          }
          if (outcome.fatalError) {
            stop(outcome.fatalError);
            return;
          }
        }
      } catch (error) {
        stop(error);
      }
    };

    await Promise.all(sessions.map((handle) => worker(handle)));
    await ledger.flush();
    const abortError = control.abort?.error;
    const aborted = control.abort !== undefined;

    summaries.sort((a, b) => a.order - b.order);
    const totals = emptyTotals();
    for (const summary of summaries) {
      totals.products += 1;
      totals.finalized += summary.finalized;
      totals.skipped += summary.skipped;
      totals.unavailable += summary.unavailable;
      totals.failed += summary.failed;
    }

    const summary: RunSummary = {
      runId,
      status: aborted ? "aborted" : "completed",
      startedAt,
      finishedAt: new Date().toISOString(),
      products: summaries,
      totals,
      abortReason: aborted ? `${errorClass(abortError)}: ${errorMessage(abortError)}` : undefined,
    };

    await store?.finishRun(summary);
    if (aborted) {
      logger.error("run_aborted", { errorClass: errorClass(abortError), error: errorMessage(abortError), ...totals });
    }
    for (const product of summaries.filter((item) => item.failures.length > 0)) {
      logger.warn("product_incomplete", {
        modelCode: product.modelCode,
        failures: product.failures.map((failure) => `${failure.kind}: ${failure.reason} (${failure.attempts} attempt(s))`),
      });
    }
    logger.info("run_summary", { status: summary.status, ...totals });
    return summary;
  }

  async processProduct(handle: SessionHandle, product: Product): Promise<ProductOutcome> {
    const { config, ledger, logger, metrics } = this.deps;
    const results = new Map<AssetKind, TaskResult>();
    logger.info("product_start", { modelCode: product.modelCode, order: product.order, session: handle.id });

    const pending: AssetKind[] = [];
    for (const kind of ASSET_ORDER) {
      const entry = ledger.get(product.modelCode, kind);
      if (!config.overwrite && entry && (await ledger.hasCompleted(product.modelCode, kind))) {
        results.set(kind, {
          modelCode: product.modelCode,
          kind,
          status: "skipped",
          attempts: 0,
          path: entry.path,
          fingerprint: { bytes: entry.bytes, sha256: entry.sha256, check: entry.check },
          finishedAt: new Date().toISOString(),
        });
        continue;
      }
      pending.push(kind);
    }

    let fatalError: ArchiveError | undefined;
    try {
      if (pending.length > 0) {
        await this.processPending(handle, product, pending, results);
      }
    } catch (error) {
      if (!(error instanceof ArchiveError) || !error.fatal) {
        throw error;
      }
      fatalError = error;
      for (const kind of pending) {
        if (!results.has(kind)) {
          results.set(kind, this.failed(product, kind, 0, error));
        }
      }
      logger.error("product_interrupted", {
        modelCode: product.modelCode,
        session: handle.id,
        errorClass: errorClass(error),
        error: errorMessage(error),
      });
    } finally {
      handle.fetcher.releaseProduct(product);
    }

    const summary = this.summarizeProduct(product, results);
    for (const kind of ASSET_ORDER) {
      const result = results.get(kind);
      if (result) {
        await this.record(result);
      }
    }

    if (summary.complete && !fatalError) {
      await this.writeCompleteMarker(product);
    }
    metrics.incrementCounter("products_processed", 1);
    logger.info("product_complete", {
      modelCode: product.modelCode,
      finalized: summary.finalized,
      skipped: summary.skipped,
      unavailable: summary.unavailable,
      failed: summary.failed,
      complete: summary.complete,
    });
    return { summary, fatalError };
  }

  /**
   * Takes a session that may still be navigating out of the pool. The run goes
   * on with the others and stops once none is left.
   */
  private retireSession(
    handle: SessionHandle,
    control: RunControl,
    error: SessionUnusableError,
    stop: (error: unknown) => void,
  ): void {
    control.liveSessions -= 1;
    this.deps.logger.error("session_retired", {
      session: handle.id,
      liveSessions: control.liveSessions,
      error: error.message,
    });
    if (control.liveSessions === 0) {
      stop(error);
    }
  }

  private async processPending(
    handle: SessionHandle,
    product: Product,
    pending: AssetKind[],
    results: Map<AssetKind, TaskResult>,
  ): Promise<void> {
    const { config } = this.deps;

    let available: Set<AssetKind>;
    try {
      available = await this.listAvailable(handle, product);
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      for (const kind of pending) {
        results.set(kind, this.failed(product, kind, config.maxAttempts, error));
      }
      return;
    }

    const fetchable: AssetKind[] = [];
    for (const kind of pending) {
      if (available.has(kind)) {
        fetchable.push(kind);
        continue;
      }
      results.set(kind, this.unavailable(product, kind));
    }

    const batchKinds = fetchable.filter((kind) => REQUIRED_KINDS.includes(kind));
    const prefetched = new Map<AssetKind, Prefetched>();
    let batchWorkDir: string | undefined;
    if (config.batchRequired && handle.fetcher.supportsBatch && batchKinds.length > 0) {
      batchWorkDir = await this.runBatch(handle, product, batchKinds, prefetched);
    }

    try {
      for (const kind of fetchable) {
        results.set(kind, await this.runTask(handle, product, kind, prefetched.get(kind)));
      }
    } finally {
      if (batchWorkDir) {
        await fs.promises.rm(batchWorkDir, { recursive: true, force: true });
      }
    }
  }

  /**
   * Queues all pending required kinds as one combined retrieval. Whatever it
   * delivers counts as attempt 1 of each kind; kinds it did not deliver carry
   * on with individual fetches.
   */
  private async runBatch(
    handle: SessionHandle,
    product: Product,
    kinds: AssetKind[],
    prefetched: Map<AssetKind, Prefetched>,
  ): Promise<string | undefined> {
    const { logger } = this.deps;
    logger.info("batch_fetch_start", { modelCode: product.modelCode, kinds });

    try {
      const outcome = await this.withSession(handle, () => handle.fetcher.fetchBatch(product, kinds));
      for (const kind of kinds) {
        prefetched.set(kind, outcome.results.get(kind) ?? new FetchError(`${kind} not delivered by combined retrieval`));
      }
      logger.info("batch_fetch_complete", {
        modelCode: product.modelCode,
        delivered: kinds.filter((kind) => !(prefetched.get(kind) instanceof Error)),
      });
      return outcome.workDir;
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      logger.warn("batch_fetch_failed", {
        modelCode: product.modelCode,
        errorClass: errorClass(error),
        error: errorMessage(error),
      });
      for (const kind of kinds) {
        prefetched.set(kind, toError(error));
      }
      return undefined;
    }
  }

  private async runTask(handle: SessionHandle, product: Product, kind: AssetKind, first?: Prefetched): Promise<TaskResult> {
    const { config, validator, packager, ledger, logger, metrics } = this.deps;
    let preloaded = first;
    let lastError: unknown;
    let attempt = 0;

    // An expired session during combined retrieval costs no attempt; the individual fetch logs in again first.
    if (preloaded instanceof SessionExpiredError && !preloaded.fatal) {
      logger.warn("batch_delivery_expired", { modelCode: product.modelCode, kind, error: preloaded.message });
      handle.state.markExpired(preloaded);
      preloaded = undefined;
    }

    while (attempt < config.maxAttempts) {
      attempt += 1;
      if (attempt > 1) {
        metrics.incrementCounter("fetch_retries", 1);
        await this.sleep(this.backoffDelay(attempt));
      }

      let file: FetchedFile | undefined;
      let ownsWorkDir = false;
      logger.info("asset_attempt_start", { modelCode: product.modelCode, kind, attempt });

      try {
        if (preloaded !== undefined) {
          const delivered = preloaded;
          preloaded = undefined;
          if (delivered instanceof Error) {
            throw delivered;
          }
          file = delivered;
        } else {
          const stopTimer = metrics.startTimer("fetch_ms");
          try {
            file = await this.withSession(handle, () => handle.fetcher.fetch(product, kind));
            ownsWorkDir = true;
          } finally {
            stopTimer();
          }
        }

        const validation = await validator.validate(kind, file.path);
        if (!validation.ok) {
          throw new ValidationError(`${kind} for ${product.modelCode} rejected: ${validation.reason}`);
        }

        const stopPackageTimer = metrics.startTimer("package_ms");
        const packaged = await packager.package(file, product.modelCode, kind, validation).finally(() => stopPackageTimer());
        await ledger.markCompleted(product.modelCode, kind, packaged.relativePath, packaged.fingerprint);

        logger.info("asset_finalized", {
          modelCode: product.modelCode,
          kind,
          attempt,
          path: packaged.relativePath,
          bytes: packaged.fingerprint.bytes,
        });
        return {
          modelCode: product.modelCode,
          kind,
          status: "finalized",
          attempts: attempt,
          path: packaged.relativePath,
          fingerprint: packaged.fingerprint,
          finishedAt: new Date().toISOString(),
        };
      } catch (error) {
        if (isFatal(error)) {
          throw error;
        }
        lastError = error;
        logger.warn("asset_attempt_failed", {
          modelCode: product.modelCode,
          kind,
          attempt,
          maxAttempts: config.maxAttempts,
          errorClass: errorClass(error),
          error: errorMessage(error),
        });
      } finally {
        if (file && ownsWorkDir) {
          await fs.promises.rm(file.workDir, { recursive: true, force: true });
        }
      }
    }

    return this.failed(product, kind, attempt, lastError);
  }

  private async listAvailable(handle: SessionHandle, product: Product): Promise<Set<AssetKind>> {
    const { config, logger } = this.deps;
    let lastError: unknown;

    for (let attempt = 1; attempt <= config.maxAttempts; attempt += 1) {
      if (attempt > 1) {
        await this.sleep(this.backoffDelay(attempt));
      }
      try {
        const kinds = await this.withSession(handle, () => handle.fetcher.listAssets(product));
        return new Set(kinds);
      } catch (error) {
        if (isFatal(error)) {
          throw error;
        }
        lastError = error;
        logger.warn("list_assets_failed", {
          modelCode: product.modelCode,
          attempt,
          errorClass: errorClass(error),
          error: errorMessage(error),
        });
      }
    }
    throw lastError;
  }

  /**
   * Runs one remote request on an authenticated session. An expired session is
   * logged in again and the request resubmitted; `markExpired` turns repeated
   * expiry into a fatal error.
   */
  private async withSession<T>(handle: SessionHandle, request: () => Promise<T>): Promise<T> {
    while (true) {
      await handle.state.ensureAuthenticated();
      if (this.deps.config.requestDelayMs > 0) {
        await this.sleep(this.deps.config.requestDelayMs);
      }
      try {
        const value = await request();
        handle.state.markHealthy();
        return value;
      } catch (error) {
        if (error instanceof SessionExpiredError && !error.fatal) {
          handle.state.markExpired(error);
          continue;
        }
        throw error;
      }
    }
  }

  private backoffDelay(attempt: number): number {
    const { baseDelayMs, maxBackoffMs } = this.deps.config;
    return Math.min(baseDelayMs * 2 ** (attempt - 2), maxBackoffMs);
  }

  private unavailable(product: Product, kind: AssetKind): TaskResult {
    const finishedAt = new Date().toISOString();
    if (!describeAsset(kind).optional) {
      return {
        modelCode: product.modelCode,
        kind,
        status: "permanently_failed",
        attempts: 0,
        errorClass: "Unavailable",
        error: "not_listed",
        finishedAt,
      };
    }
    return { modelCode: product.modelCode, kind, status: "unavailable", attempts: 0, finishedAt };
  }

  private failed(product: Product, kind: AssetKind, attempts: number, error: unknown): TaskResult {
    return {
      modelCode: product.modelCode,
      kind,
      status: "permanently_failed",
      attempts,
      errorClass: errorClass(error),
      error: errorMessage(error),
      finishedAt: new Date().toISOString(),
    };
  }

  private summarizeProduct(product: Product, results: Map<AssetKind, TaskResult>): ProductSummary {
    const summary: ProductSummary = {
      modelCode: product.modelCode,
      order: product.order,
      finalized: 0,
      skipped: 0,
      unavailable: 0,
      failed: 0,
      complete: false,
      failures: [],
    };

    for (const kind of ASSET_ORDER) {
      const result = results.get(kind);
      if (!result) {
        continue;
      }
      switch (result.status) {
        case "finalized":
          summary.finalized += 1;
          break;
        case "skipped":
          summary.skipped += 1;
          break;
        case "unavailable":
          summary.unavailable += 1;
          break;
        case "permanently_failed": {
          summary.failed += 1;
          const failure: ProductFailure = {
            kind,
            attempts: result.attempts,
            errorClass: result.errorClass,
            reason: result.error ?? "unknown failure",
          };
          summary.failures.push(failure);
          break;
        }
      }
    }

    summary.complete = REQUIRED_KINDS.every((kind) => {
      const status = results.get(kind)?.status;
      return status === "finalized" || status === "skipped";
    });
    return summary;
  }

  private async record(result: TaskResult): Promise<void> {
    const { logger, metrics, store, runId } = this.deps;
    switch (result.status) {
      case "finalized":
        metrics.incrementCounter("assets_finalized", 1);
        break;
      case "skipped":
        metrics.incrementCounter("assets_skipped", 1);
        logger.debug("asset_skipped", { modelCode: result.modelCode, kind: result.kind, path: result.path });
        break;
      case "unavailable":
        metrics.incrementCounter("assets_unavailable", 1);
        logger.info("asset_unavailable", { modelCode: result.modelCode, kind: result.kind });
        break;
      case "permanently_failed":
        metrics.incrementCounter("assets_failed", 1);
        logger.warn("asset_failed_permanent", {
          modelCode: result.modelCode,
          kind: result.kind,
          attempts: result.attempts,
          errorClass: result.errorClass,
          error: result.error,
        });
        break;
    }
    await store?.recordTask(runId, result);
  }

  private async writeCompleteMarker(product: Product): Promise<void> {
    const markerPath = path.join(path.resolve(this.deps.config.outputRoot), product.modelCode, COMPLETE_MARKER);
    try {
      await fs.promises.mkdir(path.dirname(markerPath), { recursive: true });
      await fs.promises.writeFile(markerPath, "ok", { encoding: "utf-8", flag: "wx" });
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "EEXIST") {
        return;
      }
      this.deps.logger.warn("complete_marker_failed", { modelCode: product.modelCode, error: errorMessage(error) });
    }
  }
}
