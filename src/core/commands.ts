import { type AuditReport, OutputAuditor } from "../audit";
import { REQUIRED_KINDS } from "../catalog";
import { type AppConfig, toRunConfig } from "../config";
import { createSessionHandle, DownloadOrchestrator, type SessionHandle } from "../download";
import {
  FileProductSource,
  filterProducts,
  type ProductSource,
  readProductKeys,
  SeriesProductSource,
} from "../crawl";
import { ResumeLedger } from "../ledger";
import type { Logger, MetricsRegistry } from "../observability";
import { Packager } from "../packaging";
import {
  isCatalogBrowser,
  loadSessionModule,
  type SessionCapability,
  type SessionFactory,
  SessionState,
} from "../session";
import type { RunStore, StoreStats } from "../store";
import type { Credentials, RunSummary } from "../types";
import { ArtifactValidator } from "../validate";
import { ConfigError, errorMessage } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface ArchiveOptions {
  productFile?: string;
  seriesUrls?: string[];
  series?: string;
  /** Model codes or product URLs to keep, read from a file. */
  onlyFile?: string;
  /** Used instead of loading `config.sessionModule`. */
  createSession?: SessionFactory;
}

export interface StatusReport {
  ledgerPath: string;
  ledgerEntries: number;
  products: number;
  /** Products with every required kind in the ledger. */
  completeProducts: number;
  store: StoreStats;
}

export interface VerifyOptions {
  fix: boolean;
  includeIncomplete: boolean;
}

function requireCredentials(config: AppConfig): Credentials {
  if (!config.username || !config.password) {
    throw new ConfigError("catalog credentials missing: set CATALOG_USERNAME and CATALOG_PASSWORD or the config file");
  }
  return { username: config.username, password: config.password };
}

async function resolveSessionFactory(ctx: CommandContext, options: ArchiveOptions): Promise<SessionFactory> {
  if (options.createSession) {
    return options.createSession;
  }
  if (!ctx.config.sessionModule) {
    throw new ConfigError("no session module configured: pass --session <path> or set SESSION_MODULE");
  }
  ctx.logger.info("session_module_load", { sessionModule: ctx.config.sessionModule });
  return loadSessionModule(ctx.config.sessionModule);
}

async function closeSessions(ctx: CommandContext, sessions: SessionCapability[]): Promise<void> {
  for (const session of sessions) {
    if (!session.close) {
      continue;
    }
    try {
      await session.close();
    } catch (error) {
      ctx.logger.warn("session_close_failed", { error: errorMessage(error) });
    }
  }
}

async function createProductSource(
  ctx: CommandContext,
  options: ArchiveOptions,
  browsing: { session: SessionCapability; state: SessionState } | undefined,
): Promise<ProductSource> {
  let source: ProductSource;
  if (options.productFile) {
    source = new FileProductSource(options.productFile);
  } else if (browsing && isCatalogBrowser(browsing.session)) {
    source = new SeriesProductSource(browsing.session, {
      seriesUrls: options.seriesUrls,
      onlySeries: options.series,
      prepare: () => browsing.state.ensureAuthenticated(),
      logger: ctx.logger.child("series"),
    });
  } else {
    throw new ConfigError("no product source: pass --product-file, or use a session module that can list series");
  }

  if (options.onlyFile) {
    source = filterProducts(source, await readProductKeys(options.onlyFile));
  }
  return source;
}

/** Downloads, validates and packages every product of the chosen source. */
export async function runArchive(ctx: CommandContext, options: ArchiveOptions = {}): Promise<RunSummary> {
  const { config } = ctx;
  const credentials = requireCredentials(config);
  const createSession = await resolveSessionFactory(ctx, options);
  const runConfig = toRunConfig(config);
  const sessionCount = Math.max(1, config.sessionCount);

  const sessions: SessionCapability[] = [];
  try {
    const handles: SessionHandle[] = [];
    for (let index = 0; index < sessionCount; index += 1) {
      const session = await createSession({ config, logger: ctx.logger.child(`driver_${index}`), index });
      sessions.push(session);
      handles.push(
        createSessionHandle(index, session, { config: runConfig, credentials, logger: ctx.logger, metrics: ctx.metrics }),
      );
    }

    // With one session the series listing runs between products; parallel sessions get a browsing session of their own.
    let browsing: { session: SessionCapability; state: SessionState } | undefined;
    if (!options.productFile) {
      if (handles.length === 1) {
        browsing = handles[0];
      } else {
        const session = await createSession({ config, logger: ctx.logger.child("driver_browse"), index: sessionCount });
        sessions.push(session);
        browsing = {
          session,
          state: new SessionState({
            session,
            credentials,
            logger: ctx.logger.child("session_browse"),
            metrics: ctx.metrics,
            maxReauthentications: config.maxReauthentications,
          }),
        };
      }
    }

    const source = await createProductSource(ctx, options, browsing);
    const ledger = new ResumeLedger({
      ledgerPath: config.ledgerPath,
      outputRoot: config.outputRoot,
      runId: ctx.runId,
      logger: ctx.logger.child("ledger"),
      verifyHashes: config.verifyHashes,
    });
    await ledger.load();

    const validator = new ArtifactValidator();
    const orchestrator = new DownloadOrchestrator({
      runId: ctx.runId,
      config: runConfig,
      ledger,
      packager: new Packager({ outputRoot: config.outputRoot, validator }),
      validator,
      sessions: handles,
      logger: ctx.logger,
      metrics: ctx.metrics,
      store: ctx.store,
    });
    return await orchestrator.run(source);
  } finally {
    await closeSessions(ctx, sessions);
  }
}

export async function runStatus(ctx: CommandContext): Promise<StatusReport> {
  ctx.logger.info("status_start");
  const ledger = new ResumeLedger({ ledgerPath: ctx.config.ledgerPath, outputRoot: ctx.config.outputRoot });
  await ledger.load();

  const kindsByProduct = new Map<string, Set<string>>();
  for (const entry of ledger.entries()) {
    const kinds = kindsByProduct.get(entry.modelCode) ?? new Set<string>();
    kinds.add(entry.kind);
    kindsByProduct.set(entry.modelCode, kinds);
  }

  let completeProducts = 0;
  for (const kinds of kindsByProduct.values()) {
    if (REQUIRED_KINDS.every((kind) => kinds.has(kind))) {
      completeProducts += 1;
    }
  }

  const report: StatusReport = {
    ledgerPath: ledger.filePath,
    ledgerEntries: ledger.entries().length,
    products: kindsByProduct.size,
    completeProducts,
    store: await ctx.store.getStats(),
  };
  ctx.logger.info("status_complete", { ...report });
  return report;
}

export async function runVerify(ctx: CommandContext, options: VerifyOptions): Promise<AuditReport> {
  ctx.logger.info("verify_start", { outputRoot: ctx.config.outputRoot, ...options });
  const ledger = new ResumeLedger({
    ledgerPath: ctx.config.ledgerPath,
    outputRoot: ctx.config.outputRoot,
    runId: ctx.runId,
    logger: ctx.logger.child("ledger"),
  });
  await ledger.load();

  const auditor = new OutputAuditor({
    outputRoot: ctx.config.outputRoot,
    includeIncomplete: options.includeIncomplete,
    fix: options.fix,
    ledger,
    logger: ctx.logger,
  });
  const report = await auditor.audit();
  await ledger.flush();
  return report;
}
