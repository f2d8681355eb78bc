import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import type { AppConfig, RunConfig } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  outputRoot: "output",
  ledgerPath: "data/ledger.jsonl",
  storePath: "data/state.sqlite",
  downloadDir: "data/downloads",
  overwrite: false,
  maxProducts: 0,
  operationTimeoutMs: 300_000,
  abortGraceMs: 5_000,
  maxAttempts: 3,
  baseDelayMs: 1_000,
  requestDelayMs: 400,
  maxBackoffMs: 10_000,
  cadGenerationTimeoutMs: 120_000,
  cadPollIntervalMs: 2_000,
  cadFormatProfile: "STEP AP214",
  maxReauthentications: 1,
  batchRequired: true,
  sessionCount: 1,
  sessionModule: undefined,
  username: undefined,
  password: undefined,
  userAgent: "collateral-archiver/1.0",
  ignoreHttpsErrors: false,
  verifyHashes: false,
  logLevel: "info",
};

function readConfigFile(base: AppConfig, configPath?: string): AppConfig {
  if (!configPath) {
    return base;
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must hold a JSON object: ${absolutePath}`);
  }
  return applyFileConfig(base, parsed);
}

// Takes only known keys with the expected primitive type; anything else is ignored.
function applyFileConfig(base: AppConfig, source: object): AppConfig {
  const entries = new Map<string, unknown>(Object.entries(source));
  const str = (key: string): string | undefined => {
    const value = entries.get(key);
    return typeof value === "string" ? value : undefined;
  };
  const num = (key: string): number | undefined => {
    const value = entries.get(key);
    return typeof value === "number" && Number.isFinite(value) ? value : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const value = entries.get(key);
    return typeof value === "boolean" ? value : undefined;
  };

  return {
    outputRoot: str("outputRoot") ?? base.outputRoot,
    ledgerPath: str("ledgerPath") ?? base.ledgerPath,
    storePath: str("storePath") ?? base.storePath,
    downloadDir: str("downloadDir") ?? base.downloadDir,
    overwrite: bool("overwrite") ?? base.overwrite,
    maxProducts: num("maxProducts") ?? base.maxProducts,
    operationTimeoutMs: num("operationTimeoutMs") ?? base.operationTimeoutMs,
    abortGraceMs: num("abortGraceMs") ?? base.abortGraceMs,
    maxAttempts: num("maxAttempts") ?? base.maxAttempts,
    baseDelayMs: num("baseDelayMs") ?? base.baseDelayMs,
    requestDelayMs: num("requestDelayMs") ?? base.requestDelayMs,
    maxBackoffMs: num("maxBackoffMs") ?? base.maxBackoffMs,
    cadGenerationTimeoutMs: num("cadGenerationTimeoutMs") ?? base.cadGenerationTimeoutMs,
    cadPollIntervalMs: num("cadPollIntervalMs") ?? base.cadPollIntervalMs,
    cadFormatProfile: str("cadFormatProfile") ?? base.cadFormatProfile,
    maxReauthentications: num("maxReauthentications") ?? base.maxReauthentications,
    batchRequired: bool("batchRequired") ?? base.batchRequired,
    sessionCount: num("sessionCount") ?? base.sessionCount,
    sessionModule: str("sessionModule") ?? base.sessionModule,
    username: str("username") ?? base.username,
    password: str("password") ?? base.password,
    userAgent: str("userAgent") ?? base.userAgent,
    ignoreHttpsErrors: bool("ignoreHttpsErrors") ?? base.ignoreHttpsErrors,
    verifyHashes: bool("verifyHashes") ?? base.verifyHashes,
    logLevel: toLogLevel(str("logLevel")) ?? base.logLevel,
  };
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined): AppConfig["logLevel"] | undefined {
  return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : undefined;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = readConfigFile(DEFAULT_CONFIG, configPath);

  return {
    ...merged,
    outputRoot: env.OUTPUT_ROOT ?? merged.outputRoot,
    ledgerPath: env.LEDGER_PATH ?? merged.ledgerPath,
    storePath: env.STORE_PATH ?? merged.storePath,
    downloadDir: env.DOWNLOAD_DIR ?? merged.downloadDir,
    overwrite: toBool(env.OVERWRITE, merged.overwrite),
    maxProducts: toInt(env.MAX_PRODUCTS, merged.maxProducts),
    operationTimeoutMs: toInt(env.OPERATION_TIMEOUT_MS, merged.operationTimeoutMs),
    abortGraceMs: toInt(env.ABORT_GRACE_MS, merged.abortGraceMs),
    maxAttempts: Math.max(1, toInt(env.MAX_ATTEMPTS, merged.maxAttempts)),
    baseDelayMs: toInt(env.BASE_DELAY_MS, merged.baseDelayMs),
    requestDelayMs: toInt(env.REQUEST_DELAY_MS, merged.requestDelayMs),
    maxBackoffMs: toInt(env.MAX_BACKOFF_MS, merged.maxBackoffMs),
    cadGenerationTimeoutMs: toInt(env.CAD_GENERATION_TIMEOUT_MS, merged.cadGenerationTimeoutMs),
    cadPollIntervalMs: toInt(env.CAD_POLL_INTERVAL_MS, merged.cadPollIntervalMs),
    cadFormatProfile: env.CAD_FORMAT_PROFILE ?? merged.cadFormatProfile,
    maxReauthentications: toInt(env.MAX_REAUTHENTICATIONS, merged.maxReauthentications),
    batchRequired: toBool(env.BATCH_REQUIRED, merged.batchRequired),
    sessionCount: Math.max(1, toInt(env.SESSION_COUNT, merged.sessionCount)),
    sessionModule: env.SESSION_MODULE ?? merged.sessionModule,
    username: env.CATALOG_USERNAME ?? merged.username,
    password: env.CATALOG_PASSWORD ?? merged.password,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    verifyHashes: toBool(env.VERIFY_HASHES, merged.verifyHashes),
    logLevel: toLogLevel(env.LOG_LEVEL) ?? merged.logLevel,
  };
}

export function toRunConfig(config: AppConfig, overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    outputRoot: config.outputRoot,
    downloadDir: config.downloadDir,
    overwrite: config.overwrite,
    maxProducts: config.maxProducts > 0 ? config.maxProducts : undefined,
    operationTimeoutMs: config.operationTimeoutMs,
    abortGraceMs: config.abortGraceMs,
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.baseDelayMs,
    requestDelayMs: config.requestDelayMs,
    maxBackoffMs: config.maxBackoffMs,
    cadGenerationTimeoutMs: config.cadGenerationTimeoutMs,
    cadPollIntervalMs: config.cadPollIntervalMs,
    cadFormatProfile: config.cadFormatProfile,
    maxReauthentications: config.maxReauthentications,
    batchRequired: config.batchRequired,
    ...overrides,
  };
}

export { DEFAULT_CONFIG };
