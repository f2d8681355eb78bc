export interface AppConfig {
  outputRoot: string;
  ledgerPath: string;
  storePath: string;
  downloadDir: string;
  overwrite: boolean;
  /** 0 means no cap. */
  maxProducts: number;
  operationTimeoutMs: number;
  /** How long a timed-out driver call may take to stop after its abort signal. */
  abortGraceMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  requestDelayMs: number;
  maxBackoffMs: number;
  cadGenerationTimeoutMs: number;
  cadPollIntervalMs: number;
  cadFormatProfile: string;
  maxReauthentications: number;
  batchRequired: boolean;
  sessionCount: number;
  sessionModule?: string;
  username?: string;
  password?: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  verifyHashes: boolean;
  logLevel: "debug" | "info" | "warn" | "error";
}

/** What the orchestrator consumes; derived from `AppConfig`, never read from the environment. */
export interface RunConfig {
  outputRoot: string;
  downloadDir: string;
  overwrite: boolean;
  maxProducts?: number;
  operationTimeoutMs: number;
  /** How long a timed-out driver call may take to stop after its abort signal. */
  abortGraceMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  requestDelayMs: number;
  maxBackoffMs: number;
  cadGenerationTimeoutMs: number;
  cadPollIntervalMs: number;
  cadFormatProfile: string;
  maxReauthentications: number;
  batchRequired: boolean;
}
