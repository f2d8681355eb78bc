import fs from "node:fs";
import path from "node:path";
import { type AssetKind, isAssetKind } from "../catalog";
import type { Logger } from "../observability";
import { sha256File } from "../packaging";
import type { AssetFingerprint } from "../types";

export interface LedgerEntry {
  modelCode: string;
  kind: AssetKind;
  /** Output-root relative path of the finalized file. */
  path: string;
  bytes: number;
  sha256: string;
  check: string;
  finalizedAt: string;
  runId?: string;
}

interface RemovalRecord {
  modelCode: string;
  kind: AssetKind;
  removed: true;
  at: string;
}

type LedgerRecord = LedgerEntry | RemovalRecord;

export interface ResumeLedgerOptions {
  ledgerPath: string;
  outputRoot: string;
  runId?: string;
  logger?: Logger;
  /** Re-hash trusted files instead of comparing sizes only. */
  verifyHashes?: boolean;
}

function keyOf(modelCode: string, kind: AssetKind): string {
  return `${modelCode}\u0000${kind}`;
}

function parseRecord(value: unknown): LedgerRecord | undefined {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  if (!("modelCode" in value) || !("kind" in value)) {
    return undefined;
  }
  const { modelCode, kind } = value;
  if (typeof modelCode !== "string" || typeof kind !== "string" || !isAssetKind(kind)) {
    return undefined;
  }

  if ("removed" in value && value.removed === true) {
    const at = "at" in value && typeof value.at === "string" ? value.at : "";
    return { modelCode, kind, removed: true, at };
  }

  if (!("path" in value) || !("bytes" in value) || !("sha256" in value) || !("check" in value)) {
    return undefined;
  }
  const { path: relativePath, bytes, sha256, check } = value;
  if (typeof relativePath !== "string" || typeof bytes !== "number" || typeof sha256 !== "string" || typeof check !== "string") {
    return undefined;
  }
  const finalizedAt = "finalizedAt" in value && typeof value.finalizedAt === "string" ? value.finalizedAt : "";
  const runId = "runId" in value && typeof value.runId === "string" ? value.runId : undefined;
  return { modelCode, kind, path: relativePath, bytes, sha256, check, finalizedAt, runId };
}

function sameFingerprint(entry: LedgerEntry, relativePath: string, fingerprint: AssetFingerprint): boolean {
  return (
    entry.path === relativePath &&
    entry.bytes === fingerprint.bytes &&
    entry.sha256 === fingerprint.sha256 &&
    entry.check === fingerprint.check
  );
}

/**
 * Durable record of finalized (model, kind) pairs, kept as JSON Lines so it can
 * be read and diffed by hand. Every commit is appended immediately; later lines
 * win over earlier ones.
 */
export class ResumeLedger {
  private readonly ledgerPath: string;
  private readonly outputRoot: string;
  private readonly runId?: string;
  private readonly logger?: Logger;
  private readonly verifyHashes: boolean;
  private readonly records = new Map<string, LedgerEntry>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: ResumeLedgerOptions) {
    this.ledgerPath = path.resolve(options.ledgerPath);
    this.outputRoot = path.resolve(options.outputRoot);
    this.runId = options.runId;
    this.logger = options.logger;
    this.verifyHashes = options.verifyHashes ?? false;
  }

  get filePath(): string {
    return this.ledgerPath;
  }

  async load(): Promise<number> {
    this.records.clear();
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.ledgerPath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return 0;
      }
      throw error;
    }

    const lines = raw.split("\n");
    for (const [index, line] of lines.entries()) {
      if (line.trim().length === 0) {
        continue;
      }

      let record: LedgerRecord | undefined;
      try {
        record = parseRecord(JSON.parse(line));
      } catch {
        record = undefined;
      }

      if (!record) {
        this.logger?.warn("ledger_line_malformed", { line: index + 1, ledgerPath: this.ledgerPath });
        continue;
      }

      const key = keyOf(record.modelCode, record.kind);
      if ("removed" in record) {
        this.records.delete(key);
      } else {
        this.records.set(key, record);
      }
    }

    this.logger?.info("ledger_loaded", { ledgerPath: this.ledgerPath, entries: this.records.size });
    return this.records.size;
  }

  get(modelCode: string, kind: AssetKind): LedgerEntry | undefined {
    return this.records.get(keyOf(modelCode, kind));
  }

  entries(): LedgerEntry[] {
    return [...this.records.values()];
  }

  /**
   * True when the pair was finalized before and the file on disk still matches
   * its fingerprint, so it can be trusted without fetching or validating again.
   */
  async hasCompleted(modelCode: string, kind: AssetKind): Promise<boolean> {
    const entry = this.get(modelCode, kind);
    if (!entry) {
      return false;
    }

    const absolutePath = path.join(this.outputRoot, ...entry.path.split("/"));
    try {
      const stat = await fs.promises.stat(absolutePath);
      if (!stat.isFile() || stat.size !== entry.bytes) {
        return false;
      }
    } catch {
      return false;
    }

    if (this.verifyHashes) {
      return (await sha256File(absolutePath)) === entry.sha256;
    }
    return true;
  }

  async markCompleted(modelCode: string, kind: AssetKind, relativePath: string, fingerprint: AssetFingerprint): Promise<void> {
    await this.enqueue(async () => {
      const current = this.get(modelCode, kind);
      if (current && sameFingerprint(current, relativePath, fingerprint)) {
        return;
      }

      const entry: LedgerEntry = {
        modelCode,
        kind,
        path: relativePath,
        bytes: fingerprint.bytes,
        sha256: fingerprint.sha256,
        check: fingerprint.check,
        finalizedAt: new Date().toISOString(),
        runId: this.runId,
      };
      await this.append(entry);
      this.records.set(keyOf(modelCode, kind), entry);
    });
  }

  async forget(modelCode: string, kind: AssetKind): Promise<void> {
    await this.enqueue(async () => {
      if (!this.get(modelCode, kind)) {
        return;
      }
      const record: RemovalRecord = { modelCode, kind, removed: true, at: new Date().toISOString() };
      await this.append(record);
      this.records.delete(keyOf(modelCode, kind));
    });
  }

  /** Resolves once every commit issued so far is on disk. */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  // Single writer: commits from parallel sessions are applied one after another.
  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task);
    // The failure is reported to the caller through `next`; the chain itself keeps going.
    this.writeChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async append(record: LedgerRecord): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.ledgerPath), { recursive: true });
    await fs.promises.appendFile(this.ledgerPath, `${JSON.stringify(record)}\n`, "utf-8");
  }
}
