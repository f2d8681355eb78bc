import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { RunSummary, TaskResult } from "../types";
import { emptyTaskCounts, type FailingAsset, type RunRecord, type RunStatus, type RunStore, type StoreStats } from "./types";

type RunRow = {
  runId: string;
  status: string;
  startedAt: string;
  finishedAt: string | null;
  finalized: number | null;
  skipped: number | null;
  unavailable: number | null;
  failed: number | null;
  products: number | null;
};

type StatusCountRow = {
  status: string;
  count: number;
};

type FailingRow = {
  modelCode: string;
  kind: string;
  attempts: number;
  error: string | null;
  finishedAt: string;
};

function toRunStatus(value: string): RunStatus {
  return value === "completed" || value === "aborted" ? value : "running";
}

export class SqliteRunStore implements RunStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.db = new Database(absolutePath);
    this.db.pragma("journal_mode = WAL");
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, startedAt });
  }

  async recordTask(runId: string, result: TaskResult): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO task_results (
          runId, modelCode, kind, status, attempts, path, bytes, sha256, errorClass, error, finishedAt
        )
        VALUES (
          @runId, @modelCode, @kind, @status, @attempts, @path, @bytes, @sha256, @errorClass, @error, @finishedAt
        )
      `,
      )
      .run({
        runId,
        modelCode: result.modelCode,
        kind: result.kind,
        status: result.status,
        attempts: result.attempts,
        path: result.path ?? null,
        bytes: result.fingerprint?.bytes ?? null,
        sha256: result.fingerprint?.sha256 ?? null,
        errorClass: result.errorClass ?? null,
        error: result.error ?? null,
        finishedAt: result.finishedAt,
      });
  }

  async finishRun(summary: RunSummary): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          products = @products,
          finalized = @finalized,
          skipped = @skipped,
          unavailable = @unavailable,
          failed = @failed
        WHERE runId = @runId
      `,
      )
      .run({
        runId: summary.runId,
        status: summary.status,
        finishedAt: summary.finishedAt,
        products: summary.totals.products,
        finalized: summary.totals.finalized,
        skipped: summary.totals.skipped,
        unavailable: summary.totals.unavailable,
        failed: summary.totals.failed,
      });
  }

  async getStats(failingLimit = 50): Promise<StoreStats> {
    const totalRuns = (this.db.prepare("SELECT COUNT(*) AS count FROM runs").get() as { count: number }).count;
    const lastRunRow = this.db
      .prepare("SELECT * FROM runs ORDER BY startedAt DESC, rowid DESC LIMIT 1")
      .get() as RunRow | undefined;

    const lastRunTasks = emptyTaskCounts();
    let lastRun: RunRecord | undefined;
    if (lastRunRow) {
      lastRun = {
        runId: lastRunRow.runId,
        status: toRunStatus(lastRunRow.status),
        startedAt: lastRunRow.startedAt,
        finishedAt: lastRunRow.finishedAt ?? undefined,
        totals:
          lastRunRow.finishedAt === null
            ? undefined
            : {
                products: lastRunRow.products ?? 0,
                finalized: lastRunRow.finalized ?? 0,
                skipped: lastRunRow.skipped ?? 0,
                unavailable: lastRunRow.unavailable ?? 0,
                failed: lastRunRow.failed ?? 0,
              },
      };

      const counts = this.db
        .prepare("SELECT status, COUNT(*) AS count FROM task_results WHERE runId = ? GROUP BY status")
        .all(lastRunRow.runId) as StatusCountRow[];
      for (const row of counts) {
        if (row.status === "finalized" || row.status === "skipped" || row.status === "unavailable" || row.status === "permanently_failed") {
          lastRunTasks[row.status] = row.count;
        }
      }
    }

    const failingRows = this.db
      .prepare(
        `
        SELECT t.modelCode, t.kind, t.attempts, t.error, t.finishedAt
        FROM task_results t
        JOIN (
          SELECT modelCode, kind, MAX(id) AS latestId
          FROM task_results
          GROUP BY modelCode, kind
        ) latest ON latest.latestId = t.id
        WHERE t.status = 'permanently_failed'
        ORDER BY t.modelCode ASC, t.kind ASC
        LIMIT ?
      `,
      )
      .all(failingLimit) as FailingRow[];

    const failing: FailingAsset[] = failingRows.map((row) => ({
      modelCode: row.modelCode,
      kind: row.kind,
      attempts: row.attempts,
      error: row.error ?? undefined,
      finishedAt: row.finishedAt,
    }));

    return { totalRuns, lastRun, lastRunTasks, failing };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS task_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        runId TEXT NOT NULL,
        modelCode TEXT NOT NULL,
        kind TEXT NOT NULL,
        status TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        path TEXT NULL,
        bytes INTEGER NULL,
        sha256 TEXT NULL,
        errorClass TEXT NULL,
        error TEXT NULL,
        finishedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_task_results_run ON task_results(runId);
      CREATE INDEX IF NOT EXISTS idx_task_results_pair ON task_results(modelCode, kind);
    `);

    this.ensureColumn("runs", "products", "INTEGER NULL");
    this.ensureColumn("runs", "finalized", "INTEGER NULL");
    this.ensureColumn("runs", "skipped", "INTEGER NULL");
    this.ensureColumn("runs", "unavailable", "INTEGER NULL");
    this.ensureColumn("runs", "failed", "INTEGER NULL");
  }

  private ensureColumn(tableName: string, columnName: string, definition: string): void {
    const columns = this.db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
    if (columns.some((column) => column.name === columnName)) {
      return;
    }

    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
