import type { RunSummary, RunTotals, TaskResult } from "../types";

export type RunStatus = "running" | "completed" | "aborted";

export interface RunRecord {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
  totals?: RunTotals;
}

export interface FailingAsset {
  modelCode: string;
  kind: string;
  attempts: number;
  error?: string;
  finishedAt: string;
}

export interface StoreStats {
  totalRuns: number;
  lastRun?: RunRecord;
  /** Task outcomes of the most recent run, by status. */
  lastRunTasks: Record<TaskResult["status"], number>;
  /** Pairs whose latest recorded outcome is a permanent failure. */
  failing: FailingAsset[];
}

/** Run history and per-task outcomes; the ledger stays the source of truth for "done". */
export interface RunStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  recordTask(runId: string, result: TaskResult): Promise<void>;
  finishRun(summary: RunSummary): Promise<void>;
  getStats(failingLimit?: number): Promise<StoreStats>;
  close(): Promise<void>;
}

export function emptyTaskCounts(): Record<TaskResult["status"], number> {
  return { finalized: 0, skipped: 0, unavailable: 0, permanently_failed: 0 };
}
