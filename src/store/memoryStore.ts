import type { RunSummary, TaskResult } from "../types";
import { emptyTaskCounts, type FailingAsset, type RunRecord, type RunStore, type StoreStats } from "./types";

export class InMemoryRunStore implements RunStore {
  private readonly runs: RunRecord[] = [];
  private readonly tasks: Array<{ runId: string; result: TaskResult }> = [];

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.push({ runId, status: "running", startedAt });
  }

  async recordTask(runId: string, result: TaskResult): Promise<void> {
    this.tasks.push({ runId, result });
  }

  async finishRun(summary: RunSummary): Promise<void> {
    const run = this.runs.find((item) => item.runId === summary.runId);
    if (!run) {
      return;
    }
    run.status = summary.status;
    run.finishedAt = summary.finishedAt;
    run.totals = { ...summary.totals };
  }

  async getStats(failingLimit = 50): Promise<StoreStats> {
    const lastRun = this.runs[this.runs.length - 1];
    const lastRunTasks = emptyTaskCounts();
    const latest = new Map<string, TaskResult>();

    for (const { runId, result } of this.tasks) {
      if (lastRun && runId === lastRun.runId) {
        lastRunTasks[result.status] += 1;
      }
      latest.set(`${result.modelCode}\u0000${result.kind}`, result);
    }

    const failing: FailingAsset[] = [...latest.values()]
      .filter((result) => result.status === "permanently_failed")
      .sort((a, b) => a.modelCode.localeCompare(b.modelCode) || a.kind.localeCompare(b.kind))
      .slice(0, failingLimit)
      .map((result) => ({
        modelCode: result.modelCode,
        kind: result.kind,
        attempts: result.attempts,
        error: result.error,
        finishedAt: result.finishedAt,
      }));

    return {
      totalRuns: this.runs.length,
      lastRun: lastRun ? { ...lastRun } : undefined,
      lastRunTasks,
      failing,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
