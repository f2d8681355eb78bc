import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InMemoryRunStore, type RunStore, SqliteRunStore } from "../src/store";
import type { RunSummary, TaskResult } from "../src/types";
import { makeTempDir } from "./helpers/fakeSession";

const finishedAt = "2026-03-02T10:00:00.000Z";

function task(modelCode: string, kind: TaskResult["kind"], status: TaskResult["status"], attempts = 1): TaskResult {
  return {
    modelCode,
    kind,
    status,
    attempts,
    error: status === "permanently_failed" ? "HTTP 503" : undefined,
    finishedAt,
  };
}

function summary(runId: string, status: RunSummary["status"]): RunSummary {
  return {
    runId,
    status,
    startedAt: "2026-03-02T09:00:00.000Z",
    finishedAt,
    products: [],
    totals: { products: 2, finalized: 3, skipped: 1, unavailable: 0, failed: 1 },
  };
}

const tempDirs: string[] = [];

const factories: Array<[string, () => Promise<RunStore>]> = [
  ["InMemoryRunStore", async () => new InMemoryRunStore()],
  [
    "SqliteRunStore",
    async () => {
      const dir = await makeTempDir();
      tempDirs.push(dir);
      return new SqliteRunStore(path.join(dir, "nested", "state.sqlite"));
    },
  ],
];

describe.each(factories)("%s", (_name, createStore) => {
  afterEach(async () => {
    for (const dir of tempDirs.splice(0)) {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  it("reports an empty history", async () => {
    const store = await createStore();
    expect(await store.getStats()).toEqual({
      totalRuns: 0,
      lastRun: undefined,
      lastRunTasks: { finalized: 0, skipped: 0, unavailable: 0, permanently_failed: 0 },
      failing: [],
    });
    await store.close();
  });

  it("summarizes the latest run and the pairs still failing", async () => {
    const store = await createStore();

    await store.startRun("run-1", "2026-03-01T09:00:00.000Z");
    await store.recordTask("run-1", task("A-1", "DXF", "permanently_failed", 3));
    await store.recordTask("run-1", task("B-2", "STEP", "permanently_failed", 3));
    await store.finishRun({ ...summary("run-1", "completed"), startedAt: "2026-03-01T09:00:00.000Z" });

    await store.startRun("run-2", "2026-03-02T09:00:00.000Z");
    await store.recordTask("run-2", task("A-1", "DXF", "finalized", 2));
    await store.recordTask("run-2", task("A-1", "Catalog", "skipped", 0));
    await store.recordTask("run-2", task("B-2", "Manual", "unavailable", 0));
    await store.finishRun(summary("run-2", "aborted"));

    const stats = await store.getStats();
    expect(stats.totalRuns).toBe(2);
    expect(stats.lastRun).toEqual({
      runId: "run-2",
      status: "aborted",
      startedAt: "2026-03-02T09:00:00.000Z",
      finishedAt,
      totals: { products: 2, finalized: 3, skipped: 1, unavailable: 0, failed: 1 },
    });
    expect(stats.lastRunTasks).toEqual({ finalized: 1, skipped: 1, unavailable: 1, permanently_failed: 0 });
    expect(stats.failing).toEqual([{ modelCode: "B-2", kind: "STEP", attempts: 3, error: "HTTP 503", finishedAt }]);
    await store.close();
  });
});
