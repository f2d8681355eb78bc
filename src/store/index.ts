import type { AppConfig } from "../config";
import { InMemoryRunStore } from "./memoryStore";
import { SqliteRunStore } from "./sqliteStore";
import type { RunStore } from "./types";

export function createStore(config: AppConfig): RunStore {
  if (config.storePath === ":memory:") {
    return new InMemoryRunStore();
  }
  return new SqliteRunStore(config.storePath);
}

export { InMemoryRunStore } from "./memoryStore";
export { SqliteRunStore } from "./sqliteStore";
export * from "./types";
