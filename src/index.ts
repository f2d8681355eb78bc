#!/usr/bin/env node
import { runCli } from "./cli";

export * from "./audit";
export * from "./catalog";
export * from "./config";
export * from "./core/errors";
export * from "./crawl";
export * from "./download";
export * from "./ledger";
export * from "./observability";
export * from "./packaging";
export * from "./session";
export * from "./store";
export * from "./types";
export * from "./validate";

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

if (require.main === module) {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`fatal: ${message}`);
    process.exitCode = 1;
  });
}
