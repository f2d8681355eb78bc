import { type AppConfig, loadConfig } from "../config";
import { type CommandContext, runArchive, runStatus, runVerify } from "../core/commands";
import { errorClass, errorMessage } from "../core/errors";
import { createRunId, Logger, type LogWriter, MetricsRegistry } from "../observability";
import type { SessionFactory } from "../session";
import { createStore } from "../store";

export type CommandName = "run" | "status" | "verify";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  sessionModule?: string;
  productFile?: string;
  seriesUrls: string[];
  series?: string;
  onlyFile?: string;
  maxProducts?: number;
  sessions?: number;
  overwrite: boolean;
  ignoreHttpsErrors: boolean;
  includeIncomplete: boolean;
  fix: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createSession?: SessionFactory;
  writer?: LogWriter;
}

/** Bad arguments; reported with the help text and exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const HELP_TEXT = `
Usage:
  archiver <command> [options]

Commands:
  run      Download, validate and package collateral for every product
  status   Show ledger and run history
  verify   Audit the output folders
  help     Show this help

Options:
  --config <path>         Optional path to JSON config file
  --session <path>        Session driver module exporting createSession(context)
  --product-file <path>   Products to process (.txt one per line, or .csv/.tsv)
  --series-url <url>      Series page to enumerate (repeatable)
  --series <name>         Restrict enumeration to one series
  --only <path>           Keep only the model codes / product URLs listed in a file
  --max-products <n>      Stop after n products
  --sessions <n>          Parallel browser sessions
  --overwrite             Re-fetch assets the ledger already holds
  --ignore-https-errors   Ignore TLS certificate errors (use only when required)
  --include-incomplete    verify: also audit folders without a .complete marker
  --fix                   verify: delete invalid PDFs and prune CAD zips
  -h, --help              Show this help
`;

const VALUE_OPTIONS = new Set([
  "--config",
  "--session",
  "--product-file",
  "--series-url",
  "--series",
  "--only",
  "--max-products",
  "--sessions",
]);

const FLAG_OPTIONS = new Set(["--overwrite", "--ignore-https-errors", "--include-incomplete", "--fix"]);

function parseCommand(raw: string | undefined): CommandName | "help" | undefined {
  if (raw === undefined || raw === "help") {
    return "help";
  }
  if (raw === "run" || raw === "status" || raw === "verify") {
    return raw;
  }
  return undefined;
}

function parsePositiveInt(option: string, raw: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw.trim()) {
    throw new UsageError(`${option} expects a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (command === "help") {
    return "help";
  }
  if (!command) {
    throw new UsageError(`unknown command "${argv[0]}"`);
  }

  const values = new Map<string, string[]>();
  const flags = new Set<string>();
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (FLAG_OPTIONS.has(arg)) {
      flags.add(arg);
      continue;
    }
    if (!VALUE_OPTIONS.has(arg)) {
      throw new UsageError(`unknown option "${arg}"`);
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${arg} expects a value`);
    }
    values.set(arg, [...(values.get(arg) ?? []), value]);
    index += 1;
  }

  const last = (option: string): string | undefined => values.get(option)?.at(-1);
  const maxProducts = last("--max-products");
  const sessions = last("--sessions");

  return {
    command,
    configPath: last("--config"),
    sessionModule: last("--session"),
    productFile: last("--product-file"),
    seriesUrls: values.get("--series-url") ?? [],
    series: last("--series"),
    onlyFile: last("--only"),
    maxProducts: maxProducts === undefined ? undefined : parsePositiveInt("--max-products", maxProducts),
    sessions: sessions === undefined ? undefined : parsePositiveInt("--sessions", sessions),
    overwrite: flags.has("--overwrite"),
    ignoreHttpsErrors: flags.has("--ignore-https-errors"),
    includeIncomplete: flags.has("--include-incomplete"),
    fix: flags.has("--fix"),
  };
}

/** Command-line options win over the config file and the environment. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    sessionModule: parsed.sessionModule ?? config.sessionModule,
    maxProducts: parsed.maxProducts ?? config.maxProducts,
    sessionCount: parsed.sessions ?? config.sessionCount,
    overwrite: parsed.overwrite || config.overwrite,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  };
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`error: ${error.message}`);
      console.error(HELP_TEXT.trim());
      return 2;
    }
    throw error;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  let logger = new Logger({ component: "cli", runId }, { writer: deps.writer });

  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath, deps.env), parsed);
  } catch (error) {
    logger.error("config_invalid", { errorClass: errorClass(error), error: errorMessage(error) });
    return 1;
  }
  logger = new Logger({ component: "cli", runId }, { minLevel: config.logLevel, writer: deps.writer });

  const store = createStore(config);
  const context: CommandContext = { runId, config, store, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    outputRoot: config.outputRoot,
    overwrite: config.overwrite,
    maxProducts: config.maxProducts,
    sessions: config.sessionCount,
  });

  try {
    switch (parsed.command) {
      case "run": {
        const summary = await runArchive(
          { ...context, logger: logger.child("archive") },
          {
            productFile: parsed.productFile,
            seriesUrls: parsed.seriesUrls,
            series: parsed.series,
            onlyFile: parsed.onlyFile,
            createSession: deps.createSession,
          },
        );
        logger.info("command_complete", { command: parsed.command, status: summary.status });
        return summary.status === "completed" ? 0 : 1;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "verify": {
        const report = await runVerify(
          { ...context, logger: logger.child("verify") },
          { fix: parsed.fix, includeIncomplete: parsed.includeIncomplete },
        );
        logger.info("command_complete", { command: parsed.command, ok: report.ok, warn: report.warn });
        return 0;
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, errorClass: errorClass(error), error: errorMessage(error) });
    return 1;
  } finally {
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
