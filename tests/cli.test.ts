import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getHelpText, parseCliArgs, runCli, UsageError } from "../src/cli";
import { AuthenticationError } from "../src/core/errors";
import type { SessionFactory } from "../src/session";
import { FakeSession, makeTempDir } from "./helpers/fakeSession";

describe("parseCliArgs", () => {
  it("returns help for no command, help, or -h", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["help"])).toBe("help");
    expect(parseCliArgs(["run", "-h"])).toBe("help");
  });

  it("parses run options, keeping every series URL", () => {
    expect(
      parseCliArgs([
        "run",
        "--config",
        "archiver.json",
        "--series-url",
        "https://catalog.example.test/s/1",
        "--series-url",
        "https://catalog.example.test/s/2",
        "--max-products",
        "10",
        "--sessions",
        "2",
        "--overwrite",
      ]),
    ).toEqual({
      command: "run",
      configPath: "archiver.json",
      sessionModule: undefined,
      productFile: undefined,
      seriesUrls: ["https://catalog.example.test/s/1", "https://catalog.example.test/s/2"],
      series: undefined,
      onlyFile: undefined,
      maxProducts: 10,
      sessions: 2,
      overwrite: true,
      ignoreHttpsErrors: false,
      includeIncomplete: false,
      fix: false,
    });
  });

  it("parses verify flags", () => {
    expect(parseCliArgs(["verify", "--fix", "--include-incomplete"])).toMatchObject({
      command: "verify",
      fix: true,
      includeIncomplete: true,
    });
  });

  it("rejects unknown commands, unknown options and bad values", () => {
    expect(() => parseCliArgs(["crawl"])).toThrow(UsageError);
    expect(() => parseCliArgs(["run", "--dry-run"])).toThrow('unknown option "--dry-run"');
    expect(() => parseCliArgs(["run", "--product-file"])).toThrow("--product-file expects a value");
    expect(() => parseCliArgs(["run", "--max-products", "ten"])).toThrow('--max-products expects a positive integer, got "ten"');
    expect(() => parseCliArgs(["run", "--sessions", "0"])).toThrow(UsageError);
  });

  it("documents every command", () => {
    const help = getHelpText();
    for (const command of ["run", "status", "verify", "help"]) {
      expect(help).toContain(`  ${command} `);
    }
  });
});

describe("runCli", () => {
  let root: string;
  let env: NodeJS.ProcessEnv;
  let lines: string[];
  const writer = (_level: string, line: string): void => {
    lines.push(line);
  };

  const events = (): string[] => lines.map((line) => String(JSON.parse(line).msg));

  beforeEach(async () => {
    root = await makeTempDir();
    lines = [];
    env = {
      OUTPUT_ROOT: path.join(root, "output"),
      LEDGER_PATH: path.join(root, "data", "ledger.jsonl"),
      STORE_PATH: ":memory:",
      DOWNLOAD_DIR: path.join(root, "downloads"),
      CATALOG_USERNAME: "test-user",
      CATALOG_PASSWORD: "test-secret",
      BASE_DELAY_MS: "0",
      MAX_BACKOFF_MS: "0",
      REQUEST_DELAY_MS: "0",
    };
    await fs.promises.writeFile(path.join(root, "products.txt"), "LDR2-32RD2\n");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it("exits 0 for help and 2 for usage errors", async () => {
    expect(await runCli(["help"])).toBe(0);
    expect(await runCli(["unknown"])).toBe(2);
    expect(await runCli(["run", "--max-products", "-1"])).toBe(2);
  });

  it("archives the products of a file and exits 0", async () => {
    const session = new FakeSession().addProduct("LDR2-32RD2");
    const createSession: SessionFactory = async () => session;

    const exitCode = await runCli(["run", "--product-file", path.join(root, "products.txt")], { env, createSession, writer });

    expect(exitCode).toBe(0);
    expect(fs.existsSync(path.join(root, "output", "LDR2-32RD2", "LDR2-32RD2_DXF.zip"))).toBe(true);
    expect(fs.existsSync(path.join(root, "output", "LDR2-32RD2", ".complete"))).toBe(true);
    expect(session.closed).toBe(true);
    expect(events()).toContain("run_summary");
  });

  it("exits 1 when the run aborts on rejected credentials", async () => {
    const session = new FakeSession().addProduct("LDR2-32RD2");
    session.loginErrors = [new AuthenticationError("invalid username or password")];
    const createSession: SessionFactory = async () => session;

    const exitCode = await runCli(["run", "--product-file", path.join(root, "products.txt")], { env, createSession, writer });

    expect(exitCode).toBe(1);
    expect(events()).toContain("run_aborted");
  });

  it("exits 1 when credentials are not configured", async () => {
    const { CATALOG_PASSWORD: _omitted, ...withoutPassword } = env;
    const createSession: SessionFactory = async () => new FakeSession();

    const exitCode = await runCli(["run", "--product-file", path.join(root, "products.txt")], {
      env: withoutPassword,
      createSession,
      writer,
    });

    expect(exitCode).toBe(1);
    const failure = lines.map((line) => JSON.parse(line)).find((entry) => entry.msg === "command_failed");
    expect(failure).toMatchObject({ errorClass: "ConfigError" });
  });

  it("exits 1 without a session module", async () => {
    const exitCode = await runCli(["run", "--product-file", path.join(root, "products.txt")], { env, writer });
    expect(exitCode).toBe(1);
  });

  it("reports status and verifies the output", async () => {
    const createSession: SessionFactory = async () => new FakeSession().addProduct("LDR2-32RD2");
    await runCli(["run", "--product-file", path.join(root, "products.txt")], { env, createSession, writer });
    lines = [];

    expect(await runCli(["status"], { env, writer })).toBe(0);
    const status = lines.map((line) => JSON.parse(line)).find((entry) => entry.msg === "status_complete");
    expect(status).toMatchObject({ ledgerEntries: 7, products: 1, completeProducts: 1 });

    lines = [];
    expect(await runCli(["verify"], { env, writer })).toBe(0);
    const audit = lines.map((line) => JSON.parse(line)).find((entry) => entry.msg === "audit_complete");
    expect(audit).toMatchObject({ products: 1, ok: 1, warn: 0 });
  });
});
