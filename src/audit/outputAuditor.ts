import fs from "node:fs";
import path from "node:path";
import { ASSET_ORDER, type AssetKind, COMPLETE_MARKER, describeAsset, IMAGES_DIR } from "../catalog";
import type { ResumeLedger } from "../ledger";
import type { Logger } from "../observability";
import { canonicalRelativePath, membersToKeep, pruneArchive, sha256File, TEMP_SUFFIX } from "../packaging";
import { ArtifactValidator, readArchiveEntries } from "../validate";

export type AuditStatus = "ok" | "warn";

export interface ProductAudit {
  modelCode: string;
  status: AuditStatus;
  issues: string[];
  fixes: string[];
}

export interface AuditReport {
  outputRoot: string;
  products: ProductAudit[];
  ok: number;
  warn: number;
}

export interface OutputAuditorOptions {
  outputRoot: string;
  /** Also audit folders without a completion marker. */
  includeIncomplete?: boolean;
  /** Delete invalid PDFs and leftover temp files, prune CAD zips. */
  fix?: boolean;
  validator?: ArtifactValidator;
  /** Kept in step with fixes: deleted files are forgotten, pruned zips re-fingerprinted. */
  ledger?: ResumeLedger;
  logger?: Logger;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(directory: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/** Walks an output root and reports product folders that do not hold what a finished run leaves behind. */
export class OutputAuditor {
  private readonly outputRoot: string;
  private readonly options: OutputAuditorOptions;
  private readonly validator: ArtifactValidator;

  constructor(options: OutputAuditorOptions) {
    this.outputRoot = path.resolve(options.outputRoot);
    this.options = options;
    this.validator = options.validator ?? new ArtifactValidator();
  }

  async audit(): Promise<AuditReport> {
    const report: AuditReport = { outputRoot: this.outputRoot, products: [], ok: 0, warn: 0 };

    let folders: string[];
    try {
      const entries = await fs.promises.readdir(this.outputRoot, { withFileTypes: true });
      folders = entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.options.logger?.warn("audit_root_missing", { outputRoot: this.outputRoot });
        return report;
      }
      throw error;
    }

    for (const modelCode of folders) {
      if (!this.options.includeIncomplete && !(await exists(path.join(this.outputRoot, modelCode, COMPLETE_MARKER)))) {
        continue;
      }
      const result = await this.auditProduct(modelCode);
      report.products.push(result);
      if (result.status === "ok") {
        report.ok += 1;
      } else {
        report.warn += 1;
        this.options.logger?.warn("audit_product_warn", { modelCode, issues: result.issues });
      }
      if (result.fixes.length > 0) {
        this.options.logger?.info("audit_product_fixed", { modelCode, fixes: result.fixes });
      }
    }

    this.options.logger?.info("audit_complete", {
      outputRoot: this.outputRoot,
      products: report.products.length,
      ok: report.ok,
      warn: report.warn,
    });
    return report;
  }

  async auditProduct(modelCode: string): Promise<ProductAudit> {
    const result: ProductAudit = { modelCode, status: "ok", issues: [], fixes: [] };
    const productDir = path.join(this.outputRoot, modelCode);
    const warn = (issue: string): void => {
      result.status = "warn";
      result.issues.push(issue);
    };

    for (const name of await listFiles(productDir)) {
      if (!name.endsWith(TEMP_SUFFIX)) {
        continue;
      }
      if (this.options.fix) {
        await fs.promises.rm(path.join(productDir, name), { force: true });
        result.fixes.push(`Deleted leftover temp file: ${name}`);
      } else {
        warn(`Leftover temp file: ${name}`);
      }
    }

    for (const kind of ASSET_ORDER) {
      const descriptor = describeAsset(kind);
      if (descriptor.extension === "image") {
        continue;
      }

      const relativePath = canonicalRelativePath(modelCode, kind);
      const absolutePath = path.join(this.outputRoot, ...relativePath.split("/"));
      const name = path.basename(absolutePath);
      if (!(await exists(absolutePath))) {
        if (descriptor.required) {
          warn(`Missing required ${name}`);
        }
        continue;
      }

      const check = await this.validator.validate(kind, absolutePath);

      if (descriptor.pdf) {
        if (check.ok) {
          continue;
        }
        warn(`Invalid PDF: ${name} (${check.reason})`);
        if (this.options.fix) {
          await fs.promises.rm(absolutePath, { force: true });
          await this.options.ledger?.forget(modelCode, kind);
          result.fixes.push(`Deleted invalid PDF: ${name}`);
        }
        continue;
      }

      if (!check.ok || check.check !== "zip") {
        warn(`Corrupt ${kind} zip: ${name}${check.ok ? "" : ` (${check.reason})`}`);
        continue;
      }

      const listing = readArchiveEntries(absolutePath);
      const entries = "entries" in listing ? listing.entries : [];
      const cadMembers = entries.filter((entry) => descriptor.archiveMembers.includes(path.extname(entry).toLowerCase()));
      if (cadMembers.length === 0) {
        warn(`${kind} zip missing ${descriptor.archiveMembers.join("/")}: ${name}`);
        continue;
      }

      if (!membersToKeep(kind, entries)) {
        continue;
      }
      if (!this.options.fix) {
        warn(`${kind} zip carries extra members: ${name}`);
        continue;
      }

      const kept = await pruneArchive(kind, absolutePath);
      if (kept) {
        result.fixes.push(`Cleaned ${kind} zip: kept ${kept.join(", ")}`);
        await this.refingerprint(modelCode, kind, relativePath, absolutePath);
      }
    }

    if (!(await this.hasValidImage(path.join(productDir, IMAGES_DIR)))) {
      warn(`Missing or invalid product image in ${IMAGES_DIR}/`);
    }

    return result;
  }

  private async hasValidImage(imagesDir: string): Promise<boolean> {
    for (const name of await listFiles(imagesDir)) {
      if (name.startsWith(".")) {
        continue;
      }
      const check = await this.validator.validate("Image", path.join(imagesDir, name));
      if (check.ok) {
        return true;
      }
    }
    return false;
  }

  private async refingerprint(
    modelCode: string,
    kind: AssetKind,
    relativePath: string,
    absolutePath: string,
  ): Promise<void> {
    const ledger = this.options.ledger;
    if (!ledger?.get(modelCode, kind)) {
      return;
    }
    const stat = await fs.promises.stat(absolutePath);
    await ledger.markCompleted(modelCode, kind, relativePath, {
      bytes: stat.size,
      sha256: await sha256File(absolutePath),
      check: "zip",
    });
  }
}
