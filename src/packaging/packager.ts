import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { type AssetKind, describeAsset, IMAGES_DIR } from "../catalog";
import { PackagingError, errorMessage } from "../core/errors";
import type { AssetFingerprint } from "../types";
import { ArtifactValidator, readArchiveEntries } from "../validate";

export interface DownloadedFile {
  path: string;
  /** File name as delivered by the portal; kept inside wrapped zips. */
  originalName: string;
}

export interface PackagedAsset {
  canonicalPath: string;
  /** Output-root relative, always with forward slashes. */
  relativePath: string;
  fingerprint: AssetFingerprint;
}

export interface PackagerOptions {
  outputRoot: string;
  validator?: ArtifactValidator;
}

export function canonicalRelativePath(modelCode: string, kind: AssetKind, imageExtension = "png"): string {
  const descriptor = describeAsset(kind);
  if (descriptor.extension === "image") {
    return path.posix.join(modelCode, IMAGES_DIR, `${modelCode}.${imageExtension}`);
  }
  return path.posix.join(modelCode, `${modelCode}${descriptor.suffix}.${descriptor.extension}`);
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

function hasExtension(name: string, extensions: string[]): boolean {
  return extensions.includes(path.extname(name).toLowerCase());
}

/**
 * CAD members to keep when a zip also carries stray or nested entries, or
 * undefined when it can stay as it is (including when it holds no CAD file).
 */
export function membersToKeep(kind: AssetKind, entries: string[]): string[] | undefined {
  const keep = entries.filter((name) => hasExtension(name, describeAsset(kind).archiveMembers));
  const needsPrune = keep.length > 0 && (keep.length !== entries.length || keep.some((name) => name.includes("/")));
  return needsPrune ? keep : undefined;
}

function prunedArchive(sourcePath: string, keep: string[]): Buffer {
  const source = new AdmZip(sourcePath);
  const pruned = new AdmZip();
  for (const name of keep) {
    const data = source.readFile(name);
    if (data) {
      pruned.addFile(path.posix.basename(name), data);
    }
  }
  return pruned.toBuffer();
}

export const TEMP_SUFFIX = ".partial";

function tempPathFor(targetPath: string): string {
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.${crypto.randomUUID().slice(0, 8)}${TEMP_SUFFIX}`);
}

/** Rewrites a packaged zip in place with only its CAD members; returns the kept names, if it changed. */
export async function pruneArchive(kind: AssetKind, zipPath: string): Promise<string[] | undefined> {
  const listing = readArchiveEntries(zipPath);
  if ("error" in listing) {
    return undefined;
  }
  const keep = membersToKeep(kind, listing.entries);
  if (!keep) {
    return undefined;
  }

  const tempPath = tempPathFor(zipPath);
  try {
    await fs.promises.writeFile(tempPath, prunedArchive(zipPath, keep));
    await fs.promises.rename(tempPath, zipPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw new PackagingError(`could not prune ${zipPath}: ${errorMessage(error)}`, { cause: error });
  }
  return keep.map((name) => path.posix.basename(name));
}

/**
 * Builds the zip that lands on the canonical path. Deliveries that are already
 * zips are carried over as-is unless they hold stray members next to the CAD
 * files, in which case only the CAD files are kept (flattened).
 */
async function writeArchive(
  kind: AssetKind,
  file: DownloadedFile,
  deliveredAsZip: boolean,
  tempPath: string,
): Promise<void> {
  if (!deliveredAsZip) {
    const zip = new AdmZip();
    zip.addFile(path.basename(file.originalName), await fs.promises.readFile(file.path));
    await fs.promises.writeFile(tempPath, zip.toBuffer());
    return;
  }

  const listing = readArchiveEntries(file.path);
  const keep = membersToKeep(kind, "entries" in listing ? listing.entries : []);
  if (!keep) {
    await fs.promises.copyFile(file.path, tempPath);
    return;
  }
  await fs.promises.writeFile(tempPath, prunedArchive(file.path, keep));
}

export class Packager {
  private readonly outputRoot: string;
  private readonly validator: ArtifactValidator;

  constructor(options: PackagerOptions) {
    this.outputRoot = path.resolve(options.outputRoot);
    this.validator = options.validator ?? new ArtifactValidator();
  }

  resolve(relativePath: string): string {
    return path.join(this.outputRoot, ...relativePath.split("/"));
  }

  canonicalPath(modelCode: string, kind: AssetKind, imageExtension?: string): string {
    return this.resolve(canonicalRelativePath(modelCode, kind, imageExtension));
  }

  /**
   * Places a validated download at its canonical path. Content goes to a temp
   * file beside the target, is checked again, and only then renamed over it.
   */
  async package(
    file: DownloadedFile,
    modelCode: string,
    kind: AssetKind,
    delivered: { check: string; format?: string },
  ): Promise<PackagedAsset> {
    const relativePath = canonicalRelativePath(modelCode, kind, delivered.format);
    const canonicalPath = this.resolve(relativePath);
    const directory = path.dirname(canonicalPath);
    const tempPath = tempPathFor(canonicalPath);

    try {
      await fs.promises.mkdir(directory, { recursive: true });

      if (describeAsset(kind).archive) {
        await writeArchive(kind, file, delivered.check === "zip", tempPath);
      } else {
        await fs.promises.copyFile(file.path, tempPath);
      }

      const check = await this.validator.validate(kind, tempPath);
      if (!check.ok) {
        throw new PackagingError(`packaged ${kind} failed integrity check: ${check.reason}`);
      }

      const fingerprint: AssetFingerprint = {
        bytes: check.bytes,
        sha256: await sha256File(tempPath),
        check: check.check,
      };

      await fs.promises.rename(tempPath, canonicalPath);

      if (kind === "Image") {
        await this.removeStaleImages(directory, modelCode, path.basename(canonicalPath));
      }

      return { canonicalPath, relativePath, fingerprint };
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      if (error instanceof PackagingError) {
        throw error;
      }
      throw new PackagingError(`packaging ${kind} for ${modelCode} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  // An image re-fetched in another format would otherwise leave the old file next to it.
  private async removeStaleImages(directory: string, modelCode: string, keep: string): Promise<void> {
    const names = await fs.promises.readdir(directory);
    for (const name of names) {
      if (name !== keep && !name.startsWith(".") && path.parse(name).name === modelCode) {
        await fs.promises.rm(path.join(directory, name), { force: true });
      }
    }
  }
}
