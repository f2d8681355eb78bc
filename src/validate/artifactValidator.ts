import fs from "node:fs";
import AdmZip from "adm-zip";
import { type AssetKind, describeAsset } from "../catalog";

export type ImageFormat = "png" | "jpg" | "gif" | "webp";

export type ValidationResult =
  | { ok: true; kind: AssetKind; check: string; bytes: number; format?: ImageFormat }
  | { ok: false; kind: AssetKind; reason: string; bytes: number };

const PDF_MAGIC = Buffer.from("%PDF", "latin1");
const ZIP_LOCAL_HEADER = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const ZIP_EMPTY_ARCHIVE = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const STEP_HEADER = "ISO-10303-21";
const HEAD_BYTES = 64;

async function readHead(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function startsWith(head: Buffer, signature: Buffer): boolean {
  return head.length >= signature.length && head.subarray(0, signature.length).equals(signature);
}

export function isZipSignature(head: Buffer): boolean {
  return startsWith(head, ZIP_LOCAL_HEADER) || startsWith(head, ZIP_EMPTY_ARCHIVE);
}

export function detectImageFormat(head: Buffer): ImageFormat | undefined {
  if (startsWith(head, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return "png";
  }
  if (startsWith(head, Buffer.from([0xff, 0xd8, 0xff]))) {
    return "jpg";
  }
  const ascii = head.toString("latin1");
  if (ascii.startsWith("GIF87a") || ascii.startsWith("GIF89a")) {
    return "gif";
  }
  if (ascii.startsWith("RIFF") && ascii.slice(8, 12) === "WEBP") {
    return "webp";
  }
  return undefined;
}

function leadingText(head: Buffer): string {
  return head.toString("latin1").replace(/^\xEF\xBB\xBF/, "").trimStart();
}

function looksLikeHtml(head: Buffer): boolean {
  const text = leadingText(head).toLowerCase();
  return text.startsWith("<!doctype html") || text.startsWith("<html") || text.startsWith("<head");
}

/** File entries of a zip container, or an error string when it cannot be opened. */
export function readArchiveEntries(filePath: string): { entries: string[] } | { error: string } {
  try {
    const zip = new AdmZip(filePath);
    const entries = zip
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.entryName);
    return { entries };
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Structural checks on a freshly downloaded file. Never writes; a failed check
 * is a result, not an exception.
 */
export class ArtifactValidator {
  async validate(kind: AssetKind, filePath: string): Promise<ValidationResult> {
    let bytes: number;
    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) {
        return { ok: false, kind, reason: "not a regular file", bytes: 0 };
      }
      bytes = stat.size;
    } catch {
      return { ok: false, kind, reason: "file not found", bytes: 0 };
    }

    if (bytes === 0) {
      return { ok: false, kind, reason: "empty file", bytes };
    }

    const head = await readHead(filePath, HEAD_BYTES);
    const descriptor = describeAsset(kind);

    if (descriptor.pdf) {
      if (!startsWith(head, PDF_MAGIC)) {
        return { ok: false, kind, reason: "missing %PDF signature", bytes };
      }
      return { ok: true, kind, check: "pdf", bytes };
    }

    if (descriptor.archive) {
      return this.validateCad(kind, filePath, head, bytes);
    }

    const format = detectImageFormat(head);
    if (!format) {
      return { ok: false, kind, reason: "unrecognized image signature", bytes };
    }
    return { ok: true, kind, check: `image:${format}`, bytes, format };
  }

  private validateCad(kind: AssetKind, filePath: string, head: Buffer, bytes: number): ValidationResult {
    if (isZipSignature(head)) {
      const archive = readArchiveEntries(filePath);
      if ("error" in archive) {
        return { ok: false, kind, reason: `unreadable archive: ${archive.error}`, bytes };
      }
      if (archive.entries.length === 0) {
        return { ok: false, kind, reason: "archive has no entries", bytes };
      }
      return { ok: true, kind, check: "zip", bytes };
    }

    if (looksLikeHtml(head)) {
      return { ok: false, kind, reason: "received an HTML page instead of CAD data", bytes };
    }
    if (startsWith(head, PDF_MAGIC)) {
      return { ok: false, kind, reason: "received a PDF instead of CAD data", bytes };
    }
    const image = detectImageFormat(head);
    if (image) {
      return { ok: false, kind, reason: `received a ${image} image instead of CAD data`, bytes };
    }
    if (kind === "STEP" && !leadingText(head).startsWith(STEP_HEADER)) {
      return { ok: false, kind, reason: `missing ${STEP_HEADER} header`, bytes };
    }
    return { ok: true, kind, check: "raw-cad", bytes };
  }
}
