import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OutputAuditor } from "../src/audit";
import { ResumeLedger } from "../src/ledger";
import { sha256File } from "../src/packaging";
import { makeTempDir, PNG_BODY, pdfBody, stepBody, zipBody } from "./helpers/fakeSession";

describe("OutputAuditor", () => {
  let root: string;
  let outputRoot: string;
  let ledgerPath: string;

  const put = async (relativePath: string, body: string | Buffer): Promise<void> => {
    const target = path.join(outputRoot, relativePath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, body);
  };

  beforeEach(async () => {
    root = await makeTempDir();
    outputRoot = path.join(root, "output");
    ledgerPath = path.join(root, "ledger.jsonl");

    await put("GOOD-1/.complete", "ok");
    await put("GOOD-1/GOOD-1_Catalog.pdf", pdfBody("catalog"));
    await put("GOOD-1/GOOD-1_Dimension.pdf", pdfBody("dimension"));
    await put("GOOD-1/GOOD-1_DXF.zip", zipBody({ "part.dxf": "0\nSECTION\n" }));
    await put("GOOD-1/GOOD-1_STEP.zip", zipBody({ "part.stp": stepBody() }));
    await put("GOOD-1/Images/GOOD-1.png", PNG_BODY);

    await put("BAD-2/.complete", "ok");
    await put("BAD-2/BAD-2_Catalog.pdf", "<html>Access denied</html>");
    await put("BAD-2/BAD-2_DXF.zip", zipBody({ "readme.txt": "no drawing here" }));
    await put("BAD-2/BAD-2_STEP.zip", zipBody({ "part.step": stepBody(), "notes.txt": "generated" }));
    await put("BAD-2/.BAD-2_Manual.pdf.abcd1234.partial", "%PDF-1.4 half");

    await put("WIP-3/WIP-3_Catalog.pdf", pdfBody("wip"));
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it("reports problems in completed product folders only", async () => {
    const report = await new OutputAuditor({ outputRoot }).audit();

    expect(report.ok).toBe(1);
    expect(report.warn).toBe(1);
    expect(report.products).toEqual([
      {
        modelCode: "BAD-2",
        status: "warn",
        issues: [
          "Leftover temp file: .BAD-2_Manual.pdf.abcd1234.partial",
          "Invalid PDF: BAD-2_Catalog.pdf (missing %PDF signature)",
          "Missing required BAD-2_Dimension.pdf",
          "DXF zip missing .dxf: BAD-2_DXF.zip",
          "STEP zip carries extra members: BAD-2_STEP.zip",
          "Missing or invalid product image in Images/",
        ],
        fixes: [],
      },
      { modelCode: "GOOD-1", status: "ok", issues: [], fixes: [] },
    ]);
    expect(fs.existsSync(path.join(outputRoot, "BAD-2", "BAD-2_Catalog.pdf"))).toBe(true);
  });

  it("includes unfinished folders on request", async () => {
    const report = await new OutputAuditor({ outputRoot, includeIncomplete: true }).audit();

    expect(report.products.map((product) => product.modelCode)).toEqual(["BAD-2", "GOOD-1", "WIP-3"]);
    expect(report.products[2].issues).toEqual([
      "Missing required WIP-3_Dimension.pdf",
      "Missing required WIP-3_DXF.zip",
      "Missing required WIP-3_STEP.zip",
      "Missing or invalid product image in Images/",
    ]);
  });

  it("repairs what it can and keeps the ledger in step", async () => {
    const ledger = new ResumeLedger({ ledgerPath, outputRoot });
    const catalogPath = path.join(outputRoot, "BAD-2", "BAD-2_Catalog.pdf");
    const stepPath = path.join(outputRoot, "BAD-2", "BAD-2_STEP.zip");
    await ledger.markCompleted("BAD-2", "Catalog", "BAD-2/BAD-2_Catalog.pdf", {
      bytes: (await fs.promises.stat(catalogPath)).size,
      sha256: await sha256File(catalogPath),
      check: "pdf",
    });
    await ledger.markCompleted("BAD-2", "STEP", "BAD-2/BAD-2_STEP.zip", {
      bytes: (await fs.promises.stat(stepPath)).size,
      sha256: await sha256File(stepPath),
      check: "zip",
    });

    const [bad] = (await new OutputAuditor({ outputRoot, fix: true, ledger }).audit()).products;
    await ledger.flush();

    expect(bad.fixes).toEqual([
      "Deleted leftover temp file: .BAD-2_Manual.pdf.abcd1234.partial",
      "Deleted invalid PDF: BAD-2_Catalog.pdf",
      "Cleaned STEP zip: kept part.step",
    ]);
    expect(bad.issues).toEqual([
      "Invalid PDF: BAD-2_Catalog.pdf (missing %PDF signature)",
      "Missing required BAD-2_Dimension.pdf",
      "DXF zip missing .dxf: BAD-2_DXF.zip",
      "Missing or invalid product image in Images/",
    ]);
    expect(fs.existsSync(catalogPath)).toBe(false);
    expect(new AdmZip(stepPath).getEntries().map((entry) => entry.entryName)).toEqual(["part.step"]);

    const reloaded = new ResumeLedger({ ledgerPath, outputRoot });
    await reloaded.load();
    expect(reloaded.get("BAD-2", "Catalog")).toBeUndefined();
    expect(reloaded.get("BAD-2", "STEP")?.sha256).toBe(await sha256File(stepPath));
    expect(await reloaded.hasCompleted("BAD-2", "STEP")).toBe(true);
  });

  it("returns an empty report for a missing output root", async () => {
    const report = await new OutputAuditor({ outputRoot: path.join(root, "nowhere") }).audit();
    expect(report).toEqual({ outputRoot: path.join(root, "nowhere"), products: [], ok: 0, warn: 0 });
  });
});
