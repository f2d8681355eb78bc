import { describe, expect, it } from "vitest";
import {
  ASSET_ORDER,
  describeAsset,
  isAssetKind,
  parseAssetKind,
  REQUIRED_KINDS,
  sanitizeModelCode,
} from "../src/catalog";

describe("asset catalog", () => {
  it("processes cart kinds before the per-product pages", () => {
    expect(ASSET_ORDER).toEqual(["Catalog", "Dimension", "DXF", "STEP", "Datasheet", "Manual", "Image"]);
  });

  it("marks the four cart kinds as required", () => {
    expect(REQUIRED_KINDS).toEqual(["Catalog", "Dimension", "DXF", "STEP"]);
  });

  it("lets only the manual and the image be missing from a product", () => {
    expect(ASSET_ORDER.filter((kind) => describeAsset(kind).optional)).toEqual(["Manual", "Image"]);
    expect(describeAsset("Datasheet")).toMatchObject({ required: false, optional: false });
  });

  it("describes archive kinds with their CAD member extensions", () => {
    expect(describeAsset("DXF")).toMatchObject({ suffix: "_DXF", extension: "zip", archive: true, archiveMembers: [".dxf"] });
    expect(describeAsset("STEP").archiveMembers).toEqual([".stp", ".step"]);
    expect(describeAsset("Manual")).toMatchObject({ suffix: "_Manual", extension: "pdf", pdf: true, required: false });
    expect(describeAsset("Image")).toMatchObject({ suffix: "", extension: "image" });
  });

  it("recognizes kinds by exact name and parses them case-insensitively", () => {
    expect(isAssetKind("STEP")).toBe(true);
    expect(isAssetKind("step")).toBe(false);
    expect(parseAssetKind(" datasheet ")).toBe("Datasheet");
    expect(parseAssetKind("brochure")).toBeUndefined();
  });

  it("makes model codes safe for folder names", () => {
    expect(sanitizeModelCode("  LDR2-32RD2  ")).toBe("LDR2-32RD2");
    expect(sanitizeModelCode("HLV2/27X7W\\A:1")).toBe("HLV2-27X7W-A-1");
    expect(sanitizeModelCode("PD3\t 100")).toBe("PD3 100");
  });
});
