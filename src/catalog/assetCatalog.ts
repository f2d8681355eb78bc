export type AssetKind = "Catalog" | "Dimension" | "DXF" | "STEP" | "Datasheet" | "Manual" | "Image";

export interface AssetDescriptor {
  kind: AssetKind;
  /** Appended to the model code; empty for images, which live under `Images/`. */
  suffix: string;
  /** Target extension without the dot. Images take theirs from the detected format. */
  extension: "pdf" | "zip" | "image";
  /** Part of the cart grouping fetched as one combined retrieval. */
  required: boolean;
  /** May be missing from a product page without counting as a failure. */
  optional: boolean;
  archive: boolean;
  pdf: boolean;
  /** Member extensions that belong in the packaged zip. */
  archiveMembers: string[];
}

const DESCRIPTORS: Record<AssetKind, AssetDescriptor> = {
  Catalog: {
    kind: "Catalog",
    suffix: "_Catalog",
    extension: "pdf",
    required: true,
    optional: false,
    archive: false,
    pdf: true,
    archiveMembers: [],
  },
  Dimension: {
    kind: "Dimension",
    suffix: "_Dimension",
    extension: "pdf",
    required: true,
    optional: false,
    archive: false,
    pdf: true,
    archiveMembers: [],
  },
  DXF: {
    kind: "DXF",
    suffix: "_DXF",
    extension: "zip",
    required: true,
    optional: false,
    archive: true,
    pdf: false,
    archiveMembers: [".dxf"],
  },
  STEP: {
    kind: "STEP",
    suffix: "_STEP",
    extension: "zip",
    required: true,
    optional: false,
    archive: true,
    pdf: false,
    archiveMembers: [".stp", ".step"],
  },
  Datasheet: {
    kind: "Datasheet",
    suffix: "_Datasheet",
    extension: "pdf",
    required: false,
    optional: false,
    archive: false,
    pdf: true,
    archiveMembers: [],
  },
  Manual: {
    kind: "Manual",
    suffix: "_Manual",
    extension: "pdf",
    required: false,
    optional: true,
    archive: false,
    pdf: true,
    archiveMembers: [],
  },
  Image: {
    kind: "Image",
    suffix: "",
    extension: "image",
    required: false,
    optional: true,
    archive: false,
    pdf: false,
    archiveMembers: [],
  },
};

// Cart grouping first, then the per-product pages.
export const ASSET_ORDER: readonly AssetKind[] = ["Catalog", "Dimension", "DXF", "STEP", "Datasheet", "Manual", "Image"];

export const REQUIRED_KINDS: readonly AssetKind[] = ASSET_ORDER.filter((kind) => DESCRIPTORS[kind].required);

export const IMAGES_DIR = "Images";

/** Written in a product folder once every required kind is in place. */
export const COMPLETE_MARKER = ".complete";

export function describeAsset(kind: AssetKind): AssetDescriptor {
  return DESCRIPTORS[kind];
}

export function isAssetKind(value: string): value is AssetKind {
  return ASSET_ORDER.some((kind) => kind === value);
}

export function parseAssetKind(raw: string): AssetKind | undefined {
  const normalized = raw.trim().toLowerCase();
  return ASSET_ORDER.find((kind) => kind.toLowerCase() === normalized);
}

/** Folder- and file-safe form of a model code as shown in the catalog. */
export function sanitizeModelCode(raw: string): string {
  return raw
    .replace(/[\\/:]/g, "-")
    .replace(/\s+/g, " ")
    .trim();
}
