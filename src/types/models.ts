import type { AssetKind } from "../catalog";

export interface Product {
  modelCode: string;
  /** Catalog page the product was discovered on. */
  sourceUrl?: string;
  seriesUrl?: string;
  /** Discovery order; products are processed and reported in this order. */
  order: number;
}

export interface Credentials {
  username: string;
  password: string;
}

export interface AssetFingerprint {
  bytes: number;
  sha256: string;
  /** Which structural check the file passed, e.g. `pdf`, `zip`, `image:png`. */
  check: string;
}

export interface TaskResult {
  modelCode: string;
  kind: AssetKind;
  status: "finalized" | "skipped" | "unavailable" | "permanently_failed";
  attempts: number;
  path?: string;
  fingerprint?: AssetFingerprint;
  errorClass?: string;
  error?: string;
  finishedAt: string;
}

export interface ProductFailure {
  kind: AssetKind;
  attempts: number;
  errorClass?: string;
  reason: string;
}

export interface ProductSummary {
  modelCode: string;
  order: number;
  finalized: number;
  skipped: number;
  unavailable: number;
  failed: number;
  complete: boolean;
  failures: ProductFailure[];
}

export interface RunTotals {
  products: number;
  finalized: number;
  skipped: number;
  unavailable: number;
  failed: number;
}

export interface RunSummary {
  runId: string;
  status: "completed" | "aborted";
  startedAt: string;
  finishedAt: string;
  products: ProductSummary[];
  totals: RunTotals;
  abortReason?: string;
}
