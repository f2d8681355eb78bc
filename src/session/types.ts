import type { AssetKind } from "../catalog";
import type { Credentials, Product } from "../types";

export interface FetchOptions {
  /** Directory the driver should save into; owned by the caller. */
  downloadDir: string;
  signal: AbortSignal;
}

export type GenerationStatus = "pending" | "ready" | "failed";

/**
 * Secondary CAD-generation portal reached from a STEP request. Implementations
 * own the tab/frame switching; the fetcher drives the sequence.
 */
export interface CadPortal {
  open(): Promise<void>;
  selectFormat(profile: string): Promise<void>;
  startGeneration(): Promise<void>;
  generationStatus(): Promise<GenerationStatus>;
  download(options: FetchOptions): Promise<DeliveredFile>;
  close(): Promise<void>;
}

export interface DeliveredFile {
  path: string;
  originalName?: string;
}

export type AssetDelivery = ({ type: "file" } & DeliveredFile) | { type: "portal"; portal: CadPortal };

/**
 * What the core needs from a browser/session driver. A driver signals an
 * auth-required response by throwing `SessionExpiredError` and rejected
 * credentials by throwing `AuthenticationError`.
 */
export interface SessionCapability {
  login(credentials: Credentials): Promise<void>;
  listAssets(product: Product): Promise<AssetKind[]>;
  fetch(product: Product, kind: AssetKind, options: FetchOptions): Promise<AssetDelivery>;
  /** Combined cart retrieval; kinds missing from the result count as not delivered. */
  fetchBatch?(product: Product, kinds: AssetKind[], options: FetchOptions): Promise<Map<AssetKind, AssetDelivery>>;
  close?(): Promise<void>;
}

export interface SeriesListing {
  seriesUrl: string;
  products: Array<{ modelCode: string; sourceUrl?: string }>;
}

/** Optional catalog browsing, used by the series product source. */
export interface CatalogBrowser {
  listSeries(): Promise<string[]>;
  listProducts(seriesUrl: string): Promise<SeriesListing>;
}

export function isCatalogBrowser(value: object): value is CatalogBrowser {
  return (
    "listSeries" in value &&
    typeof value.listSeries === "function" &&
    "listProducts" in value &&
    typeof value.listProducts === "function"
  );
}

export function isSessionCapability(value: unknown): value is SessionCapability {
  return (
    typeof value === "object" &&
    value !== null &&
    "login" in value &&
    typeof value.login === "function" &&
    "listAssets" in value &&
    typeof value.listAssets === "function" &&
    "fetch" in value &&
    typeof value.fetch === "function"
  );
}
