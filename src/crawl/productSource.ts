import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { sanitizeModelCode } from "../catalog";
import { ConfigError } from "../core/errors";
import type { Logger } from "../observability";
import type { CatalogBrowser } from "../session";
import type { Product } from "../types";

/**
 * Ordered, finite, restartable sequence of products. Each call to `products()`
 * starts from the beginning.
 */
export interface ProductSource {
  products(): AsyncIterable<Product>;
  describe(): string;
}

const HEADER_CELLS = new Set(["model", "model_code", "modelcode", "code", "product"]);

function toCells(row: unknown): string[] {
  if (!Array.isArray(row)) {
    return [];
  }
  return row.map((cell) => (typeof cell === "string" ? cell.trim() : String(cell ?? "").trim()));
}

/** Products listed in a text file (one code per line) or a CSV/TSV (code, optional URL). */
export class FileProductSource implements ProductSource {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  describe(): string {
    return `file:${this.filePath}`;
  }

  async *products(): AsyncIterable<Product> {
    if (!fs.existsSync(this.filePath)) {
      throw new ConfigError(`Product file not found: ${this.filePath}`);
    }

    const raw = await fs.promises.readFile(this.filePath, "utf-8");
    const extension = path.extname(this.filePath).toLowerCase();
    const rows: string[][] =
      extension === ".csv" || extension === ".tsv" ? this.parseDelimited(raw, extension === ".tsv" ? "\t" : ",") : this.parseLines(raw);

    const seen = new Set<string>();
    let order = 0;
    for (const [index, cells] of rows.entries()) {
      const first = cells[0] ?? "";
      if (index === 0 && HEADER_CELLS.has(first.toLowerCase())) {
        continue;
      }

      const modelCode = sanitizeModelCode(first);
      if (modelCode.length === 0 || seen.has(modelCode)) {
        continue;
      }
      seen.add(modelCode);

      const sourceUrl = cells[1] && cells[1].length > 0 ? cells[1] : undefined;
      yield { modelCode, sourceUrl, order };
      order += 1;
    }
  }

  private parseDelimited(raw: string, delimiter: string): string[][] {
    const parsed: unknown = parse(raw, {
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      comment: "#",
      trim: true,
    });
    return Array.isArray(parsed) ? parsed.map(toCells) : [];
  }

  private parseLines(raw: string): string[][] {
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"))
      .map((line) => [line]);
  }
}

export interface SeriesSourceOptions {
  /** Explicit series pages; when empty the catalog's series index is used. */
  seriesUrls?: string[];
  /** Restrict to one series, matched against the series URL. */
  onlySeries?: string;
  /** Runs before the catalog is browsed, e.g. to log in. */
  prepare?: () => Promise<void>;
  logger?: Logger;
}

/** Products discovered by walking series listings through the session's catalog browser. */
export class SeriesProductSource implements ProductSource {
  private readonly browser: CatalogBrowser;
  private readonly options: SeriesSourceOptions;

  constructor(browser: CatalogBrowser, options: SeriesSourceOptions = {}) {
    this.browser = browser;
    this.options = options;
  }

  describe(): string {
    if (this.options.onlySeries) {
      return `series:${this.options.onlySeries}`;
    }
    return this.options.seriesUrls && this.options.seriesUrls.length > 0
      ? `series:${this.options.seriesUrls.length} explicit`
      : "series:index";
  }

  async *products(): AsyncIterable<Product> {
    if (this.options.prepare) {
      await this.options.prepare();
    }

    let seriesUrls =
      this.options.seriesUrls && this.options.seriesUrls.length > 0 ? this.options.seriesUrls : await this.browser.listSeries();
    const only = this.options.onlySeries;
    if (only) {
      seriesUrls = seriesUrls.filter((url) => url === only || url.includes(only));
      if (seriesUrls.length === 0) {
        seriesUrls = [only];
      }
    }

    const seen = new Set<string>();
    let order = 0;
    for (const seriesUrl of seriesUrls) {
      const listing = await this.browser.listProducts(seriesUrl);
      this.options.logger?.info("series_listed", { seriesUrl, products: listing.products.length });

      for (const entry of listing.products) {
        const modelCode = sanitizeModelCode(entry.modelCode);
        if (modelCode.length === 0 || seen.has(modelCode)) {
          continue;
        }
        seen.add(modelCode);
        yield { modelCode, sourceUrl: entry.sourceUrl, seriesUrl: listing.seriesUrl, order };
        order += 1;
      }
    }
  }
}

/** Stops after `max` products; `undefined` or a non-positive value means no cap. */
export function limitProducts(source: ProductSource, max?: number): ProductSource {
  if (max === undefined || max <= 0) {
    return source;
  }
  return {
    describe: () => `${source.describe()} (max ${max})`,
    async *products() {
      let count = 0;
      for await (const product of source.products()) {
        yield product;
        count += 1;
        if (count >= max) {
          return;
        }
      }
    },
  };
}

/** Keeps products whose model code or source URL is in `keys`. */
export function filterProducts(source: ProductSource, keys: Iterable<string>): ProductSource {
  const wanted = new Set(keys);
  if (wanted.size === 0) {
    return source;
  }
  return {
    describe: () => `${source.describe()} (filtered to ${wanted.size})`,
    async *products() {
      for await (const product of source.products()) {
        if (wanted.has(product.modelCode) || (product.sourceUrl !== undefined && wanted.has(product.sourceUrl))) {
          yield product;
        }
      }
    },
  };
}

/** Reads model codes (first column) for use with `filterProducts`. */
export async function readProductKeys(filePath: string): Promise<string[]> {
  const keys: string[] = [];
  for await (const product of new FileProductSource(filePath).products()) {
    keys.push(product.modelCode);
    if (product.sourceUrl) {
      keys.push(product.sourceUrl);
    }
  }
  return keys;
}
