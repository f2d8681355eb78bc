export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  modelCode?: string;
  kind?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "products_processed"
  | "assets_finalized"
  | "assets_skipped"
  | "assets_failed"
  | "assets_unavailable"
  | "fetch_retries"
  | "reauthentications";

export type MetricTimerName = "fetch_ms" | "package_ms";
