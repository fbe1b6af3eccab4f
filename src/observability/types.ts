export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  source?: string;
  locator?: string;
  pageUrl?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "candidates_discovered"
  | "candidates_skipped"
  | "fetch_ok"
  | "fetch_failed"
  | "fetch_retries";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "render_ms";
