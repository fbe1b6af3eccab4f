import { LogLevel } from "../observability/types";

export type LedgerMode = "json" | "sqlite";

export interface JitterRange {
  minMs: number;
  maxMs: number;
}

export interface AppConfig {
  storageRoot: string;
  ledgerMode: LedgerMode;
  ledgerPath?: string;
  sourcesPath: string;
  runSummaryDir: string;
  userAgent: string;
  fallbackUserAgent: string;
  acceptLanguage: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  maxFetchAttempts: number;
  retryBaseDelayMs: number;
  maxRetryDelayMs: number;
  requestJitter: JitterRange;
  maxPages: number;
  renderTimeoutMs: number;
  retryFailedAfterHours: number;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "requestJitter">> & {
  requestJitter?: Partial<JitterRange>;
};
