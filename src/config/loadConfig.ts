import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parseLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides, LedgerMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  storageRoot: "downloads",
  ledgerMode: "json",
  ledgerPath: undefined,
  sourcesPath: "config/sources.json",
  runSummaryDir: "data/runs",
  userAgent: "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  fallbackUserAgent: "delta-harvester/0.1 (+public data archival)",
  acceptLanguage: "en-US,en;q=0.9",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 60_000,
  downloadTimeoutMs: 120_000,
  maxFetchAttempts: 3,
  retryBaseDelayMs: 2_000,
  maxRetryDelayMs: 30_000,
  requestJitter: {
    minMs: 200,
    maxMs: 800,
  },
  maxPages: 50,
  renderTimeoutMs: 45_000,
  retryFailedAfterHours: 24,
  logLevel: "info",
};

const ConfigFileSchema = z
  .object({
    storageRoot: z.string(),
    ledgerMode: z.enum(["json", "sqlite"]),
    ledgerPath: z.string(),
    sourcesPath: z.string(),
    runSummaryDir: z.string(),
    userAgent: z.string(),
    fallbackUserAgent: z.string(),
    acceptLanguage: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    maxFetchAttempts: z.number().int().min(1),
    retryBaseDelayMs: z.number().int().min(0),
    maxRetryDelayMs: z.number().int().min(0),
    requestJitter: z
      .object({
        minMs: z.number().int().min(0),
        maxMs: z.number().int().min(0),
      })
      .partial(),
    maxPages: z.number().int().min(1),
    renderTimeoutMs: z.number().int().positive(),
    retryFailedAfterHours: z.number().min(0),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = ConfigFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLedgerMode(value: string | undefined, fallback: LedgerMode): LedgerMode {
  return value === "json" || value === "sqlite" ? value : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    requestJitter: {
      ...DEFAULT_CONFIG.requestJitter,
      ...(fileConfig.requestJitter ?? {}),
    },
  };

  const jitterMin = toInt(env.REQUEST_JITTER_MIN_MS, merged.requestJitter.minMs);
  const jitterMax = toInt(env.REQUEST_JITTER_MAX_MS, merged.requestJitter.maxMs);

  return {
    ...merged,
    storageRoot: env.STORAGE_ROOT ?? merged.storageRoot,
    ledgerMode: toLedgerMode(env.LEDGER_MODE, merged.ledgerMode),
    ledgerPath: env.LEDGER_PATH ?? merged.ledgerPath,
    sourcesPath: env.SOURCES_PATH ?? merged.sourcesPath,
    runSummaryDir: env.RUN_SUMMARY_DIR ?? merged.runSummaryDir,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    fallbackUserAgent: env.FALLBACK_USER_AGENT ?? merged.fallbackUserAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    maxFetchAttempts: Math.max(1, toInt(env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts)),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    maxRetryDelayMs: toInt(env.MAX_RETRY_DELAY_MS, merged.maxRetryDelayMs),
    requestJitter: {
      minMs: Math.min(jitterMin, jitterMax),
      maxMs: Math.max(jitterMin, jitterMax),
    },
    maxPages: Math.max(1, toInt(env.MAX_PAGES, merged.maxPages)),
    renderTimeoutMs: toInt(env.RENDER_TIMEOUT_MS, merged.renderTimeoutMs),
    retryFailedAfterHours: toInt(env.RETRY_FAILED_AFTER_HOURS, merged.retryFailedAfterHours),
    logLevel: parseLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
