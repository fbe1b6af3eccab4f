import crypto from "node:crypto";
import { AppConfig } from "../config";
import { FetchError } from "../core/errors";
import { createDefaultFetch, FetchFn, HttpResponse } from "../core/fetch";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { ArtifactRequest, PageSource } from "../crawl/types";

export interface FetchedPayload {
  bytes: Buffer;
  contentHash: string;
  contentType?: string;
  finalUrl: string;
  statusCode: number;
  attempts: number;
}

export interface ArtifactFetcher {
  /** Retrieves `locator`, or `request` on its behalf when the locator is not itself a URL to GET. */
  fetch(locator: string, request?: ArtifactRequest): Promise<FetchedPayload>;
}

interface FetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

interface RequestOptions {
  accept: string;
  timeoutMs: number;
  method?: ArtifactRequest["method"];
  headers?: Record<string, string>;
  body?: string;
}

type AttemptOutcome =
  | { type: "ok"; payload: Omit<FetchedPayload, "attempts"> }
  | { type: "retry"; reason: string; statusCode?: number }
  | { type: "forbidden" }
  | { type: "fail"; reason: string; statusCode: number };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function sha256Hex(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

export function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Single-resource retrieval with bounded retries. Only timeouts, connection
 * failures, truncated bodies, 408, 429 and 5xx are retried; a 403 gets exactly
 * one extra request under the fallback identity, outside the retry budget.
 */
export class HttpFetcher implements ArtifactFetcher, PageSource {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(deps: FetcherDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? createDefaultFetch(deps.config.ignoreHttpsErrors);
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  backoffDelayMs(attempt: number): number {
    return Math.min(this.config.retryBaseDelayMs * 2 ** (attempt - 1), this.config.maxRetryDelayMs);
  }

  async fetch(locator: string, request?: ArtifactRequest): Promise<FetchedPayload> {
    const stopTimer = this.metrics.startTimer("download_ms");
    try {
      const payload = await this.retrieve(request?.url ?? locator, {
        accept: "application/pdf,application/vnd.ms-excel,application/json,application/octet-stream,*/*",
        timeoutMs: this.config.downloadTimeoutMs,
        method: request?.method,
        headers: request?.headers,
        body: request?.body,
      });
      this.logger.debug("fetch_complete", { locator, attempts: payload.attempts, bytes: payload.bytes.length, durationMs: stopTimer() });
      return payload;
    } catch (error) {
      stopTimer();
      throw error;
    }
  }

  async fetchText(url: string): Promise<string> {
    const stopTimer = this.metrics.startTimer("page_fetch_ms");
    try {
      const payload = await this.retrieve(url, {
        accept: "text/html,application/xhtml+xml",
        timeoutMs: this.config.requestTimeoutMs,
      });
      this.metrics.incrementCounter("pages_fetched", 1);
      return payload.bytes.toString("utf-8");
    } finally {
      stopTimer();
    }
  }

  private async retrieve(url: string, options: RequestOptions): Promise<FetchedPayload> {
    let attempt = 0;
    let requests = 0;
    let userAgent = this.config.userAgent;
    let usedFallbackIdentity = false;

    while (true) {
      attempt += 1;
      requests += 1;
      await this.jitter();

      const outcome = await this.attempt(url, userAgent, options);

      if (outcome.type === "ok") {
        return { ...outcome.payload, attempts: requests };
      }

      if (outcome.type === "forbidden") {
        if (!usedFallbackIdentity) {
          usedFallbackIdentity = true;
          userAgent = this.config.fallbackUserAgent;
          attempt -= 1;
          this.logger.warn("fetch_forbidden_switch_identity", { url, attempt: requests });
          continue;
        }
        throw new FetchError(`HTTP 403 for ${url} (fallback identity also refused)`, {
          kind: "permanent",
          statusCode: 403,
          attempts: requests,
        });
      }

      if (outcome.type === "fail") {
        this.logger.warn("fetch_permanent_failure", { url, attempt: requests, statusCode: outcome.statusCode });
        throw new FetchError(`${outcome.reason} for ${url}`, {
          kind: "permanent",
          statusCode: outcome.statusCode,
          attempts: requests,
        });
      }

      if (attempt >= this.config.maxFetchAttempts) {
        this.logger.warn("fetch_retries_exhausted", { url, attempt: requests, reason: outcome.reason });
        throw new FetchError(`${outcome.reason} for ${url} after ${requests} attempts`, {
          kind: "transient",
          statusCode: outcome.statusCode,
          attempts: requests,
        });
      }

      const delayMs = this.backoffDelayMs(attempt);
      this.metrics.incrementCounter("fetch_retries", 1);
      this.logger.warn("fetch_attempt_retry", { url, attempt: requests, delayMs, reason: outcome.reason });
      await this.sleep(delayMs);
    }
  }

  private async attempt(url: string, userAgent: string, options: RequestOptions): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      let response: HttpResponse;
      try {
        response = await this.fetchFn(url, {
          method: options.method ?? "GET",
          headers: {
            accept: options.accept,
            ...options.headers,
            "user-agent": userAgent,
            "accept-language": this.config.acceptLanguage,
          },
          body: options.body,
          signal: controller.signal,
          redirect: "follow",
        });
      } catch (error) {
        return { type: "retry", reason: controller.signal.aborted ? `timeout after ${options.timeoutMs}ms` : errorMessage(error) };
      }

      if (response.status === 403) {
        return { type: "forbidden" };
      }
      if (!response.ok) {
        if (isRetriableStatus(response.status)) {
          return { type: "retry", reason: `HTTP ${response.status}`, statusCode: response.status };
        }
        return { type: "fail", reason: `HTTP ${response.status}`, statusCode: response.status };
      }

      let bytes: Buffer;
      try {
        bytes = Buffer.from(await response.arrayBuffer());
      } catch (error) {
        const reason = controller.signal.aborted ? `timeout after ${options.timeoutMs}ms` : errorMessage(error);
        return { type: "retry", reason: `body read failed: ${reason}`, statusCode: response.status };
      }

      const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
      if (Number.isFinite(declaredLength) && declaredLength !== bytes.length) {
        return {
          type: "retry",
          reason: `truncated body (${bytes.length} of ${declaredLength} bytes)`,
          statusCode: response.status,
        };
      }

      return {
        type: "ok",
        payload: {
          bytes,
          contentHash: sha256Hex(bytes),
          contentType: response.headers.get("content-type") ?? undefined,
          finalUrl: response.url || url,
          statusCode: response.status,
        },
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async jitter(): Promise<void> {
    const { minMs, maxMs } = this.config.requestJitter;
    if (maxMs <= 0) {
      return;
    }
    await this.sleep(Math.round(minMs + this.random() * (maxMs - minMs)));
  }
}
