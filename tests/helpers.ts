import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG } from "../src/config";
import { FetchFn } from "../src/core/fetch";
import { DiscoveryContext, PageSource, Renderer, RenderOptions } from "../src/crawl/types";
import { Logger, MetricsRegistry } from "../src/observability";

export const FIXTURES_DIR = path.resolve(__dirname, "../fixtures");
export const RUN_DATE = new Date("2026-10-18T00:00:00.000Z");

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, name), "utf-8");
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "delta-harvester-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(storageRoot: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    storageRoot,
    runSummaryDir: path.join(storageRoot, "runs"),
    requestJitter: { minMs: 0, maxMs: 0 },
    logLevel: "error",
    ...overrides,
  };
}

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test", minLevel: "error" });
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export type Reply = () => Response;

/**
 * In-process stand-in for the network. Each URL maps to one reply or a
 * sequence of replies (the last one repeats); unknown URLs answer 404.
 */
export function createFakeFetch(routes: Record<string, Reply | Reply[]>): { fetchFn: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const served = new Map<string, number>();

  const fetchFn: FetchFn = async (url, init) => {
    requests.push({ url, method: init.method, headers: init.headers, body: init.body });
    const route = routes[url];
    if (!route) {
      return new Response("not found", { status: 404 });
    }
    if (!Array.isArray(route)) {
      return route();
    }
    const index = served.get(url) ?? 0;
    served.set(url, index + 1);
    return route[Math.min(index, route.length - 1)]();
  };

  return { fetchFn, requests };
}

export function html(body: string): Reply {
  return () => new Response(body, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function bytes(body: string, contentType = "application/pdf"): Reply {
  return () => new Response(body, { status: 200, headers: { "content-type": contentType } });
}

export function status(code: number): Reply {
  return () => new Response(`status ${code}`, { status: code });
}

/** PageSource backed by a URL → HTML map; unknown URLs reject. */
export class StaticPages implements PageSource {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchText(url: string): Promise<string> {
    this.requested.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new Error(`HTTP 404 for ${url}`);
    }
    return page;
  }
}

export class StubRenderer implements Renderer {
  readonly calls: Array<{ url: string; options: RenderOptions }> = [];
  closed = false;

  constructor(private readonly result: string | Error) {}

  async render(url: string, options: RenderOptions): Promise<string> {
    this.calls.push({ url, options });
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function discoveryContext(
  config: AppConfig,
  pages: PageSource,
  renderer: Renderer = new StubRenderer(new Error("renderer not expected")),
): DiscoveryContext {
  return {
    config,
    pages,
    renderer,
    logger: quietLogger(),
    metrics: new MetricsRegistry(),
    now: RUN_DATE,
  };
}
