import { AppConfig, SourceDescriptor } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { Period } from "./periods";

/** How to retrieve a locator that is not a plain GET of itself. */
export interface ArtifactRequest {
  url: string;
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

/** A discovered (remote locator, destination path) pair. Never persisted. */
export interface Candidate {
  remoteLocator: string;
  destinationPath: string;
  request?: ArtifactRequest;
  title?: string;
  period?: Period;
  sourcePageUrl?: string;
}

/** Known remote artifact that cannot be retrieved automatically. */
export interface UnavailableArtifact {
  remoteLocator: string;
  reason: string;
}

export interface DiscoveryResult {
  candidates: Candidate[];
  warnings: string[];
  pagesVisited: number;
  unavailable?: UnavailableArtifact[];
}

export interface PageSource {
  fetchText(url: string): Promise<string>;
}

export interface RenderOptions {
  timeoutMs: number;
  waitForSelector?: string;
}

export interface Renderer {
  render(url: string, options: RenderOptions): Promise<string>;
  close(): Promise<void>;
}

export interface DiscoveryContext {
  config: AppConfig;
  pages: PageSource;
  renderer: Renderer;
  logger: Logger;
  metrics: MetricsRegistry;
  now: Date;
  /** Environment consulted for API keys; defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export type DiscoveryStrategy<S extends SourceDescriptor> = (source: S, ctx: DiscoveryContext) => Promise<DiscoveryResult>;
