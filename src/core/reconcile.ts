import { AppConfig, SourceDescriptor } from "../config";
import { discoverCandidates } from "../crawl";
import { Candidate, DiscoveryContext, DiscoveryResult } from "../crawl/types";
import { ArtifactFetcher, FetchedPayload } from "../download/fetcher";
import { writeFileAtomic } from "../download/storage";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { LedgerStore, ManifestEntry } from "../store";
import { FetchError } from "./errors";
import { disambiguatePath, resolveInStorage } from "./paths";

export type ReconcileState = "discovering" | "diffing" | "fetching" | "recording" | "done";

export type DiffReason =
  | "already_fetched"
  | "recent_error"
  | "missing_on_disk"
  | "unconfirmed_file"
  | "previous_error"
  | "forced"
  | "new"
  | "invalid_destination";

export type CandidateAction = "fetched" | "skipped" | "failed" | "planned";

export interface CandidateOutcome {
  remoteLocator: string;
  destinationPath: string;
  action: CandidateAction;
  reason: DiffReason;
  error?: string;
  statusCode?: number;
}

export interface SourceCounts {
  discovered: number;
  skipped: number;
  fetched: number;
  failed: number;
}

export interface SourceRunResult extends SourceCounts {
  source: string;
  group: string;
  strategy: SourceDescriptor["strategy"];
  planned: number;
  outcomes: CandidateOutcome[];
  warnings: string[];
  durationMs: number;
}

export interface ReconcileDeps {
  config: AppConfig;
  ledger: LedgerStore;
  fetcher: ArtifactFetcher;
  discovery: Omit<DiscoveryContext, "logger" | "now">;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
  discover?: (source: SourceDescriptor, ctx: DiscoveryContext) => Promise<DiscoveryResult>;
}

export interface ReconcileOptions {
  force?: boolean;
  dryRun?: boolean;
}

interface PlannedFetch {
  candidate: Candidate;
  reason: DiffReason;
}

const HOUR_MS = 60 * 60 * 1000;

function dedupeCandidates(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.remoteLocator)) {
      return false;
    }
    seen.add(candidate.remoteLocator);
    return true;
  });
}

/**
 * Discovering → Diffing → Fetching → Recording → Done for one source.
 * Candidate failures never fail the source; only ledger persistence errors escape.
 */
export async function reconcileSource(
  deps: ReconcileDeps,
  source: SourceDescriptor,
  options: ReconcileOptions = {},
): Promise<SourceRunResult> {
  const { config, ledger, fetcher, metrics } = deps;
  const logger = deps.logger.child(`reconcile:${source.name}`);
  const now = deps.now ?? (() => new Date());
  const discover = deps.discover ?? discoverCandidates;
  const startedAt = Date.now();
  const enter = (state: ReconcileState, fields: Record<string, unknown> = {}) =>
    logger.info("reconcile_state", { source: source.name, state, ...fields });

  // Discovering
  enter("discovering", { strategy: source.strategy });
  let discovery: DiscoveryResult;
  try {
    discovery = await discover(source, { ...deps.discovery, logger, now: now() });
  } catch (error) {
    const message = errorMessage(error);
    logger.warn("discovery_failed", { source: source.name, error: message });
    discovery = { candidates: [], warnings: [`discovery failed: ${message}`], pagesVisited: 0 };
  }
  const candidates = dedupeCandidates(discovery.candidates);
  metrics.incrementCounter("candidates_discovered", candidates.length);

  // Diffing
  enter("diffing", { discovered: candidates.length, pagesVisited: discovery.pagesVisited });
  const outcomes: CandidateOutcome[] = [];
  const toFetch: PlannedFetch[] = [];
  const pending: ManifestEntry[] = [];
  const diffTime = now().getTime();
  const destinations = assignDestinations(ledger, candidates);

  for (const discovered of candidates) {
    const candidate = { ...discovered, destinationPath: destinations.get(discovered.remoteLocator) ?? discovered.destinationPath };
    let reason: DiffReason;
    try {
      resolveInStorage(config.storageRoot, candidate.destinationPath);
      reason = diffCandidate(ledger, candidate, options.force ?? false, diffTime, config.retryFailedAfterHours);
    } catch (error) {
      const message = errorMessage(error);
      pending.push(errorEntry(source, candidate, ledger.get(candidate.remoteLocator), error, now()));
      outcomes.push({
        remoteLocator: candidate.remoteLocator,
        destinationPath: candidate.destinationPath,
        action: "failed",
        reason: "invalid_destination",
        error: message,
      });
      logger.warn("candidate_invalid_destination", { locator: candidate.remoteLocator, error: message });
      continue;
    }
    if (reason === "already_fetched" || reason === "recent_error") {
      outcomes.push({
        remoteLocator: candidate.remoteLocator,
        destinationPath: candidate.destinationPath,
        action: "skipped",
        reason,
      });
      continue;
    }
    toFetch.push({ candidate, reason });
  }
  const skipped = outcomes.filter((outcome) => outcome.action === "skipped").length;
  metrics.incrementCounter("candidates_skipped", skipped);

  // Fetching
  enter("fetching", { toFetch: toFetch.length, skipped });
  for (const { candidate, reason } of toFetch) {
    if (options.dryRun) {
      outcomes.push({
        remoteLocator: candidate.remoteLocator,
        destinationPath: candidate.destinationPath,
        action: "planned",
        reason,
      });
      continue;
    }

    const previous = ledger.get(candidate.remoteLocator);
    try {
      const payload = await fetcher.fetch(candidate.remoteLocator, candidate.request);
      await writeFileAtomic(resolveInStorage(config.storageRoot, candidate.destinationPath), payload.bytes);
      pending.push(successEntry(source, candidate, payload, now()));
      outcomes.push({
        remoteLocator: candidate.remoteLocator,
        destinationPath: candidate.destinationPath,
        action: "fetched",
        reason,
      });
      metrics.incrementCounter("fetch_ok", 1);

      if (previous?.contentHash && previous.contentHash !== payload.contentHash) {
        logger.info("content_changed", {
          locator: candidate.remoteLocator,
          previousHash: previous.contentHash,
          contentHash: payload.contentHash,
        });
      }
      logger.info("candidate_fetched", {
        locator: candidate.remoteLocator,
        destinationPath: candidate.destinationPath,
        reason,
        bytes: payload.bytes.length,
        attempts: payload.attempts,
      });
    } catch (error) {
      const message = errorMessage(error);
      const statusCode = error instanceof FetchError ? error.statusCode : undefined;
      pending.push(errorEntry(source, candidate, previous, error, now()));
      outcomes.push({
        remoteLocator: candidate.remoteLocator,
        destinationPath: candidate.destinationPath,
        action: "failed",
        reason,
        error: message,
        statusCode,
      });
      metrics.incrementCounter("fetch_failed", 1);
      logger.warn("candidate_failed", { locator: candidate.remoteLocator, reason, statusCode, error: message });
    }
  }

  // Recording
  enter("recording", { entries: pending.length });
  if (!options.dryRun) {
    for (const entry of pending) {
      ledger.record(entry);
    }
    for (const item of discovery.unavailable ?? []) {
      if (ledger.get(item.remoteLocator)?.status === "skipped") {
        continue;
      }
      ledger.record({
        remoteLocator: item.remoteLocator,
        localPath: null,
        contentHash: null,
        fetchedAt: now().toISOString(),
        status: "skipped",
        group: source.group,
        source: source.name,
        notes: item.reason,
      });
    }
    const written = await ledger.save();
    logger.debug("ledger_saved", { written, location: ledger.location });
  }

  // Outcomes are reported in discovery order regardless of which phase produced them.
  const position = new Map(candidates.map((candidate, index): [string, number] => [candidate.remoteLocator, index]));
  outcomes.sort((a, b) => (position.get(a.remoteLocator) ?? 0) - (position.get(b.remoteLocator) ?? 0));

  const result: SourceRunResult = {
    source: source.name,
    group: source.group,
    strategy: source.strategy,
    discovered: candidates.length,
    skipped: outcomes.filter((outcome) => outcome.action === "skipped").length,
    fetched: outcomes.filter((outcome) => outcome.action === "fetched").length,
    failed: outcomes.filter((outcome) => outcome.action === "failed").length,
    planned: outcomes.filter((outcome) => outcome.action === "planned").length,
    outcomes,
    warnings: discovery.warnings,
    durationMs: Date.now() - startedAt,
  };

  enter("done", {
    discovered: result.discovered,
    skipped: result.skipped,
    fetched: result.fetched,
    failed: result.failed,
    warnings: result.warnings.length,
  });
  return result;
}

/**
 * Gives every candidate a destination no other locator owns. Paths a locator
 * already owns in the ledger are kept first; a contested path gets a suffix
 * derived from the locator alone, so the assignment does not depend on order.
 */
export function assignDestinations(ledger: LedgerStore, candidates: Candidate[]): Map<string, string> {
  const assigned = new Map<string, string>();
  const claimed = new Map<string, string>();
  const claim = (locator: string, destinationPath: string) => {
    assigned.set(locator, destinationPath);
    claimed.set(destinationPath, locator);
  };

  for (const candidate of candidates) {
    if (ledger.ownerOf(candidate.destinationPath) === candidate.remoteLocator) {
      claim(candidate.remoteLocator, candidate.destinationPath);
    }
  }
  for (const candidate of candidates) {
    if (assigned.has(candidate.remoteLocator)) {
      continue;
    }
    const owner = ledger.ownerOf(candidate.destinationPath) ?? claimed.get(candidate.destinationPath);
    const destinationPath =
      owner !== undefined && owner !== candidate.remoteLocator
        ? disambiguatePath(candidate.destinationPath, candidate.remoteLocator)
        : candidate.destinationPath;
    claim(candidate.remoteLocator, destinationPath);
  }
  return assigned;
}

export function diffCandidate(
  ledger: LedgerStore,
  candidate: Candidate,
  force: boolean,
  nowMs: number,
  retryFailedAfterHours: number,
): DiffReason {
  if (force) {
    return "forced";
  }
  if (ledger.isAlreadyFetched(candidate.remoteLocator, candidate.destinationPath)) {
    return "already_fetched";
  }

  const entry = ledger.get(candidate.remoteLocator);
  if (entry?.status === "success") {
    return "missing_on_disk";
  }
  if (entry?.status === "error") {
    const failedAt = Date.parse(entry.fetchedAt);
    if (Number.isFinite(failedAt) && nowMs - failedAt < retryFailedAfterHours * HOUR_MS) {
      return "recent_error";
    }
    return "previous_error";
  }
  if (ledger.existsOnDisk(candidate.destinationPath)) {
    return "unconfirmed_file";
  }
  return "new";
}

function successEntry(source: SourceDescriptor, candidate: Candidate, payload: FetchedPayload, at: Date): ManifestEntry {
  const entry: ManifestEntry = {
    remoteLocator: candidate.remoteLocator,
    localPath: candidate.destinationPath,
    contentHash: payload.contentHash,
    fetchedAt: at.toISOString(),
    status: "success",
    group: source.group,
    source: source.name,
    bytes: payload.bytes.length,
    attempts: payload.attempts,
  };
  if (payload.contentType) {
    entry.contentType = payload.contentType;
  }
  if (candidate.title) {
    entry.notes = candidate.title;
  }
  return entry;
}

/** Keeps the last good hash and path so a later failure does not erase provenance. */
function errorEntry(
  source: SourceDescriptor,
  candidate: Candidate,
  previous: ManifestEntry | undefined,
  error: unknown,
  at: Date,
): ManifestEntry {
  const entry: ManifestEntry = {
    remoteLocator: candidate.remoteLocator,
    localPath: previous?.localPath ?? null,
    contentHash: previous?.contentHash ?? null,
    fetchedAt: at.toISOString(),
    status: "error",
    group: source.group,
    source: source.name,
    error: errorMessage(error),
  };
  if (error instanceof FetchError) {
    entry.attempts = error.attempts;
  }
  if (candidate.title) {
    entry.notes = candidate.title;
  }
  return entry;
}
