import path from "node:path";
import { AppConfig, SourceDescriptor, SourceRegistry } from "../config";
import { DiscoveryContext } from "../crawl/types";
import { ArtifactFetcher } from "../download/fetcher";
import { hashFile, isFile, writeFileAtomic } from "../download/storage";
import { Logger, MetricsRegistry, MetricsSnapshot } from "../observability";
import { LedgerStats, LedgerStore } from "../store";
import { RegistryError } from "./errors";
import { resolveInStorage } from "./paths";
import { reconcileSource, ReconcileOptions, SourceCounts, SourceRunResult } from "./reconcile";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  ledger: LedgerStore;
  fetcher: ArtifactFetcher;
  discovery: Omit<DiscoveryContext, "logger" | "now">;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
}

export interface RunOptions extends ReconcileOptions {
  only?: string[];
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  totals: SourceCounts & { sources: number; warnings: number };
  sources: SourceRunResult[];
  metrics: MetricsSnapshot;
}

export interface VerifyReport {
  checked: number;
  ok: number;
  missing: string[];
  mismatched: string[];
}

export function selectSources(registry: SourceRegistry, only?: string[]): SourceDescriptor[] {
  if (!only || only.length === 0) {
    return registry.sources.filter((source) => source.enabled);
  }

  const known = new Set(registry.sources.map((source) => source.name));
  const unknown = only.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new RegistryError(`Unknown source name(s): ${unknown.join(", ")}`);
  }
  const wanted = new Set(only);
  return registry.sources.filter((source) => wanted.has(source.name));
}

function sumCounts(results: SourceRunResult[]): RunSummary["totals"] {
  return results.reduce(
    (totals, result) => ({
      sources: totals.sources + 1,
      discovered: totals.discovered + result.discovered,
      skipped: totals.skipped + result.skipped,
      fetched: totals.fetched + result.fetched,
      failed: totals.failed + result.failed,
      warnings: totals.warnings + result.warnings.length,
    }),
    { sources: 0, discovered: 0, skipped: 0, fetched: 0, failed: 0, warnings: 0 },
  );
}

/**
 * Loads the ledger (fatal if corrupt), then reconciles sources one at a time
 * in registry order. The ledger is persisted after every source.
 */
export async function runSources(ctx: CommandContext, registry: SourceRegistry, options: RunOptions = {}): Promise<RunSummary> {
  const now = ctx.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const sources = selectSources(registry, options.only);

  await ctx.ledger.load();
  ctx.logger.info("run_start", {
    sources: sources.length,
    ledger: ctx.ledger.location,
    knownEntries: ctx.ledger.stats().total,
    dryRun: options.dryRun ?? false,
    force: options.force ?? false,
  });

  const results: SourceRunResult[] = [];
  for (const source of sources) {
    const result = await reconcileSource(
      {
        config: ctx.config,
        ledger: ctx.ledger,
        fetcher: ctx.fetcher,
        discovery: ctx.discovery,
        logger: ctx.logger,
        metrics: ctx.metrics,
        now,
      },
      source,
      { force: options.force, dryRun: options.dryRun },
    );
    results.push(result);
  }

  const summary: RunSummary = {
    runId: ctx.runId,
    startedAt,
    finishedAt: now().toISOString(),
    dryRun: options.dryRun ?? false,
    totals: sumCounts(results),
    sources: results,
    metrics: ctx.metrics.snapshot(),
  };
  ctx.logger.info("run_complete", { ...summary.totals });
  return summary;
}

export async function writeRunSummary(summary: RunSummary, dir: string): Promise<string> {
  const filePath = path.resolve(dir, `run_${summary.runId}.json`);
  await writeFileAtomic(filePath, `${JSON.stringify(summary, null, 2)}\n`);
  return filePath;
}

export function formatRunSummary(summary: RunSummary): string {
  const lines = [`Run ${summary.runId}${summary.dryRun ? " (dry run)" : ""}`];
  for (const result of summary.sources) {
    const planned = summary.dryRun ? ` planned=${result.planned}` : "";
    lines.push(
      `  ${result.source} [${result.strategy}] discovered=${result.discovered} skipped=${result.skipped} fetched=${result.fetched} failed=${result.failed}${planned}`,
    );
    for (const outcome of result.outcomes.filter((item) => item.action === "failed")) {
      lines.push(`    failed ${outcome.remoteLocator}: ${outcome.error ?? "unknown error"}`);
    }
    for (const warning of result.warnings) {
      lines.push(`    warning ${warning}`);
    }
  }
  const { totals } = summary;
  lines.push(
    `Totals: sources=${totals.sources} discovered=${totals.discovered} skipped=${totals.skipped} fetched=${totals.fetched} failed=${totals.failed} warnings=${totals.warnings}`,
  );
  return lines.join("\n");
}

export async function runStatus(ctx: Pick<CommandContext, "ledger" | "logger">): Promise<LedgerStats> {
  await ctx.ledger.load();
  const stats = ctx.ledger.stats();
  ctx.logger.info("status_complete", { ledger: ctx.ledger.location, stats });
  return stats;
}

/** Re-hashes every successful artifact on disk against its recorded digest. */
export async function runVerify(ctx: Pick<CommandContext, "ledger" | "logger" | "config">): Promise<VerifyReport> {
  await ctx.ledger.load();
  const report: VerifyReport = { checked: 0, ok: 0, missing: [], mismatched: [] };

  for (const entry of ctx.ledger.entries()) {
    if (entry.status !== "success" || !entry.localPath) {
      continue;
    }
    report.checked += 1;
    const filePath = resolveInStorage(ctx.config.storageRoot, entry.localPath);
    if (!isFile(filePath)) {
      report.missing.push(entry.localPath);
      ctx.logger.warn("verify_missing", { locator: entry.remoteLocator, localPath: entry.localPath });
      continue;
    }
    const digest = await hashFile(filePath);
    if (digest !== entry.contentHash) {
      report.mismatched.push(entry.localPath);
      ctx.logger.warn("verify_hash_mismatch", { locator: entry.remoteLocator, localPath: entry.localPath });
      continue;
    }
    report.ok += 1;
  }

  ctx.logger.info("verify_complete", {
    checked: report.checked,
    ok: report.ok,
    missing: report.missing.length,
    mismatched: report.mismatched.length,
  });
  return report;
}
