import { resolveInStorage } from "../core/paths";
import { LedgerWriteError } from "../core/errors";
import { isFile } from "../download/storage";
import { LedgerStats, LedgerStore, ManifestEntry } from "./types";

function sameEntry(a: ManifestEntry, b: ManifestEntry): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Holds the ledger as an ordered list plus a locator → position index and a
 * local path → locator index. Both are caches rebuilt from the list whenever
 * the position index disagrees with it.
 */
export abstract class BaseLedgerStore implements LedgerStore {
  abstract readonly location: string;

  private records: ManifestEntry[] = [];
  private index = new Map<string, number>();
  private owners = new Map<string, string>();
  private readonly changed = new Set<string>();
  private loaded = false;

  constructor(protected readonly storageRoot: string) {}

  protected abstract readLedger(): Promise<ManifestEntry[]>;
  protected abstract writeLedger(all: ManifestEntry[], changed: ManifestEntry[]): Promise<void>;

  async load(): Promise<void> {
    const records = await this.readLedger();
    this.records = [];
    for (const entry of records) {
      this.records.push({ ...entry });
    }
    this.changed.clear();
    this.rebuildIndex();
    this.loaded = true;
  }

  rebuildIndex(): void {
    const index = new Map<string, number>();
    const deduped: ManifestEntry[] = [];
    for (const entry of this.records) {
      const existing = index.get(entry.remoteLocator);
      if (existing !== undefined) {
        deduped[existing] = entry;
        continue;
      }
      index.set(entry.remoteLocator, deduped.length);
      deduped.push(entry);
    }
    this.records = deduped;
    this.index = index;
    this.owners = new Map();
    for (const entry of deduped) {
      if (entry.localPath) {
        this.owners.set(entry.localPath, entry.remoteLocator);
      }
    }
  }

  contains(remoteLocator: string): boolean {
    return this.position(remoteLocator) !== undefined;
  }

  get(remoteLocator: string): ManifestEntry | undefined {
    const position = this.position(remoteLocator);
    return position === undefined ? undefined : { ...this.records[position] };
  }

  record(entry: ManifestEntry): void {
    this.assertLoaded();
    const position = this.position(entry.remoteLocator);
    const copy = { ...entry };

    if (position === undefined) {
      this.index.set(copy.remoteLocator, this.records.length);
      this.records.push(copy);
      this.claimPath(copy);
      this.changed.add(copy.remoteLocator);
      return;
    }

    const previous = this.records[position];
    if (sameEntry(previous, copy)) {
      return;
    }
    if (previous.localPath && this.owners.get(previous.localPath) === previous.remoteLocator) {
      this.owners.delete(previous.localPath);
    }
    this.records[position] = copy;
    this.claimPath(copy);
    this.changed.add(copy.remoteLocator);
  }

  ownerOf(localPath: string): string | undefined {
    if (this.index.size !== this.records.length) {
      this.rebuildIndex();
    }
    return this.owners.get(localPath);
  }

  existsOnDisk(localPath: string): boolean {
    return isFile(resolveInStorage(this.storageRoot, localPath));
  }

  isAlreadyFetched(remoteLocator: string, localPath: string): boolean {
    const entry = this.get(remoteLocator);
    return entry?.status === "success" && this.existsOnDisk(localPath);
  }

  entries(): ManifestEntry[] {
    return this.records.map((entry) => ({ ...entry }));
  }

  stats(): LedgerStats {
    const stats: LedgerStats = { total: 0, success: 0, error: 0, skipped: 0, byGroup: {} };
    for (const entry of this.records) {
      stats.total += 1;
      stats[entry.status] += 1;
      if (entry.status === "success") {
        const group = entry.group ?? "(none)";
        stats.byGroup[group] = (stats.byGroup[group] ?? 0) + 1;
      }
    }
    return stats;
  }

  async save(): Promise<boolean> {
    this.assertLoaded();
    if (this.changed.size === 0) {
      return false;
    }

    const changed = this.records.filter((entry) => this.changed.has(entry.remoteLocator));
    try {
      await this.writeLedger(this.entries(), changed);
    } catch (error) {
      if (error instanceof LedgerWriteError) {
        throw error;
      }
      throw new LedgerWriteError(this.location, error instanceof Error ? error.message : String(error), error);
    }
    this.changed.clear();
    return true;
  }

  async close(): Promise<void> {
    return;
  }

  private position(remoteLocator: string): number | undefined {
    const position = this.index.get(remoteLocator);
    if (position !== undefined && this.records[position]?.remoteLocator === remoteLocator) {
      return position;
    }
    if (position !== undefined || this.index.size !== this.records.length) {
      this.rebuildIndex();
      return this.index.get(remoteLocator);
    }
    return undefined;
  }

  private claimPath(entry: ManifestEntry): void {
    if (entry.localPath) {
      this.owners.set(entry.localPath, entry.remoteLocator);
    }
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new Error(`Ledger ${this.location} used before load()`);
    }
  }
}
