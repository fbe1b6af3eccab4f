export type EntryStatus = "success" | "error" | "skipped";

/** One retrieved (or deliberately skipped) artifact, keyed by its remote locator. */
export interface ManifestEntry {
  remoteLocator: string;
  localPath: string | null;
  contentHash: string | null;
  fetchedAt: string;
  status: EntryStatus;
  group?: string;
  source?: string;
  bytes?: number;
  contentType?: string;
  notes?: string;
  error?: string;
  attempts?: number;
}

export interface LedgerStats {
  total: number;
  success: number;
  error: number;
  skipped: number;
  byGroup: Record<string, number>;
}

export interface LedgerStore {
  /** Where the ledger lives, for log lines and error messages. */
  readonly location: string;
  load(): Promise<void>;
  contains(remoteLocator: string): boolean;
  get(remoteLocator: string): ManifestEntry | undefined;
  record(entry: ManifestEntry): void;
  existsOnDisk(localPath: string): boolean;
  isAlreadyFetched(remoteLocator: string, localPath: string): boolean;
  /** Locator whose entry records `localPath`, if any. */
  ownerOf(localPath: string): string | undefined;
  entries(): ManifestEntry[];
  stats(): LedgerStats;
  rebuildIndex(): void;
  /** Persists pending changes; resolves false when there was nothing to write. */
  save(): Promise<boolean>;
  close(): Promise<void>;
}
