import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LedgerCorruptError } from "../core/errors";
import { writeFileAtomic } from "../download/storage";
import { BaseLedgerStore } from "./baseLedger";
import { ManifestEntry } from "./types";

export const LEDGER_FORMAT_VERSION = 1;

// Unknown keys are stripped, so ledgers written by newer versions still load.
const PersistedEntrySchema = z.object({
  local_path: z.string().nullable(),
  content_hash: z.string().nullable(),
  fetched_at: z.string(),
  status: z.enum(["success", "error", "skipped"]),
  group: z.string().optional(),
  source: z.string().optional(),
  bytes: z.number().int().nonnegative().optional(),
  content_type: z.string().optional(),
  notes: z.string().optional(),
  error: z.string().optional(),
  attempts: z.number().int().nonnegative().optional(),
});

const PersistedLedgerSchema = z.object({
  version: z.number().int().positive(),
  entries: z.record(z.string(), PersistedEntrySchema),
});

type PersistedEntry = z.infer<typeof PersistedEntrySchema>;

function toPersisted(entry: ManifestEntry): PersistedEntry {
  return {
    local_path: entry.localPath,
    content_hash: entry.contentHash,
    fetched_at: entry.fetchedAt,
    status: entry.status,
    group: entry.group,
    source: entry.source,
    bytes: entry.bytes,
    content_type: entry.contentType,
    notes: entry.notes,
    error: entry.error,
    attempts: entry.attempts,
  };
}

function fromPersisted(remoteLocator: string, persisted: PersistedEntry): ManifestEntry {
  const entry: ManifestEntry = {
    remoteLocator,
    localPath: persisted.local_path,
    contentHash: persisted.content_hash,
    fetchedAt: persisted.fetched_at,
    status: persisted.status,
  };
  if (persisted.group !== undefined) entry.group = persisted.group;
  if (persisted.source !== undefined) entry.source = persisted.source;
  if (persisted.bytes !== undefined) entry.bytes = persisted.bytes;
  if (persisted.content_type !== undefined) entry.contentType = persisted.content_type;
  if (persisted.notes !== undefined) entry.notes = persisted.notes;
  if (persisted.error !== undefined) entry.error = persisted.error;
  if (persisted.attempts !== undefined) entry.attempts = persisted.attempts;
  return entry;
}

/** `{ version, entries: { [remote_locator]: {...} } }` in a single JSON document. */
export class JsonLedgerStore extends BaseLedgerStore {
  readonly location: string;

  constructor(ledgerPath: string, storageRoot: string) {
    super(storageRoot);
    this.location = path.resolve(ledgerPath);
  }

  protected async readLedger(): Promise<ManifestEntry[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.location, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw new LedgerCorruptError(this.location, error instanceof Error ? error.message : String(error), error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new LedgerCorruptError(this.location, "invalid JSON", error);
    }

    const parsed = PersistedLedgerSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new LedgerCorruptError(this.location, `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    }
    if (parsed.data.version > LEDGER_FORMAT_VERSION) {
      throw new LedgerCorruptError(this.location, `unsupported ledger version ${parsed.data.version}`);
    }

    return Object.entries(parsed.data.entries).map(([locator, entry]) => fromPersisted(locator, entry));
  }

  protected async writeLedger(all: ManifestEntry[]): Promise<void> {
    const entries: Record<string, PersistedEntry> = {};
    for (const entry of all) {
      entries[entry.remoteLocator] = toPersisted(entry);
    }
    const document = { version: LEDGER_FORMAT_VERSION, entries };
    await writeFileAtomic(this.location, `${JSON.stringify(document, null, 2)}\n`);
  }
}
