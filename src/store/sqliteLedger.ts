import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { LedgerCorruptError } from "../core/errors";
import { BaseLedgerStore } from "./baseLedger";
import { EntryStatus, ManifestEntry } from "./types";

type EntryRow = {
  remoteLocator: string;
  position: number;
  localPath: string | null;
  contentHash: string | null;
  fetchedAt: string;
  status: string;
  groupName: string | null;
  sourceName: string | null;
  bytes: number | null;
  contentType: string | null;
  notes: string | null;
  error: string | null;
  attempts: number | null;
};

function toStatus(value: string, ledgerPath: string): EntryStatus {
  if (value === "success" || value === "error" || value === "skipped") {
    return value;
  }
  throw new LedgerCorruptError(ledgerPath, `unknown entry status "${value}"`);
}

function fromRow(row: EntryRow, ledgerPath: string): ManifestEntry {
  const entry: ManifestEntry = {
    remoteLocator: row.remoteLocator,
    localPath: row.localPath,
    contentHash: row.contentHash,
    fetchedAt: row.fetchedAt,
    status: toStatus(row.status, ledgerPath),
  };
  if (row.groupName !== null) entry.group = row.groupName;
  if (row.sourceName !== null) entry.source = row.sourceName;
  if (row.bytes !== null) entry.bytes = row.bytes;
  if (row.contentType !== null) entry.contentType = row.contentType;
  if (row.notes !== null) entry.notes = row.notes;
  if (row.error !== null) entry.error = row.error;
  if (row.attempts !== null) entry.attempts = row.attempts;
  return entry;
}

/** Same ledger semantics as the JSON file; each save is a single transaction. */
export class SqliteLedgerStore extends BaseLedgerStore {
  readonly location: string;
  private db: Database.Database | undefined;

  constructor(dbPath: string, storageRoot: string) {
    super(storageRoot);
    this.location = path.resolve(dbPath);
  }

  protected async readLedger(): Promise<ManifestEntry[]> {
    const db = this.open();
    try {
      const rows = db
        .prepare<[], EntryRow>(
          `
          SELECT
            remoteLocator, position, localPath, contentHash, fetchedAt, status,
            groupName, sourceName, bytes, contentType, notes, error, attempts
          FROM manifest_entries
          ORDER BY position ASC
        `,
        )
        .all();
      return rows.map((row) => fromRow(row, this.location));
    } catch (error) {
      if (error instanceof LedgerCorruptError) {
        throw error;
      }
      throw new LedgerCorruptError(this.location, error instanceof Error ? error.message : String(error), error);
    }
  }

  protected async writeLedger(all: ManifestEntry[], changed: ManifestEntry[]): Promise<void> {
    const db = this.open();
    const positions = new Map(all.map((entry, position): [string, number] => [entry.remoteLocator, position]));
    const statement = db.prepare<[EntryRow]>(`
      INSERT INTO manifest_entries (
        remoteLocator, position, localPath, contentHash, fetchedAt, status,
        groupName, sourceName, bytes, contentType, notes, error, attempts
      )
      VALUES (
        @remoteLocator, @position, @localPath, @contentHash, @fetchedAt, @status,
        @groupName, @sourceName, @bytes, @contentType, @notes, @error, @attempts
      )
      ON CONFLICT(remoteLocator) DO UPDATE SET
        localPath = excluded.localPath,
        contentHash = excluded.contentHash,
        fetchedAt = excluded.fetchedAt,
        status = excluded.status,
        groupName = excluded.groupName,
        sourceName = excluded.sourceName,
        bytes = excluded.bytes,
        contentType = excluded.contentType,
        notes = excluded.notes,
        error = excluded.error,
        attempts = excluded.attempts
    `);

    const upsertAll = db.transaction((entries: ManifestEntry[]) => {
      for (const entry of entries) {
        statement.run({
          remoteLocator: entry.remoteLocator,
          position: positions.get(entry.remoteLocator) ?? all.length,
          localPath: entry.localPath,
          contentHash: entry.contentHash,
          fetchedAt: entry.fetchedAt,
          status: entry.status,
          groupName: entry.group ?? null,
          sourceName: entry.source ?? null,
          bytes: entry.bytes ?? null,
          contentType: entry.contentType ?? null,
          notes: entry.notes ?? null,
          error: entry.error ?? null,
          attempts: entry.attempts ?? null,
        });
      }
    });
    upsertAll(changed);
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = undefined;
  }

  private open(): Database.Database {
    if (this.db) {
      return this.db;
    }

    try {
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
      const db = new Database(this.location);
      db.pragma("journal_mode = WAL");
      this.initializeSchema(db);
      this.db = db;
      return db;
    } catch (error) {
      throw new LedgerCorruptError(this.location, error instanceof Error ? error.message : String(error), error);
    }
  }

  private initializeSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS manifest_entries (
        remoteLocator TEXT PRIMARY KEY,
        position INTEGER NOT NULL,
        localPath TEXT NULL,
        contentHash TEXT NULL,
        fetchedAt TEXT NOT NULL,
        status TEXT NOT NULL,
        groupName TEXT NULL,
        sourceName TEXT NULL,
        bytes INTEGER NULL,
        contentType TEXT NULL,
        notes TEXT NULL,
        error TEXT NULL,
        attempts INTEGER NULL
      );

      CREATE INDEX IF NOT EXISTS idx_manifest_entries_status ON manifest_entries(status);
      CREATE INDEX IF NOT EXISTS idx_manifest_entries_position ON manifest_entries(position);
    `);

    this.ensureColumn(db, "manifest_entries", "attempts", "INTEGER NULL");
  }

  private ensureColumn(db: Database.Database, tableName: string, columnName: string, definition: string): void {
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${tableName})`).all();
    if (columns.some((column) => column.name === columnName)) {
      return;
    }

    db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
