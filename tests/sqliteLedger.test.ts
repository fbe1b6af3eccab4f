import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LedgerCorruptError } from "../src/core/errors";
import { SqliteLedgerStore } from "../src/store";
import { makeTempDir, removeDir } from "./helpers";

describe("SqliteLedgerStore", () => {
  let root: string;
  let dbPath: string;

  beforeEach(() => {
    root = makeTempDir();
    dbPath = path.join(root, "_manifest.sqlite");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("round-trips entries in recording order", async () => {
    const ledger = new SqliteLedgerStore(dbPath, root);
    await ledger.load();
    ledger.record({
      remoteLocator: "https://x.example.gov/b.pdf",
      localPath: "WARN/b.pdf",
      contentHash: "hash-b",
      fetchedAt: "2026-10-01T00:00:00.000Z",
      status: "success",
      group: "WARN",
      attempts: 2,
    });
    ledger.record({
      remoteLocator: "https://x.example.gov/a.pdf",
      localPath: null,
      contentHash: null,
      fetchedAt: "2026-10-01T00:00:01.000Z",
      status: "error",
      error: "HTTP 404 for https://x.example.gov/a.pdf",
      attempts: 1,
    });
    await expect(ledger.save()).resolves.toBe(true);
    await ledger.close();

    const reloaded = new SqliteLedgerStore(dbPath, root);
    await reloaded.load();
    expect(reloaded.entries()).toEqual([
      {
        remoteLocator: "https://x.example.gov/b.pdf",
        localPath: "WARN/b.pdf",
        contentHash: "hash-b",
        fetchedAt: "2026-10-01T00:00:00.000Z",
        status: "success",
        group: "WARN",
        attempts: 2,
      },
      {
        remoteLocator: "https://x.example.gov/a.pdf",
        localPath: null,
        contentHash: null,
        fetchedAt: "2026-10-01T00:00:01.000Z",
        status: "error",
        error: "HTTP 404 for https://x.example.gov/a.pdf",
        attempts: 1,
      },
    ]);
    await expect(reloaded.save()).resolves.toBe(false);
    await reloaded.close();
  });

  it("updates an existing locator in place", async () => {
    const ledger = new SqliteLedgerStore(dbPath, root);
    await ledger.load();
    const entry = {
      remoteLocator: "https://x.example.gov/a.pdf",
      localPath: "DOL/a.pdf",
      contentHash: "hash-1",
      fetchedAt: "2026-10-01T00:00:00.000Z",
      status: "success" as const,
    };
    ledger.record(entry);
    await ledger.save();
    ledger.record({ ...entry, contentHash: "hash-2" });
    await ledger.save();
    await ledger.close();

    const reloaded = new SqliteLedgerStore(dbPath, root);
    await reloaded.load();
    expect(reloaded.entries().map((item) => item.contentHash)).toEqual(["hash-2"]);
    await reloaded.close();
  });

  it("treats an unreadable database as corrupt", async () => {
    fs.writeFileSync(dbPath, "this is definitely not a sqlite database file, just plain text padding it out");
    const ledger = new SqliteLedgerStore(dbPath, root);

    await expect(ledger.load()).rejects.toBeInstanceOf(LedgerCorruptError);
  });
});
