import path from "node:path";
import { AppConfig } from "../config";
import { JsonLedgerStore } from "./jsonLedger";
import { SqliteLedgerStore } from "./sqliteLedger";
import { LedgerStore } from "./types";

export function defaultLedgerPath(config: AppConfig): string {
  if (config.ledgerPath) {
    return config.ledgerPath;
  }
  return path.join(config.storageRoot, config.ledgerMode === "sqlite" ? "_manifest.sqlite" : "_manifest.json");
}

export function createLedger(config: AppConfig): LedgerStore {
  const ledgerPath = defaultLedgerPath(config);
  if (config.ledgerMode === "sqlite") {
    return new SqliteLedgerStore(ledgerPath, config.storageRoot);
  }
  return new JsonLedgerStore(ledgerPath, config.storageRoot);
}

export { BaseLedgerStore } from "./baseLedger";
export { JsonLedgerStore, LEDGER_FORMAT_VERSION } from "./jsonLedger";
export { SqliteLedgerStore } from "./sqliteLedger";
export type { EntryStatus, LedgerStats, LedgerStore, ManifestEntry } from "./types";
