export type FetchErrorKind = "transient" | "permanent";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly statusCode?: number;
  readonly attempts: number;

  constructor(message: string, options: { kind: FetchErrorKind; statusCode?: number; attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.kind = options.kind;
    this.statusCode = options.statusCode;
    this.attempts = options.attempts;
  }
}

/** Ledger exists but cannot be read or parsed. Fatal for the whole run. */
export class LedgerCorruptError extends Error {
  readonly ledgerPath: string;

  constructor(ledgerPath: string, reason: string, cause?: unknown) {
    super(`Ledger at ${ledgerPath} is unreadable: ${reason}`, { cause });
    this.name = "LedgerCorruptError";
    this.ledgerPath = ledgerPath;
  }
}

export class LedgerWriteError extends Error {
  readonly ledgerPath: string;

  constructor(ledgerPath: string, reason: string, cause?: unknown) {
    super(`Failed to persist ledger at ${ledgerPath}: ${reason}`, { cause });
    this.name = "LedgerWriteError";
    this.ledgerPath = ledgerPath;
  }
}

export class RegistryError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "RegistryError";
    this.issues = issues;
  }
}

/** A candidate destination that cannot be written under the storage root. Per candidate. */
export class DestinationError extends Error {
  readonly destinationPath: string;

  constructor(destinationPath: string, reason: string) {
    super(`Destination ${destinationPath} ${reason}`);
    this.name = "DestinationError";
    this.destinationPath = destinationPath;
  }
}

export class ChallengeTimeoutError extends Error {
  readonly pageUrl: string;

  constructor(pageUrl: string, timeoutMs: number) {
    super(`Challenge on ${pageUrl} not resolved within ${timeoutMs}ms`);
    this.name = "ChallengeTimeoutError";
    this.pageUrl = pageUrl;
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof LedgerCorruptError || error instanceof LedgerWriteError || error instanceof RegistryError;
}
