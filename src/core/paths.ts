import crypto from "node:crypto";
import path from "node:path";
import { DestinationError } from "./errors";

export interface PeriodLike {
  year: number;
  month: number;
}

const UNSAFE_SEGMENT_CHARS = /[<>:"|?*\u0000-\u001f\\/]/g;

export function sanitizeSegment(value: string): string {
  const cleaned = value.replace(UNSAFE_SEGMENT_CHARS, "_").replace(/\s+/g, " ").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") {
    return "_";
  }
  return cleaned;
}

function splitSegments(value: string): string[] {
  return value
    .split(/[\\/]+/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(sanitizeSegment);
}

/**
 * Storage-root-relative destination for an artifact, always posix separated.
 * Consecutive identical segments collapse, so `WARN/WARN/x.pdf` can never be produced.
 */
export function buildDestinationPath(group: string, period: string | undefined, filename: string): string {
  const segments = [...splitSegments(group), ...(period ? splitSegments(period) : []), sanitizeSegment(filename)];
  const collapsed: string[] = [];
  for (const segment of segments) {
    if (collapsed.length > 0 && collapsed[collapsed.length - 1].toLowerCase() === segment.toLowerCase()) {
      continue;
    }
    collapsed.push(segment);
  }
  return collapsed.join("/");
}

/** Appends `__<8 hex of sha256(locator)>` before the extension; depends on the locator alone. */
export function disambiguatePath(destinationPath: string, locator: string): string {
  const suffix = crypto.createHash("sha256").update(locator).digest("hex").slice(0, 8);
  const ext = path.posix.extname(destinationPath);
  return `${destinationPath.slice(0, destinationPath.length - ext.length)}__${suffix}${ext}`;
}

export function extensionFromUrl(url: string): string | undefined {
  try {
    const ext = path.posix.extname(new URL(url).pathname).toLowerCase();
    return ext.length > 1 ? ext : undefined;
  } catch {
    return undefined;
  }
}

export function filenameFromUrl(url: string): string | undefined {
  try {
    const base = path.posix.basename(new URL(url).pathname);
    if (!base || base === "/") {
      return undefined;
    }
    return decodeURIComponent(base);
  } catch {
    return undefined;
  }
}

export function formatYearMonth(period: PeriodLike | undefined): string {
  if (!period) {
    return "unknown";
  }
  return `${period.year}${String(period.month).padStart(2, "0")}`;
}

/** Name for a locator whose URL path carries no file name. */
export function fallbackFilename(group: string, url: string, period?: PeriodLike): string {
  const prefix = splitSegments(group).join("_") || "artifact";
  return `${prefix}_${formatYearMonth(period)}${extensionFromUrl(url) ?? ".bin"}`;
}

export function resolveInStorage(storageRoot: string, relativePath: string): string {
  const root = path.resolve(storageRoot);
  const resolved = path.resolve(root, relativePath);
  if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) {
    throw new DestinationError(relativePath, `escapes storage root ${root}`);
  }
  return resolved;
}
