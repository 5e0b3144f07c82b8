import { KNOWN_STATUSES, LIMITS } from "./config.js";
import { InvalidInputError } from "./errors.js";
import type { RecordStatus } from "./types.js";

export const RECORD_FILE_PATTERN = /^(\d{4,})-.*\.md$/;

export function padNumber(n: number): string {
  return String(n).padStart(LIMITS.numberWidth, "0");
}

export function recordFileName(n: number, slug: string): string {
  return `${padNumber(n)}-${slug}.md`;
}

/** Record number encoded in a file name, or null for non-record files. */
export function parseRecordFileName(fileName: string): number | null {
  const match = RECORD_FILE_PATTERN.exec(fileName);
  if (!match) return null;
  // base 10: "0010" is ten
  const n = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

/** Accepts "5" and "0005" alike. */
export function parseRecordNumber(raw: string | number): number {
  const text = String(raw).trim();
  if (!/^\d+$/.test(text)) {
    throw new InvalidInputError(`Invalid ADR number: "${text}"`);
  }
  const n = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidInputError(`Invalid ADR number: "${text}"`);
  }
  return n;
}

export function validateTitle(title: unknown): string {
  const t = String(title ?? "").replace(/\s+/g, " ").trim();
  if (!t) {
    throw new InvalidInputError("Title is required");
  }
  return t;
}

export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .trim()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9-]/g, "");
  if (!slug) {
    throw new InvalidInputError(
      `Title "${title}" has no letters or digits to build a file name from`,
    );
  }
  return slug;
}

/**
 * Parses a status as typed on the command line. The four known values
 * match case-insensitively; anything else becomes a custom status.
 */
export function parseStatusInput(raw: unknown): RecordStatus {
  const text = String(raw ?? "").trim();
  if (!text) {
    throw new InvalidInputError("Status is required");
  }
  const known = KNOWN_STATUSES.find((s) => s.toLowerCase() === text.toLowerCase());
  return known ? { kind: "known", value: known } : { kind: "custom", value: text };
}

export function statusLabel(status: RecordStatus | null): string {
  if (!status) return "unknown";
  if (status.kind === "known" && status.value === "Superseded" && status.supersededBy) {
    return `Superseded by ADR-${padNumber(status.supersededBy)}`;
  }
  return status.value;
}
