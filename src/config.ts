import type { AdrStatus, RetryOptions } from "./types.js";

export const LIMITS = {
  numberWidth: 4, // zero padding in file names; wider numbers keep all digits
} as const;

export type Config = {
  toolName: string;
  defaultRelStorePath: string;
  indexFileName: string;
  seedTitle: string;
  defaultStatus: AdrStatus;
  createRetry: RetryOptions;
};

export const CONFIG: Config = {
  toolName: "adr",
  defaultRelStorePath: "docs/decisions",
  indexFileName: "README.md",
  seedTitle: "Use Architecture Decision Records",
  defaultStatus: "Proposed",
  createRetry: {
    maxAttempts: 5,
    retryDelayMs: 10,
    retryBackoff: 2,
    maxRetryDelayMs: 80,
  },
};

export const KNOWN_STATUSES: readonly AdrStatus[] = [
  "Proposed",
  "Accepted",
  "Deprecated",
  "Superseded",
];

export const ACTIVE_STATUSES = new Set<AdrStatus>(["Proposed", "Accepted"]);
export const RETIRED_STATUSES = new Set<AdrStatus>(["Deprecated", "Superseded"]);
