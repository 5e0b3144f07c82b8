export type AdrStatus = "Proposed" | "Accepted" | "Deprecated" | "Superseded";

export type RecordStatus =
  | { kind: "known"; value: AdrStatus; supersededBy?: number }
  | { kind: "custom"; value: string };

export interface RecordSection {
  heading: string;
  headingLine: string;
  lines: string[];
}

export interface RecordDocument {
  preamble: string[];
  sections: RecordSection[];
}

export interface RecordFields {
  title?: string;
  date?: string;
  status?: RecordStatus;
}

export interface RecordFile {
  number: number;
  fileName: string;
  filePath: string;
}

export interface RecordSummary extends RecordFile {
  title: string;
  date: string;
  status: RecordStatus | null;
  statusLabel: string;
}

export interface CreateResult extends RecordFile {
  status: RecordStatus;
}

export interface InitResult {
  storeDir: string;
  createdDir: boolean;
  seedFile?: string;
  indexFile?: string;
}

export interface IndexResult {
  indexFile: string;
  active: number;
  deprecated: number;
  omitted: number;
}

export interface UpdateResult extends RecordFile {
  status: RecordStatus;
  previous: RecordStatus | null;
}

export interface RetryOptions {
  maxAttempts: number;
  retryDelayMs: number;
  retryBackoff: number;
  maxRetryDelayMs: number;
}

export interface StoreOptions {
  now?: () => Date;
  retry?: Partial<RetryOptions>;
}
