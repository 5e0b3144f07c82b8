import path from "node:path";

import { CONFIG, ACTIVE_STATUSES, RETIRED_STATUSES } from "./config.js";
import {
  parseStatusInput,
  recordFileName,
  slugify,
  statusLabel,
  validateTitle,
} from "./domain.js";
import {
  parseRecordDocument,
  readRecordFields,
  serializeRecordDocument,
  setSectionBody,
} from "./document.js";
import { ConcurrentModificationError, InvalidInputError, NotFoundError } from "./errors.js";
import { sleep, todayIso } from "./runtime.js";
import {
  assertStoreDir,
  atomicWriteFile,
  createExclusive,
  ensureDir,
  listRecordFiles,
  maxRecordNumber,
  readText,
  removeFile,
} from "./storage.js";
import { renderIndex, renderNewRecord, renderSeedRecord, renderSupersededStatus } from "./templates.js";
import type {
  CreateResult,
  IndexResult,
  InitResult,
  RecordFile,
  RecordStatus,
  RecordSummary,
  RetryOptions,
  StoreOptions,
  UpdateResult,
} from "./types.js";

const UNKNOWN = "unknown";

function clock(options: StoreOptions): Date {
  return options.now ? options.now() : new Date();
}

export function indexPath(storeDir: string): string {
  return path.join(storeDir, CONFIG.indexFileName);
}

/**
 * Creates the directory, the seed record and an empty index. A directory
 * that already holds a record is left untouched; no existing file is
 * ever overwritten.
 */
export async function initStore(storeDir: string, options: StoreOptions = {}): Promise<InitResult> {
  const createdDir = await ensureDir(storeDir);
  const result: InitResult = { storeDir, createdDir };

  const existing = await listRecordFiles(storeDir);
  if (existing.length > 0) {
    return result;
  }

  const index = indexPath(storeDir);
  if (await createExclusive(index, renderIndex([], []))) {
    result.indexFile = index;
  }

  const seedPath = path.join(storeDir, recordFileName(1, slugify(CONFIG.seedTitle)));
  const seed = renderSeedRecord({
    number: 1,
    title: CONFIG.seedTitle,
    date: todayIso(clock(options)),
    statusLines: ["Accepted"],
  });
  if (await createExclusive(seedPath, seed)) {
    result.seedFile = seedPath;
  }

  return result;
}

/** True when no file other than `fileName` carries `number`. */
async function ownsNumber(storeDir: string, number: number, fileName: string): Promise<boolean> {
  const files = await listRecordFiles(storeDir);
  return files.every((f) => f.number !== number || f.fileName === fileName);
}

/**
 * Adds a record numbered one past the highest in the store.
 *
 * The file is created with an exclusive open, then the directory is read
 * again: if another writer produced a file with the same number in the
 * meantime, this writer removes its own file and retries from a fresh scan.
 * A writer therefore keeps a number only when it saw no rival after its
 * own file existed.
 */
export async function createRecord(
  storeDir: string,
  title: string,
  status: string = CONFIG.defaultStatus,
  options: StoreOptions = {},
): Promise<CreateResult> {
  const cleanTitle = validateTitle(title);
  const parsedStatus = parseStatusInput(status);
  const slug = slugify(cleanTitle);

  await initStore(storeDir, options);

  const retry: RetryOptions = { ...CONFIG.createRetry, ...options.retry };
  const date = todayIso(clock(options));
  let delay = retry.retryDelayMs;

  for (let attempt = 1; attempt <= retry.maxAttempts; attempt += 1) {
    const number = (await maxRecordNumber(storeDir)) + 1;
    const fileName = recordFileName(number, slug);
    const filePath = path.join(storeDir, fileName);
    const content = renderNewRecord({
      number,
      title: cleanTitle,
      date,
      statusLines: [statusLabel(parsedStatus)],
    });

    if (await createExclusive(filePath, content)) {
      if (await ownsNumber(storeDir, number, fileName)) {
        return { number, fileName, filePath, status: parsedStatus };
      }
      await removeFile(filePath);
    }

    if (attempt < retry.maxAttempts) {
      // jitter so two colliding writers do not wake together
      await sleep(delay + Math.floor(Math.random() * delay));
      delay = Math.min(retry.maxRetryDelayMs, Math.floor(delay * retry.retryBackoff));
    }
  }

  throw new ConcurrentModificationError(retry.maxAttempts);
}

export async function findRecordFile(storeDir: string, number: number): Promise<RecordFile> {
  const files = await listRecordFiles(storeDir);
  const match = files.find((f) => f.number === number);
  if (!match) {
    throw new NotFoundError(String(number));
  }
  return match;
}

/**
 * Rewrites the Status section of one record. Every other section is
 * re-emitted exactly as read; the write goes through a temp file.
 */
export async function updateRecordStatus(
  storeDir: string,
  number: number,
  newStatus: string,
  supersededBy?: number,
): Promise<UpdateResult> {
  const target = await findRecordFile(storeDir, number);
  const parsed = parseStatusInput(newStatus);

  const doc = parseRecordDocument(await readText(target.filePath));
  const previous = readRecordFields(doc).status ?? null;

  let status: RecordStatus = parsed;
  let body: string[];

  if (parsed.kind === "known" && parsed.value === "Superseded") {
    if (supersededBy === undefined) {
      throw new InvalidInputError(
        `Superseded requires the number of the superseding ADR (e.g. status ${number} Superseded <number>)`,
      );
    }
    if (supersededBy === number) {
      throw new InvalidInputError(`ADR ${number} cannot supersede itself`);
    }
    const successor = await findRecordFile(storeDir, supersededBy).catch((error: unknown) => {
      if (error instanceof NotFoundError) {
        throw new InvalidInputError(`Superseded reference ADR ${supersededBy} does not exist`);
      }
      throw error;
    });
    status = { kind: "known", value: "Superseded", supersededBy };
    body = renderSupersededStatus(statusLabel(previous), supersededBy, successor.fileName);
  } else {
    body = [statusLabel(parsed)];
  }

  const updated = setSectionBody(doc, "Status", body);
  await atomicWriteFile(target.filePath, serializeRecordDocument(updated));

  return { ...target, status, previous };
}

async function summarize(file: RecordFile): Promise<RecordSummary> {
  const fields = readRecordFields(parseRecordDocument(await readText(file.filePath)));
  const status = fields.status ?? null;
  return {
    ...file,
    title: fields.title ?? UNKNOWN,
    date: fields.date ?? UNKNOWN,
    status,
    statusLabel: statusLabel(status),
  };
}

/**
 * Yields one summary per record file in ascending number order. Each call
 * scans the directory afresh. Fields missing from a file come back as
 * "unknown" instead of failing the listing.
 */
export async function* listRecords(storeDir: string): AsyncGenerator<RecordSummary> {
  const files = await listRecordFiles(storeDir);
  for (const file of files) {
    yield await summarize(file);
  }
}

export function isActive(record: RecordSummary): boolean {
  return record.status?.kind === "known" && ACTIVE_STATUSES.has(record.status.value);
}

export function isRetired(record: RecordSummary): boolean {
  if (record.status?.kind === "known") {
    return RETIRED_STATUSES.has(record.status.value);
  }
  return record.statusLabel.startsWith("Superseded");
}

export async function regenerateIndex(storeDir: string): Promise<IndexResult> {
  await assertStoreDir(storeDir);

  const active: RecordSummary[] = [];
  const deprecated: RecordSummary[] = [];
  let omitted = 0;

  for await (const record of listRecords(storeDir)) {
    if (isActive(record)) {
      active.push(record);
    } else if (isRetired(record)) {
      deprecated.push(record);
    } else {
      omitted += 1;
    }
  }

  const file = indexPath(storeDir);
  await atomicWriteFile(file, renderIndex(active, deprecated));
  return { indexFile: file, active: active.length, deprecated: deprecated.length, omitted };
}
