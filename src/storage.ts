import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import { parseRecordFileName } from "./domain.js";
import { IoFailureError, NotFoundError, isErrnoException } from "./errors.js";
import type { RecordFile } from "./types.js";

async function io<T>(target: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (error) {
    throw new IoFailureError(target, error);
  }
}

export async function ensureDir(dirPath: string): Promise<boolean> {
  const created = await io(dirPath, () => fs.mkdir(dirPath, { recursive: true }));
  return created !== undefined;
}

export async function assertStoreDir(storeDir: string): Promise<void> {
  const stats = await fs.stat(storeDir).catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new NotFoundError(storeDir, `ADR directory not found: ${storeDir}`);
    }
    throw new IoFailureError(storeDir, error);
  });
  if (!stats.isDirectory()) {
    throw new IoFailureError(storeDir, new Error("Not a directory"));
  }
}

export async function readText(filePath: string): Promise<string> {
  return io(filePath, () => fs.readFile(filePath, "utf8"));
}

/**
 * Creates a file only when nothing exists at the path ('wx').
 * Returns false when the name is already taken.
 */
export async function createExclusive(filePath: string, content: string): Promise<boolean> {
  const handle = await fs.open(filePath, "wx").catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "EEXIST") return null;
    throw new IoFailureError(filePath, error);
  });
  if (!handle) return false;

  try {
    await io(filePath, () => handle.writeFile(content, "utf8"));
  } finally {
    await io(filePath, () => handle.close());
  }
  return true;
}

/** Write to a sibling temp file, then rename over the target. */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  try {
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, filePath);
  } catch (error) {
    await removeTempFile(tmp);
    throw new IoFailureError(filePath, error);
  }
}

async function removeTempFile(tmp: string): Promise<void> {
  try {
    await fs.rm(tmp, { force: true });
  } catch {
    // ignore; the failed write is what gets reported
  }
}

export async function removeFile(filePath: string): Promise<void> {
  await io(filePath, () => fs.rm(filePath, { force: true }));
}

/** Record files in the store, ascending by number then file name. */
export async function listRecordFiles(storeDir: string): Promise<RecordFile[]> {
  const entries = await fs.readdir(storeDir, { withFileTypes: true }).catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new NotFoundError(storeDir, `ADR directory not found: ${storeDir}`);
    }
    throw new IoFailureError(storeDir, error);
  });

  const files: RecordFile[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const number = parseRecordFileName(entry.name);
    if (number === null) continue;
    files.push({ number, fileName: entry.name, filePath: path.join(storeDir, entry.name) });
  }

  return files.sort((a, b) => a.number - b.number || compareNames(a.fileName, b.fileName));
}

export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export async function maxRecordNumber(storeDir: string): Promise<number> {
  const files = await listRecordFiles(storeDir);
  return files.reduce((max, f) => Math.max(max, f.number), 0);
}
