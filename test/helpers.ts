import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { CliIO } from "../src/logger.js";

export const FIXED_DATE = "2026-10-19";

export const fixedNow = (): Date => new Date(2026, 9, 19, 12, 0, 0);

export async function makeTempDir(prefix = "adr-test-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function fileNames(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

export type Captured = { stdout: string; stderr: string };

export function captureIO(): { io: CliIO; out: Captured } {
  const out: Captured = { stdout: "", stderr: "" };
  const io: CliIO = {
    stdout: (text) => {
      out.stdout += text;
    },
    stderr: (text) => {
      out.stderr += text;
    },
    color: false,
  };
  return { io, out };
}
