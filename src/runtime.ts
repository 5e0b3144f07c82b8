import { homedir } from "node:os";
import path from "node:path";
import process from "node:process";

import { CONFIG } from "./config.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function todayIso(date: Date = new Date()): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

function expandHome(value: string): string {
  if (value === "~") {
    return homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(homedir(), value.slice(2));
  }
  return value;
}

/**
 * Store directory precedence: explicit --dir, then ADR_STORE_DIR,
 * then docs/decisions under the working directory.
 */
export function resolveStoreDir(
  explicit: string | null,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const candidate = explicit?.trim() || env.ADR_STORE_DIR?.trim() || CONFIG.defaultRelStorePath;
  return path.resolve(cwd, expandHome(candidate));
}

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string | null {
  const editor = env.EDITOR?.trim();
  return editor ? editor : null;
}

/** Display path relative to the working directory when it sits below it. */
export function displayPath(filePath: string, cwd: string = process.cwd()): string {
  const rel = path.relative(cwd, filePath);
  return rel && !rel.startsWith("..") && !path.isAbsolute(rel) ? rel : filePath;
}
