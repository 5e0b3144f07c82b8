import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { CONFIG, KNOWN_STATUSES } from "./config.js";
import { padNumber, parseRecordNumber, parseStatusInput, statusLabel } from "./domain.js";
import { launchEditor } from "./editor.js";
import { AdrError, InvalidInputError, NotFoundError, errorMessage } from "./errors.js";
import { createLogger, processIO } from "./logger.js";
import { displayPath, resolveEditor, resolveStoreDir } from "./runtime.js";
import { assertStoreDir } from "./storage.js";
import { createRecord, initStore, listRecords, regenerateIndex, updateRecordStatus } from "./store.js";
import type { EditorLauncher } from "./editor.js";
import type { CliIO, Logger } from "./logger.js";
import type { StoreOptions } from "./types.js";

export type CliContext = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  now?: () => Date;
  openEditor: EditorLauncher;
};

type ParsedArgs = {
  command: string | null;
  positionals: string[];
  storeDir: string | null;
  noEdit: boolean;
  help: boolean;
};

type Session = {
  args: ParsedArgs;
  ctx: CliContext;
  logger: Logger;
  storeDir: string;
  options: StoreOptions;
};

const require = createRequire(import.meta.url);
const VERSION_FLAGS = new Set(["--version", "-v", "version", "-V"]);

// src/ when run from source, dist/src/ once built
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

export function packageVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const file = fileURLToPath(new URL(candidate, import.meta.url));
    if (!existsSync(file)) continue;
    const pkg: unknown = require(file);
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  throw new Error("package.json with a version field not found");
}

class UsageError extends InvalidInputError {
  public readonly usage: string;

  constructor(message: string, usage: string) {
    super(message);
    this.name = "UsageError";
    this.usage = usage;
  }
}

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    positionals: [],
    storeDir: null,
    noEdit: false,
    help: false,
  };
  let literal = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (literal) {
      result.positionals.push(token);
      continue;
    }
    switch (token) {
      case "--":
        literal = true;
        continue;
      case "--dir":
        result.storeDir = requireValue(argv, ++i, token);
        continue;
      case "--no-edit":
        result.noEdit = true;
        continue;
      case "--help":
      case "-h":
        result.help = true;
        continue;
      default:
        break;
    }
    if (token.startsWith("--dir=")) {
      result.storeDir = token.slice("--dir=".length);
    } else if (result.command === null) {
      result.command = token;
    } else if (token.startsWith("--")) {
      throw new InvalidInputError(`Unknown option "${token}". Run with --help for usage.`);
    } else {
      result.positionals.push(token);
    }
  }

  return result;
}

function requireValue(argv: string[], index: number, flag: string): string {
  if (index >= argv.length) {
    throw new InvalidInputError(`Option ${flag} requires a value.`);
  }
  return argv[index];
}

function usageText(): string {
  const bin = CONFIG.toolName;
  return [
    "ADR Store - Create and manage Architecture Decision Records",
    "",
    "Usage:",
    `  ${bin} <command> [options]`,
    "",
    "Commands:",
    "  init                                   Create the ADR directory, the first ADR and the index",
    "  new <title> [status]                   Create a new ADR (status defaults to Proposed)",
    "  list                                   List all ADRs with their status",
    "  status <number> <status> [superseded_by]",
    "                                         Update the status of an ADR",
    "  index                                  Regenerate the ADR index (README.md)",
    "  help                                   Show this help message",
    "",
    `Statuses: ${KNOWN_STATUSES.join(", ")}`,
    "",
    "Options:",
    `  --dir <path>      ADR directory (default: $ADR_STORE_DIR or ${CONFIG.defaultRelStorePath})`,
    "  --no-edit         Do not open new ADRs in $EDITOR",
    "  -v, --version     Print the version",
    "",
    "Examples:",
    `  ${bin} init`,
    `  ${bin} new "Use PostgreSQL for database"`,
    `  ${bin} status 5 Accepted`,
    `  ${bin} status 3 Superseded 10`,
    `  ${bin} index`,
    "",
  ].join("\n");
}

function warnCustomStatus(logger: Logger, raw: string): void {
  const status = parseStatusInput(raw);
  if (status.kind === "custom") {
    logger.warn(
      `Unrecognized status "${status.value}"; recorded as a custom status. Expected one of: ${KNOWN_STATUSES.join(", ")}`,
    );
  }
}

async function runInit(s: Session): Promise<number> {
  const result = await initStore(s.storeDir, s.options);
  const rel = (p: string) => displayPath(p, s.ctx.cwd);

  if (result.createdDir) {
    s.logger.info(`Creating ADR directory: ${rel(s.storeDir)}`);
  }
  if (result.indexFile) {
    s.logger.info(`✓ ADR index created: ${rel(result.indexFile)}`);
  }
  if (result.seedFile) {
    s.logger.info(`✓ First ADR created: ${path.basename(result.seedFile)}`);
  }
  s.logger.info("✓ ADR system initialized");
  return 0;
}

async function runNew(s: Session): Promise<number> {
  const [title, status, ...extra] = s.args.positionals;
  const usage = `Usage: ${CONFIG.toolName} new <title> [status]`;
  if (!title || !title.trim()) {
    throw new UsageError("Title is required", usage);
  }
  if (extra.length > 0) {
    throw new UsageError("Too many arguments; quote a title that contains spaces", usage);
  }
  if (status !== undefined) {
    warnCustomStatus(s.logger, status);
  }

  const created = await createRecord(s.storeDir, title, status ?? CONFIG.defaultStatus, s.options);
  const shown = displayPath(created.filePath, s.ctx.cwd);

  s.logger.info(`✓ ADR created: ${shown}`);
  s.logger.line();
  s.logger.title("Next steps:");
  s.logger.line(`  1. Edit the ADR: ${shown}`);
  s.logger.line("  2. Fill in the Context, Decision, and Consequences sections");
  s.logger.line("  3. Commit to version control");
  s.logger.line(`  4. Update index: ${CONFIG.toolName} index`);
  s.logger.line();

  const editor = s.args.noEdit ? null : resolveEditor(s.ctx.env);
  if (editor) {
    s.logger.info(`Opening in ${editor}...`);
    try {
      await s.ctx.openEditor(editor, created.filePath);
    } catch (error) {
      s.logger.warn(`Could not open editor: ${errorMessage(error)}`);
    }
  }
  return 0;
}

async function runList(s: Session): Promise<number> {
  s.logger.title("Architecture Decision Records");
  s.logger.line();

  try {
    await assertStoreDir(s.storeDir);
  } catch (error) {
    if (error instanceof NotFoundError) {
      s.logger.warn(`No ADR directory found. Run: ${CONFIG.toolName} init`);
      return 1;
    }
    throw error;
  }

  let count = 0;
  for await (const record of listRecords(s.storeDir)) {
    count += 1;
    s.logger.line(`[${padNumber(record.number)}] ${record.title}`);
    s.logger.line(`      Status: ${record.statusLabel} | Date: ${record.date}`);
    s.logger.line(`      File: ${displayPath(record.filePath, s.ctx.cwd)}`);
    s.logger.line();
  }

  if (count === 0) {
    s.logger.warn("No ADRs found");
  } else {
    s.logger.info(`Total ADRs: ${count}`);
  }
  return 0;
}

async function runStatus(s: Session): Promise<number> {
  const [rawNumber, rawStatus, rawSupersededBy, ...extra] = s.args.positionals;
  const usage = `Usage: ${CONFIG.toolName} status <number> <status> [superseded_by]`;
  if (!rawNumber || !rawStatus || !rawStatus.trim()) {
    throw new UsageError("ADR number and status are required", usage);
  }
  if (extra.length > 0) {
    throw new UsageError("Too many arguments", usage);
  }

  const number = parseRecordNumber(rawNumber);
  const requested = parseStatusInput(rawStatus);
  const superseding = requested.kind === "known" && requested.value === "Superseded";

  warnCustomStatus(s.logger, rawStatus);
  let supersededBy: number | undefined;
  if (rawSupersededBy !== undefined) {
    if (superseding) {
      supersededBy = parseRecordNumber(rawSupersededBy);
    } else {
      s.logger.warn(`Ignoring superseded-by ADR ${rawSupersededBy}; it only applies to Superseded`);
    }
  }

  const result = await updateRecordStatus(s.storeDir, number, rawStatus, supersededBy);
  s.logger.info(
    `✓ Updated status of ${displayPath(result.filePath, s.ctx.cwd)} to: ${statusLabel(result.status)}`,
  );
  return 0;
}

async function runIndex(s: Session): Promise<number> {
  s.logger.info("Updating ADR index...");
  const result = await regenerateIndex(s.storeDir);
  s.logger.info(
    `✓ ADR index updated: ${displayPath(result.indexFile, s.ctx.cwd)} (${result.active} active, ${result.deprecated} deprecated)`,
  );
  if (result.omitted > 0) {
    s.logger.warn(`${result.omitted} ADR(s) with a custom or unknown status were left out of the index`);
  }
  return 0;
}

const COMMANDS = new Map<string, (s: Session) => Promise<number>>([
  ["init", runInit],
  ["new", runNew],
  ["list", runList],
  ["status", runStatus],
  ["index", runIndex],
]);

/**
 * Runs one command and returns the process exit code. Store errors are
 * reported as a single [ERROR] line; anything else propagates.
 */
export async function runCli(
  argv: string[],
  io: CliIO = processIO(),
  context: Partial<CliContext> = {},
): Promise<number> {
  const ctx: CliContext = {
    env: context.env ?? process.env,
    cwd: context.cwd ?? process.cwd(),
    now: context.now,
    openEditor: context.openEditor ?? launchEditor,
  };
  const logger = createLogger(io);

  try {
    const args = parseArgs(argv);
    const command = args.command?.toLowerCase() ?? null;

    if (command === null || command === "help" || args.help) {
      io.stdout(usageText());
      return 0;
    }
    if (VERSION_FLAGS.has(command)) {
      io.stdout(`${packageVersion()}\n`);
      return 0;
    }

    const handler = COMMANDS.get(command);
    if (!handler) {
      logger.error(`Unknown command: ${args.command}`);
      io.stderr(`\n${usageText()}`);
      return 1;
    }

    return await handler({
      args,
      ctx,
      logger,
      storeDir: resolveStoreDir(args.storeDir, ctx.env, ctx.cwd),
      options: { now: ctx.now },
    });
  } catch (error) {
    if (error instanceof AdrError) {
      logger.error(error.message);
      if (error instanceof UsageError) {
        io.stderr(`${error.usage}\n`);
      }
      return 1;
    }
    throw error;
  }
}
