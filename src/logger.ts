import process from "node:process";

export type Writer = (text: string) => void;

/** Output streams a command writes to; tests substitute in-memory writers. */
export interface CliIO {
  stdout: Writer;
  stderr: Writer;
  color: boolean;
}

const ANSI = {
  red: "\u001b[0;31m",
  green: "\u001b[0;32m",
  yellow: "\u001b[1;33m",
  blue: "\u001b[0;34m",
  reset: "\u001b[0m",
} as const;

type Tone = Exclude<keyof typeof ANSI, "reset">;

export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  title(message: string): void;
  line(message?: string): void;
};

function paint(io: CliIO, tone: Tone, text: string): string {
  return io.color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
}

export function createLogger(io: CliIO): Logger {
  return {
    info: (message) => io.stdout(`${paint(io, "green", "[INFO]")} ${message}\n`),
    warn: (message) => io.stderr(`${paint(io, "yellow", "[WARNING]")} ${message}\n`),
    error: (message) => io.stderr(`${paint(io, "red", "[ERROR]")} ${message}\n`),
    title: (message) => io.stdout(`${paint(io, "blue", message)}\n`),
    line: (message = "") => io.stdout(`${message}\n`),
  };
}

export function processIO(env: NodeJS.ProcessEnv = process.env): CliIO {
  const color = !env.NO_COLOR && Boolean(process.stdout.isTTY);
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    color,
  };
}

/** Last-resort stderr logging for the entry point. */
export function log(...parts: unknown[]): void {
  const text = parts
    .map((part) => (part instanceof Error ? part.message : String(part)))
    .join(" ");
  process.stderr.write(`[ERROR] adr: ${text}\n`);
}
