#!/usr/bin/env node
/**
 * ADR Store command-line entry point.
 */

import process from "node:process";

import { runCli } from "./src/commands.js";
import { log, processIO } from "./src/logger.js";

async function run(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2), processIO());
  if (exitCode !== 0) {
    process.exitCode = exitCode;
  }
}

run().catch((err) => {
  log("fatal error:", err);
  process.exit(1);
});
