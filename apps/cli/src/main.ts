#!/usr/bin/env node
import "dotenv/config";

import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { createLogger, processIo } from "./log.js";

function main(): number {
  const config = loadConfig();
  return runCli(process.argv.slice(2), processIo, config);
}

try {
  process.exit(main());
} catch (err) {
  createLogger(processIo, { verbose: false }).logError("Unexpected failure", err);
  process.exit(1);
}
