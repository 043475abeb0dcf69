#!/usr/bin/env node
import { runCli } from "./cli.js";
import { logError } from "./utils/logger.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError("leader-tree failed", error);
    process.exitCode = 1;
  }
);
