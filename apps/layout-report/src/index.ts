#!/usr/bin/env tsx
import { createLogger } from "@screen-layout/shared-node";
import { runCli } from "./run-cli";

const logger = createLogger();

await runCli({
  argv: process.argv.slice(2),
  logger,
  write: (line) => {
    process.stdout.write(`${line}\n`);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
});
