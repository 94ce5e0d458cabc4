#!/usr/bin/env node
// src/cli.ts
import { cliMain } from "./cli-util.js";
import { buildProgram } from "./sync-cli.js";
import { runSync } from "./sync.js";

const program = buildProgram(async (opts) => {
  const outcome = await runSync(opts);
  process.exitCode = outcome.exitCode;
});

void cliMain(program);
