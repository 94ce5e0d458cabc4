// src/sync-cli.ts
import { Command, Option } from "commander";
import { CLI_NAME, IGNORE_FILE, VERSION } from "./constants.js";
import { DEFAULT_CONCURRENCY } from "./defaults.js";
import { parsePositiveInt } from "./cli-util.js";
import { defaultHashAlg, listSupportedHashes } from "./hash.js";
import { collectIgnoreOption } from "./ignore.js";
import { LOG_LEVELS, parseLogLevel } from "./logger.js";
import type { SyncOptions } from "./sync.js";

export type SyncCliOptions = {
  exclude: string[];
  dryRun: boolean;
  verbosity: string;
  yes: boolean;
  concurrency: number;
  hash: string;
};

export function configureSyncCommand(command: Command): Command {
  return command
    .name(CLI_NAME)
    .description(
      "Make <target> an exact copy of <source>: add what is missing, overwrite what differs, delete what is extra.",
    )
    .version(VERSION)
    .argument("<source>", "directory to copy from (never modified)")
    .argument("<target>", "directory to update; created if missing")
    .option(
      "-e, --exclude <pattern>",
      `gitignore-style pattern to skip in the source, added to ${IGNORE_FILE} (repeat or comma-separated)`,
      collectIgnoreOption,
      [] as string[],
    )
    .option("--dry-run", "print the plan and change nothing", false)
    .option("-y, --yes", "apply without asking for confirmation", false)
    .addOption(
      new Option("-v, --verbosity <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .default("info"),
    )
    .option(
      "-j, --concurrency <n>",
      "maximum number of actions applied at once",
      parsePositiveInt,
      DEFAULT_CONCURRENCY,
    )
    .addOption(
      new Option(
        "--hash <algorithm>",
        "content hash used when size matches but modification time does not",
      )
        .choices(listSupportedHashes())
        .default(defaultHashAlg()),
    )
    .addHelpText(
      "after",
      `
The source is the source of truth. Files are compared by size, then by
modification time (to the second); when only the time differs, contents are
hashed. Patterns in ${IGNORE_FILE} at the source root are honored.
`,
    );
}

export function cliOptsToSyncOptions(
  source: string,
  target: string,
  opts: SyncCliOptions,
): SyncOptions {
  return {
    source,
    target,
    exclude: opts.exclude,
    dryRun: opts.dryRun,
    yes: opts.yes,
    concurrency: opts.concurrency,
    hash: opts.hash,
    logLevel: parseLogLevel(opts.verbosity),
  };
}

export function buildProgram(
  run: (opts: SyncOptions) => Promise<void>,
): Command {
  const program = configureSyncCommand(new Command());
  return program.action(async (source: string, target: string) => {
    await run(
      cliOptsToSyncOptions(source, target, program.opts<SyncCliOptions>()),
    );
  });
}
