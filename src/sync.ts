// src/sync.ts
//
// One run: validate roots, scan both trees, plan, show the plan, confirm,
// apply. Nothing is remembered between runs.

import { realpath, stat } from "node:fs/promises";
import path from "node:path";
import { promptConfirm, type Confirm } from "./confirm.js";
import { DEFAULT_CONCURRENCY, DIGEST_WORKERS } from "./defaults.js";
import { DigestPool } from "./digest-pool.js";
import {
  FatalSetupError,
  describeError,
  isMissing,
  type ComparisonWarning,
  type ScanWarning,
} from "./errors.js";
import { applyPlan, type ApplyResult, type ProgressObserver } from "./executor.js";
import { normalizeHashAlg } from "./hash.js";
import { loadSourceIgnorer } from "./ignore.js";
import { ConsoleLogger, type LogLevel, type Logger } from "./logger.js";
import { isSameOrNested } from "./path-rel.js";
import { createPlan, type Plan } from "./plan.js";
import { renderApplyErrors, renderPlanSummary } from "./plan-report.js";
import { ProgressReporter } from "./progress.js";
import { scanTree } from "./scan.js";

export type SyncOptions = {
  source: string;
  target: string;
  exclude?: string[];
  dryRun?: boolean;
  /** Skip the confirmation prompt. */
  yes?: boolean;
  concurrency?: number;
  hash?: string;
  digestWorkers?: number;
  logger?: Logger;
  logLevel?: LogLevel;
  confirm?: Confirm;
  /** Where the plan listing and the final report go (stdout by default). */
  print?: (text: string) => void;
  observer?: ProgressObserver;
};

export type SyncStatus = "in-sync" | "dry-run" | "declined" | "applied";

export type SyncOutcome = {
  status: SyncStatus;
  exitCode: number;
  plan: Plan;
  scanWarnings: ScanWarning[];
  comparisonWarnings: ComparisonWarning[];
  result?: ApplyResult;
};

async function canonical(p: string): Promise<string> {
  try {
    return await realpath(p);
  } catch {
    return p;
  }
}

/**
 * Absolute source and target roots, or a FatalSetupError when the pair
 * cannot be synchronized.
 */
export async function resolveRoots(
  source: string,
  target: string,
): Promise<{ sourceRoot: string; targetRoot: string }> {
  const sourceRoot = path.resolve(source);
  const targetRoot = path.resolve(target);

  try {
    const st = await stat(sourceRoot);
    if (!st.isDirectory()) {
      throw new FatalSetupError(`source path '${sourceRoot}' is not a directory`);
    }
  } catch (err) {
    if (err instanceof FatalSetupError) throw err;
    if (isMissing(err)) {
      throw new FatalSetupError(`source path '${sourceRoot}' does not exist`);
    }
    throw new FatalSetupError(
      `could not stat source path '${sourceRoot}': ${describeError(err)}`,
    );
  }

  try {
    const st = await stat(targetRoot);
    if (!st.isDirectory()) {
      throw new FatalSetupError(
        `target path '${targetRoot}' exists but is not a directory`,
      );
    }
  } catch (err) {
    if (err instanceof FatalSetupError) throw err;
    if (!isMissing(err)) {
      throw new FatalSetupError(
        `could not stat target path '${targetRoot}': ${describeError(err)}`,
      );
    }
  }

  if (
    isSameOrNested(sourceRoot, targetRoot) ||
    isSameOrNested(await canonical(sourceRoot), await canonical(targetRoot))
  ) {
    throw new FatalSetupError(
      `source '${sourceRoot}' and target '${targetRoot}' are the same or nested`,
      { sourceRoot, targetRoot },
    );
  }
  return { sourceRoot, targetRoot };
}

export async function runSync(opts: SyncOptions): Promise<SyncOutcome> {
  const {
    exclude = [],
    dryRun = false,
    yes = false,
    concurrency = DEFAULT_CONCURRENCY,
    digestWorkers = DIGEST_WORKERS,
    logLevel = "info",
    print = (text: string) => process.stdout.write(text + "\n"),
  } = opts;
  const logger = (opts.logger ?? new ConsoleLogger(logLevel)).child("sync");
  const algorithm = normalizeHashAlg(opts.hash);

  const { sourceRoot, targetRoot } = await resolveRoots(opts.source, opts.target);
  logger.info(`source: ${sourceRoot}`);
  logger.info(`target: ${targetRoot}`);

  const ignorer = await loadSourceIgnorer(sourceRoot, exclude);
  if (ignorer.patterns.length) {
    logger.info("ignore rules", { patterns: ignorer.patterns });
  }

  const [src, dst] = await Promise.all([
    scanTree(sourceRoot, {
      ignores: ignorer.ignores,
      logger: logger.child("scan.source"),
    }),
    scanTree(targetRoot, {
      allowMissingRoot: true,
      keepSpecialNodes: true,
      logger: logger.child("scan.target"),
    }),
  ]);
  logger.info("scan finished", {
    source: src.entries.size,
    target: dst.entries.size,
    warnings: src.warnings.length + dst.warnings.length,
  });
  const scanWarnings = [...src.warnings, ...dst.warnings];

  const pool = new DigestPool({
    workers: digestWorkers,
    algorithm,
    logger: logger.child("digest"),
  });
  const { plan, warnings: comparisonWarnings } = await createPlan(
    src.entries,
    dst.entries,
    { digest: (p) => pool.digest(p), logger: logger.child("plan") },
  ).finally(() => pool.stop());
  const outcome = (
    status: SyncStatus,
    exitCode: number,
    result?: ApplyResult,
  ): SyncOutcome => ({
    status,
    exitCode,
    plan,
    scanWarnings,
    comparisonWarnings,
    result,
  });

  if (!plan.actions.length) {
    logger.info("no actions needed; source and target are already in sync");
    return outcome("in-sync", 0);
  }

  print(renderPlanSummary(plan));

  if (dryRun) {
    logger.info("dry run: no changes were made");
    return outcome("dry-run", 0);
  }

  if (!yes) {
    const confirm = opts.confirm ?? promptConfirm();
    if (!(await confirm("Proceed with synchronization?"))) {
      logger.info("synchronization aborted by user");
      return outcome("declined", 0);
    }
  }

  const applyLogger = logger.child("apply");
  const result = await applyPlan(plan, {
    sourceRoot,
    targetRoot,
    concurrency,
    logger: applyLogger,
    observer: opts.observer ?? new ProgressReporter(applyLogger),
  });

  if (result.errors.length) {
    print(renderApplyErrors(result.errors));
    return outcome("applied", 1, result);
  }
  logger.info("synchronization finished successfully", {
    applied: result.applied,
  });
  return outcome("applied", 0, result);
}
