// src/plan.ts
//
// Compare a source mapping against a target mapping and decide, per path,
// what has to happen to the target.

import { MTIME_RESOLUTION_MS } from "./defaults.js";
import { describeError, type ComparisonWarning } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { depthOf } from "./path-rel.js";

export type Entry = {
  /** posix, relative to the scan root, never "" */
  relativePath: string;
  absolutePath: string;
  /** bytes; 0 for directories */
  size: number;
  /** ms since epoch */
  modifiedTime: number;
  isDirectory: boolean;
  /** mode & 0o7777 */
  permissionMode: number;
  /**
   * Set for a symbolic link or other non-regular node that was recorded
   * rather than skipped (target scans). Such an entry is never a copy
   * source and never matches a source entry.
   */
  special?: SpecialKind;
};

export type SpecialKind =
  | "symbolic link"
  | "fifo"
  | "socket"
  | "device"
  | "special file";

export type Mapping = ReadonlyMap<string, Entry>;

export type ActionKind = "add" | "update" | "delete";

export type AddAction = {
  kind: "add";
  relativePath: string;
  sourceEntry: Entry;
};

export type UpdateAction = {
  kind: "update";
  relativePath: string;
  sourceEntry: Entry;
  targetEntry: Entry;
};

export type DeleteAction = {
  kind: "delete";
  relativePath: string;
  targetEntry: Entry;
};

export type Action = AddAction | UpdateAction | DeleteAction;

export type Plan = {
  readonly actions: readonly Action[];
  readonly adds: number;
  readonly updates: number;
  readonly deletes: number;
};

export type DigestFn = (absolutePath: string) => Promise<string>;

export interface PlanOptions {
  digest: DigestFn;
  logger?: Logger;
}

export type PlanResult = {
  plan: Plan;
  warnings: ComparisonWarning[];
};

export const EMPTY_PLAN: Plan = Object.freeze({
  actions: Object.freeze([]),
  adds: 0,
  updates: 0,
  deletes: 0,
});

export function truncatedTime(ms: number): number {
  return Math.floor(ms / MTIME_RESOLUTION_MS);
}

export type FileComparison = "same" | "differs" | "inconclusive";

/** Metadata-only comparison of two file entries. */
export function compareFileMeta(source: Entry, target: Entry): FileComparison {
  if (source.size !== target.size) return "differs";
  if (truncatedTime(source.modifiedTime) === truncatedTime(target.modifiedTime)) {
    return "same";
  }
  return "inconclusive";
}

function byPath(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Deletes first, deepest first (ties by path); then adds and updates by
 * path, so a directory's add precedes the adds of its contents.
 */
export function compareActions(a: Action, b: Action): number {
  const aDelete = a.kind === "delete";
  const bDelete = b.kind === "delete";
  if (aDelete !== bDelete) return aDelete ? -1 : 1;
  if (aDelete) {
    const da = depthOf(a.relativePath);
    const db = depthOf(b.relativePath);
    if (da !== db) return db - da;
  }
  return byPath(a.relativePath, b.relativePath);
}

export function finalizePlan(actions: Action[]): Plan {
  actions.sort(compareActions);
  let adds = 0;
  let updates = 0;
  let deletes = 0;
  for (const a of actions) {
    if (a.kind === "add") adds++;
    else if (a.kind === "update") updates++;
    else deletes++;
  }
  return Object.freeze({
    actions: Object.freeze(actions),
    adds,
    updates,
    deletes,
  });
}

type Pending = { source: Entry; target: Entry };

function copyable(entry: Entry | undefined): Entry | undefined {
  return entry?.special ? undefined : entry;
}

export async function createPlan(
  source: Mapping,
  target: Mapping,
  { digest, logger = silentLogger }: PlanOptions,
): Promise<PlanResult> {
  const actions: Action[] = [];
  const pending: Pending[] = [];
  const warnings: ComparisonWarning[] = [];

  const keys = Array.from(new Set([...source.keys(), ...target.keys()])).sort(
    byPath,
  );

  for (const relativePath of keys) {
    const s = copyable(source.get(relativePath));
    const t = target.get(relativePath);
    if (s && !t) {
      actions.push({ kind: "add", relativePath, sourceEntry: s });
    } else if (!s && t) {
      actions.push({ kind: "delete", relativePath, targetEntry: t });
    } else if (s && t) {
      // a link in the target is replaced, never written through
      if (t.special || s.isDirectory !== t.isDirectory) {
        actions.push({ kind: "delete", relativePath, targetEntry: t });
        actions.push({ kind: "add", relativePath, sourceEntry: s });
      } else if (!s.isDirectory) {
        const meta = compareFileMeta(s, t);
        if (meta === "differs") {
          actions.push({
            kind: "update",
            relativePath,
            sourceEntry: s,
            targetEntry: t,
          });
        } else if (meta === "inconclusive") {
          pending.push({ source: s, target: t });
        }
      }
    }
  }

  if (pending.length) {
    logger.debug("verifying content of inconclusive files", {
      count: pending.length,
    });
    const verdicts = await Promise.all(
      pending.map((p) => contentDiffers(p, digest)),
    );
    pending.forEach((p, i) => {
      const verdict = verdicts[i];
      if (verdict === false) return;
      if (verdict !== true) {
        warnings.push({
          relativePath: p.source.relativePath,
          message: verdict.error,
        });
        logger.warn("content comparison failed; updating anyway", {
          path: p.source.relativePath,
          err: verdict.error,
        });
      }
      actions.push({
        kind: "update",
        relativePath: p.source.relativePath,
        sourceEntry: p.source,
        targetEntry: p.target,
      });
    });
  }

  const plan = finalizePlan(actions);
  logger.info("plan ready", {
    adds: plan.adds,
    updates: plan.updates,
    deletes: plan.deletes,
    verified: pending.length,
  });
  return { plan, warnings };
}

async function contentDiffers(
  { source, target }: Pending,
  digest: DigestFn,
): Promise<boolean | { error: string }> {
  try {
    const [a, b] = await Promise.all([
      digest(source.absolutePath),
      digest(target.absolutePath),
    ]);
    return a !== b;
  } catch (err) {
    return { error: describeError(err) };
  }
}
