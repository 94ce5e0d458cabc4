// src/executor.ts
//
// Apply a plan to the target tree with a bounded number of actions in flight.
// Every action is attempted; failures are collected, never thrown.

import { lstat, mkdir, open, rm, unlink, utimes } from "node:fs/promises";
import path from "node:path";
import { COPY_CHUNK_BYTES, DEFAULT_CONCURRENCY } from "./defaults.js";
import { describeError, errorCode, isMissing, type ActionError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { parallelMapLimit } from "./parallel.js";
import { ancestorsOf, toAbs } from "./path-rel.js";
import type {
  Action,
  AddAction,
  DeleteAction,
  Plan,
  UpdateAction,
} from "./plan.js";

/** Passive listener; nothing it does affects the apply. */
export interface ProgressObserver {
  onApplyStarted?(totalActions: number, totalBytes: number): void;
  onFileStarted?(relativePath: string, size: number): void;
  onBytesCopied?(relativePath: string, bytes: number): void;
  onActionFinished?(action: Action, error?: ActionError): void;
}

export interface ApplyOptions {
  sourceRoot: string;
  targetRoot: string;
  concurrency?: number;
  logger?: Logger;
  observer?: ProgressObserver;
}

export type ApplyResult = {
  applied: number;
  errors: ActionError[];
  warnings: string[];
};

export function plannedBytes(plan: Plan): number {
  let total = 0;
  for (const a of plan.actions) {
    if (a.kind !== "delete" && !a.sourceEntry.isDirectory) {
      total += a.sourceEntry.size;
    }
  }
  return total;
}

/**
 * Truncate-and-rewrite `dst` with the contents of `src`, fsync it, and report
 * each chunk as it lands.
 */
async function copyFileContents(
  src: string,
  dst: string,
  mode: number,
  onChunk: (bytes: number) => void,
): Promise<number> {
  const input = await open(src, "r");
  try {
    const output = await open(dst, "w", mode);
    try {
      const buf = Buffer.allocUnsafe(COPY_CHUNK_BYTES);
      let total = 0;
      while (true) {
        const { bytesRead } = await input.read(buf, 0, buf.length, null);
        if (bytesRead === 0) break;
        let written = 0;
        while (written < bytesRead) {
          const { bytesWritten } = await output.write(
            buf,
            written,
            bytesRead - written,
          );
          written += bytesWritten;
        }
        total += bytesRead;
        onChunk(bytesRead);
      }
      await output.sync();
      return total;
    } finally {
      await output.close();
    }
  } finally {
    await input.close();
  }
}

export async function applyPlan(
  plan: Plan,
  {
    sourceRoot,
    targetRoot,
    concurrency = DEFAULT_CONCURRENCY,
    logger = silentLogger,
    observer = {},
  }: ApplyOptions,
): Promise<ApplyResult> {
  const errors: ActionError[] = [];
  const warnings: string[] = [];
  let applied = 0;

  // Adds wait on deletes of the same path or an ancestor (kind changes).
  const deletes = new Map<string, Promise<void>>();

  const warn = (message: string, meta: Record<string, unknown>) => {
    warnings.push(message);
    logger.warn(message, meta);
  };

  const targetPath = (rel: string) => toAbs(rel, targetRoot);
  const sourcePath = (rel: string) => toAbs(rel, sourceRoot);

  async function removeTarget(action: DeleteAction): Promise<void> {
    const abs = targetPath(action.relativePath);
    const st = await lstat(abs).catch((err: unknown) => {
      if (isMissing(err)) return null;
      throw err;
    });
    if (!st) return; // already converged
    if (st.isDirectory()) {
      await waitForDescendantDeletes(action.relativePath);
      await rm(abs, { recursive: true, force: true });
    } else {
      await unlink(abs).catch((err: unknown) => {
        if (!isMissing(err)) throw err;
      });
    }
  }

  // Deeper deletes were dispatched earlier; let them settle before removing
  // their directory.
  async function waitForDescendantDeletes(rel: string): Promise<void> {
    const prefix = `${rel}/`;
    const pending: Promise<void>[] = [];
    for (const [p, done] of deletes) {
      if (p.startsWith(prefix)) pending.push(done);
    }
    await Promise.all(pending);
  }

  async function waitForDeletes(rel: string): Promise<void> {
    for (const p of [...ancestorsOf(rel), rel]) {
      const pending = deletes.get(p);
      if (pending) await pending;
    }
  }

  async function copyIn(action: AddAction | UpdateAction): Promise<void> {
    const entry = action.sourceEntry;
    const abs = targetPath(action.relativePath);
    await mkdir(path.dirname(abs), { recursive: true });
    observer.onFileStarted?.(action.relativePath, entry.size);
    const copied = await copyFileContents(
      sourcePath(action.relativePath),
      abs,
      entry.permissionMode & 0o777,
      (n) => observer.onBytesCopied?.(action.relativePath, n),
    );
    if (copied !== entry.size) {
      logger.debug("source size changed since scan", {
        path: action.relativePath,
        scanned: entry.size,
        copied,
      });
    }
    const mtime = new Date(entry.modifiedTime);
    try {
      await utimes(abs, mtime, mtime);
    } catch (err) {
      warn(`could not set modification time on ${action.relativePath}`, {
        err: describeError(err),
      });
    }
  }

  // false when the action was refused rather than applied
  async function run(action: Action): Promise<boolean> {
    switch (action.kind) {
      case "delete":
        await removeTarget(action);
        return true;
      case "add":
        await waitForDeletes(action.relativePath);
        if (action.sourceEntry.isDirectory) {
          await mkdir(targetPath(action.relativePath), {
            recursive: true,
            mode: action.sourceEntry.permissionMode & 0o7777,
          });
        } else {
          await copyIn(action);
        }
        return true;
      case "update":
        if (action.sourceEntry.isDirectory) {
          logger.error("refusing to apply an update to a directory", {
            path: action.relativePath,
          });
          return false;
        }
        await waitForDeletes(action.relativePath);
        await copyIn(action);
        return true;
    }
  }

  logger.info("applying plan", {
    actions: plan.actions.length,
    concurrency,
  });
  observer.onApplyStarted?.(plan.actions.length, plannedBytes(plan));

  await parallelMapLimit(plan.actions, concurrency, async (action) => {
    let failure: ActionError | undefined;
    const done = run(action);
    if (action.kind === "delete") {
      deletes.set(
        action.relativePath,
        done.then(
          () => {},
          () => {},
        ),
      );
    }
    try {
      if (await done) {
        applied += 1;
        logger.debug(`${action.kind} ${action.relativePath}`);
      }
    } catch (err) {
      failure = {
        action,
        kind: action.kind,
        relativePath: action.relativePath,
        message: `${action.kind} ${action.relativePath}: ${describeError(err)}`,
        code: errorCode(err),
      };
      errors.push(failure);
      logger.error(failure.message, { code: failure.code });
    }
    observer.onActionFinished?.(action, failure);
  });

  logger.info("apply finished", { applied, failed: errors.length });
  return { applied, errors, warnings };
}
