// src/scan.ts
import * as walk from "@nodelib/fs.walk";
import type { Stats } from "node:fs";
import { lstat, stat as statAsync } from "node:fs/promises";
import path from "node:path";
import { SCAN_CONCURRENCY } from "./defaults.js";
import {
  FatalSetupError,
  describeError,
  errorCode,
  isMissing,
  type ScanWarning,
} from "./errors.js";
import type { IgnorePredicate } from "./ignore.js";
import { silentLogger, type Logger } from "./logger.js";
import { parallelMapLimit } from "./parallel.js";
import { toRel } from "./path-rel.js";
import type { Entry, Mapping, SpecialKind } from "./plan.js";

export type ScanOptions = {
  /** Only consulted for the source tree. */
  ignores?: IgnorePredicate;
  /** A missing root yields an empty mapping instead of an error (target side). */
  allowMissingRoot?: boolean;
  /**
   * Record symbolic links and other special nodes as `special` entries
   * instead of skipping them with a warning (target side).
   */
  keepSpecialNodes?: boolean;
  concurrency?: number;
  logger?: Logger;
};

export type ScanResult = {
  entries: Mapping;
  warnings: ScanWarning[];
};

type Walked = walk.Entry;

function walkAsync(root: string, settings: walk.Options): Promise<Walked[]> {
  return new Promise((resolve, reject) => {
    walk.walk(root, settings, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

function nodeKind(st: Stats): SpecialKind {
  if (st.isSymbolicLink()) return "symbolic link";
  if (st.isFIFO()) return "fifo";
  if (st.isSocket()) return "socket";
  if (st.isBlockDevice() || st.isCharacterDevice()) return "device";
  return "special file";
}

export async function scanTree(
  root: string,
  {
    ignores,
    allowMissingRoot = false,
    keepSpecialNodes = false,
    concurrency = SCAN_CONCURRENCY,
    logger = silentLogger,
  }: ScanOptions = {},
): Promise<ScanResult> {
  const absRoot = path.resolve(root);
  const warnings: ScanWarning[] = [];
  const entries = new Map<string, Entry>();

  try {
    const st = await statAsync(absRoot);
    if (!st.isDirectory()) {
      throw new FatalSetupError(`'${absRoot}' is not a directory`, {
        root: absRoot,
      });
    }
  } catch (err) {
    if (err instanceof FatalSetupError) throw err;
    if (isMissing(err) && allowMissingRoot) {
      logger.info("root does not exist yet; treating as empty", {
        root: absRoot,
      });
      return { entries, warnings };
    }
    throw new FatalSetupError(
      `failed to stat scan root '${absRoot}': ${describeError(err)}`,
      { root: absRoot, code: errorCode(err) },
    );
  }

  const warn = (relativePath: string, message: string, code?: string) => {
    warnings.push({ root: absRoot, relativePath, message, code });
    logger.warn(message, { path: relativePath || ".", code });
  };

  const isIgnored = (e: Walked): boolean => {
    if (!ignores) return false;
    const r = toRel(e.path, absRoot);
    return ignores(r, e.dirent.isDirectory());
  };

  const t0 = Date.now();
  // Dirents only: a node that vanishes between readdir and lstat must not
  // take its siblings down with it.
  const walked = await walkAsync(absRoot, {
    stats: false,
    followSymbolicLinks: false,
    concurrency,
    // Do not descend into ignored directories
    deepFilter: (e) => !isIgnored(e),
    // Do not emit ignored entries
    entryFilter: (e) => !isIgnored(e),
    errorFilter: (err) => {
      const rel = err.path ? toRel(err.path, absRoot) : "";
      warn(rel, `cannot read: ${err.message}`, err.code);
      return true;
    },
  });

  const describeNode = async (e: Walked): Promise<Entry | null> => {
    const relativePath = toRel(e.path, absRoot);
    if (!relativePath) return null;
    let st: Stats;
    try {
      st = await lstat(e.path);
    } catch (err) {
      warn(relativePath, `cannot stat: ${describeError(err)}`, errorCode(err));
      return null;
    }
    const isDirectory = st.isDirectory();
    const entry: Entry = {
      relativePath,
      absolutePath: e.path,
      size: isDirectory ? 0 : st.size,
      modifiedTime: st.mtimeMs,
      isDirectory,
      permissionMode: st.mode & 0o7777,
    };
    if (isDirectory || st.isFile()) return entry;
    const special = nodeKind(st);
    if (!keepSpecialNodes) {
      warn(relativePath, `skipping ${special}`);
      return null;
    }
    logger.debug(`recording ${special}`, { path: relativePath });
    return { ...entry, size: 0, special };
  };

  const described = walked.map((): Entry | null => null);
  await parallelMapLimit(walked, concurrency, async (e, i) => {
    described[i] = await describeNode(e);
  });
  for (const entry of described) {
    if (entry) entries.set(entry.relativePath, entry);
  }

  logger.debug("scan complete", {
    root: absRoot,
    entries: entries.size,
    warnings: warnings.length,
    ms: Date.now() - t0,
  });
  return { entries, warnings };
}
