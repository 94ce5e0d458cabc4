// src/ignore.ts
import ignore from "ignore";
import path from "node:path";
import { readFile } from "node:fs/promises";
import { IGNORE_FILE } from "./constants.js";
import { isMissing } from "./errors.js";

/**
 * True when `relativePath` should be left out of a scan. Directory callers
 * pass `isDirectory` so that rules ending in "/" apply to them.
 */
export type IgnorePredicate = (
  relativePath: string,
  isDirectory?: boolean,
) => boolean;

export function normalizeR(r: string): string {
  // rpath normalization; keep empty "" for root-safe callers
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

/** Lines of an ignore file; comments and blank lines dropped. */
export function parseIgnoreFile(contents: string): string[] {
  return normalizeIgnorePatterns(contents.split(/\r?\n/));
}

/** Rules from `<root>/.sync-ignore`, or [] when there is no such file. */
export async function readIgnoreFile(root: string): Promise<string[]> {
  try {
    return parseIgnoreFile(await readFile(path.join(root, IGNORE_FILE), "utf8"));
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

/** commander collector for `-e, --exclude`: repeatable and comma-separated. */
export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return previous.concat(parts);
}

export function createIgnorer(patterns: readonly string[] = []): IgnorePredicate {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) return () => false;
  const ig = ignore().add(cleaned);
  return (relativePath, isDirectory = false) => {
    const r = normalizeR(relativePath);
    if (!r) return false;
    return ig.ignores(isDirectory ? `${r}/` : r);
  };
}

/**
 * Predicate for the source scan: the ignore file's own rules plus the extra
 * (CLI) rules. The ignore file itself is always skipped.
 */
export async function loadSourceIgnorer(
  sourceRoot: string,
  extra: readonly string[] = [],
): Promise<{ ignores: IgnorePredicate; patterns: string[] }> {
  const patterns = normalizeIgnorePatterns([
    ...extra,
    ...(await readIgnoreFile(sourceRoot)),
  ]);
  const rules = createIgnorer(patterns);
  return {
    patterns,
    ignores: (relativePath, isDirectory = false) =>
      (!isDirectory && normalizeR(relativePath) === IGNORE_FILE) ||
      rules(relativePath, isDirectory),
  };
}
