import fsp from "node:fs/promises";
import { dirname, join } from "node:path";
import { StructuredLogger, type LogEntry, type Logger } from "../logger.js";
import type { Entry } from "../plan.js";

export type Roots = {
  source: string;
  target: string;
};

export async function mkCase(tmpBase: string, name: string): Promise<Roots> {
  const base = join(tmpBase, name);
  const source = join(base, "source");
  const target = join(base, "target");
  await fsp.mkdir(source, { recursive: true });
  await fsp.mkdir(target, { recursive: true });
  return { source, target };
}

/** Write a file (creating parents) and pin its mtime to `mtimeMs` if given. */
export async function put(
  root: string,
  rel: string,
  contents: string,
  mtimeMs?: number,
): Promise<string> {
  const abs = join(root, ...rel.split("/"));
  await fsp.mkdir(dirname(abs), { recursive: true });
  await fsp.writeFile(abs, contents);
  if (mtimeMs != null) {
    const t = new Date(mtimeMs);
    await fsp.utimes(abs, t, t);
  }
  return abs;
}

export async function fileExists(p: string) {
  try {
    return (await fsp.stat(p)).isFile();
  } catch {
    return false;
  }
}

export async function dirExists(p: string) {
  return !!(await fsp
    .stat(p)
    .then((st) => st.isDirectory())
    .catch(() => false));
}

export function fileEntry(
  relativePath: string,
  size: number,
  modifiedTime: number,
  root = "/src",
): Entry {
  return {
    relativePath,
    absolutePath: `${root}/${relativePath}`,
    size,
    modifiedTime,
    isDirectory: false,
    permissionMode: 0o644,
  };
}

export function dirEntry(relativePath: string, root = "/src"): Entry {
  return {
    relativePath,
    absolutePath: `${root}/${relativePath}`,
    size: 0,
    modifiedTime: 1_700_000_000_000,
    isDirectory: true,
    permissionMode: 0o755,
  };
}

export function mapOf(...entries: Entry[]): Map<string, Entry> {
  return new Map(entries.map((e) => [e.relativePath, e]));
}

export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    logger: new StructuredLogger({ sink: (e) => entries.push(e) }),
    entries,
  };
}
