// src/path-rel.ts
import path from "node:path";

// Relative paths ("rpaths") are always posix style, with no leading "./" or "/".
export function toRel(abs: string, root: string): string {
  const rel = path.relative(root, abs);
  if (!rel || rel === ".") return "";
  return path.sep === "/" ? rel : rel.split(path.sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel ? path.join(root, ...rel.split("/")) : root;
}

export function depthOf(rel: string): number {
  return rel === "" ? 0 : rel.split("/").length;
}

/** "a/b/c" -> ["a", "a/b"] */
export function ancestorsOf(rel: string): string[] {
  const parts = rel.split("/");
  const out: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    out.push(parts.slice(0, i).join("/"));
  }
  return out;
}

export function isSameOrNested(a: string, b: string): boolean {
  const A = path.resolve(a);
  const B = path.resolve(b);
  if (A === B) return true;
  const inside = (outer: string, inner: string) => {
    const rel = path.relative(outer, inner);
    return !!rel && !rel.startsWith("..") && !path.isAbsolute(rel);
  };
  return inside(A, B) || inside(B, A);
}
