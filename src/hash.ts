// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import fs from "node:fs/promises";
import { createHash, getHashes } from "node:crypto";

export const HASH_STREAM_CUTOFF = 8_000_000; // ~8MB; small files do one-shot hashing
export const STREAM_HWM = 4 * 1024 * 1024;

const ENCODING = "base64";

// Curated set we’re willing to expose
export const CURATED_HASH_ALGOS = [
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
  "blake2s256",
  "sha3-256",
  "sha3-512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "sha256";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts short shorthands "blake2b" -> blake2b512, "blake2s" -> blake2s256.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  const list = listSupportedHashes();
  if (!requested) return defaultHashAlg();
  const low = requested.toLowerCase();
  const alias =
    low === "blake2b" ? "blake2b512" : low === "blake2s" ? "blake2s256" : low;
  const found = list.find((h) => h === alias);
  if (found) return found;
  throw new Error(
    `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${list.join(", ")}`,
  );
}

/**
 * Fingerprint of a file's contents as "<alg>:<base64>". Small files are read
 * in one go, larger ones go through a backpressured stream.
 */
export async function fileDigest(
  alg: HashAlg,
  path: string,
  size?: number,
): Promise<string> {
  const n = size ?? (await fs.stat(path)).size;

  if (n <= HASH_STREAM_CUTOFF) {
    const buf = await fs.readFile(path);
    return `${alg}:${createHash(alg).update(buf).digest(ENCODING)}`;
  }

  const h = createHash(alg);
  await pipeline(
    createReadStream(path, { highWaterMark: STREAM_HWM }),
    async (src: AsyncIterable<Buffer>) => {
      for await (const chunk of src) {
        h.update(chunk);
      }
    },
  );
  return `${alg}:${h.digest(ENCODING)}`;
}
