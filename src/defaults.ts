// src/defaults.ts
//
// Tunables. The env overrides are read once at load time.

function envInt(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= min ? n : fallback;
}

// max actions applied at once
export const DEFAULT_CONCURRENCY = envInt("DIRMIRROR_CONCURRENCY", 10, 1);

// size of the digest pool used for inconclusive comparisons
export const DIGEST_WORKERS = envInt("DIRMIRROR_DIGEST_WORKERS", 4, 1);

// concurrent directory reads inside a single tree walk
export const SCAN_CONCURRENCY = 64;

// modification times are compared after truncation to this resolution
export const MTIME_RESOLUTION_MS = 1000;

// number of actions listed before asking for confirmation
export const PLAN_SAMPLE_LIMIT = 20;

export const COPY_CHUNK_BYTES = 1024 * 1024;

export const PROGRESS_INTERVAL_MS = envInt("DIRMIRROR_PROGRESS_MS", 1000);
