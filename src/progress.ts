// src/progress.ts
import { PROGRESS_INTERVAL_MS } from "./defaults.js";
import type { ActionError } from "./errors.js";
import type { ProgressObserver } from "./executor.js";
import type { Logger } from "./logger.js";
import type { Action } from "./plan.js";

export type ProgressSnapshot = {
  totalActions: number;
  completedActions: number;
  failedActions: number;
  totalBytes: number;
  copiedBytes: number;
  percent: number;
  bytesPerSecond: number;
  etaMs: number | null;
  currentFile?: string;
};

/**
 * Turns executor events into periodic "progress" log lines. Purely an
 * observer: it keeps counters and never touches the filesystem.
 */
export class ProgressReporter implements ProgressObserver {
  private totalActions = 0;
  private completedActions = 0;
  private failedActions = 0;
  private totalBytes = 0;
  private copiedBytes = 0;
  private startedAt = 0;
  private lastEmit = 0;
  private currentFile?: string;

  constructor(
    private readonly logger: Logger,
    private readonly intervalMs = PROGRESS_INTERVAL_MS,
    private readonly clock: () => number = Date.now,
  ) {}

  onApplyStarted(totalActions: number, totalBytes: number): void {
    this.totalActions = totalActions;
    this.totalBytes = totalBytes;
    this.startedAt = this.clock();
    this.lastEmit = this.startedAt;
  }

  onFileStarted(relativePath: string): void {
    this.currentFile = relativePath;
  }

  onBytesCopied(_relativePath: string, bytes: number): void {
    this.copiedBytes += bytes;
    this.emit();
  }

  onActionFinished(_action: Action, error?: ActionError): void {
    this.completedActions += 1;
    if (error) this.failedActions += 1;
    this.emit(this.completedActions === this.totalActions);
  }

  snapshot(): ProgressSnapshot {
    const elapsed = Math.max(1, this.clock() - this.startedAt);
    const bytesPerSecond = Math.round((this.copiedBytes / elapsed) * 1000);
    const remaining = Math.max(0, this.totalBytes - this.copiedBytes);
    const percent =
      this.totalBytes > 0
        ? Math.min(100, Math.round((this.copiedBytes / this.totalBytes) * 100))
        : this.totalActions > 0
          ? Math.round((this.completedActions / this.totalActions) * 100)
          : 100;
    return {
      totalActions: this.totalActions,
      completedActions: this.completedActions,
      failedActions: this.failedActions,
      totalBytes: this.totalBytes,
      copiedBytes: this.copiedBytes,
      percent,
      bytesPerSecond,
      etaMs:
        bytesPerSecond > 0 ? Math.round((remaining / bytesPerSecond) * 1000) : null,
      currentFile: this.currentFile,
    };
  }

  private emit(force = false): void {
    const now = this.clock();
    if (!force && this.intervalMs > 0 && now - this.lastEmit < this.intervalMs) {
      return;
    }
    this.lastEmit = now;
    this.logger.info("progress", { ...this.snapshot() });
  }
}

export function formatBytes(n: number): string {
  if (n < 1024) return `${n} B`;
  const units = ["KiB", "MiB", "GiB", "TiB"];
  let v = n / 1024;
  let i = 0;
  while (v >= 1024 && i < units.length - 1) {
    v /= 1024;
    i++;
  }
  return `${v.toFixed(1)} ${units[i]}`;
}
