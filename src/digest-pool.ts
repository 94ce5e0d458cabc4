// src/digest-pool.ts
//
// Fixed-size pool of hashing workers. Callers queue a path and wait for its
// fingerprint; at most `workers` files are read at once no matter how many
// comparisons are outstanding.

import { DIGEST_WORKERS } from "./defaults.js";
import { DigestError, describeError, errorCode } from "./errors.js";
import { defaultHashAlg, fileDigest, type HashAlg } from "./hash.js";
import { silentLogger, type Logger } from "./logger.js";

export type HashFile = (absolutePath: string) => Promise<string>;

export interface DigestPoolOptions {
  workers?: number;
  algorithm?: HashAlg;
  logger?: Logger;
  /** Replaces the file hasher; the pool still bounds how many run at once. */
  hashFile?: HashFile;
}

type Job = {
  path: string;
  resolve: (fingerprint: string) => void;
  reject: (err: DigestError) => void;
};

type PoolState = "idle" | "running" | "stopping";

export class DigestPool {
  readonly size: number;
  readonly algorithm: HashAlg;
  private readonly logger: Logger;
  private readonly hashFile: HashFile;
  private readonly queue: Job[] = [];
  private readonly waiters: Array<(job: Job | null) => void> = [];
  private loops: Promise<void>[] = [];
  private state: PoolState = "idle";
  private active = 0;
  private peak = 0;

  constructor({
    workers = DIGEST_WORKERS,
    algorithm = defaultHashAlg(),
    logger,
    hashFile,
  }: DigestPoolOptions = {}) {
    if (!Number.isInteger(workers) || workers < 1) {
      throw new Error(`digest pool needs at least one worker (got ${workers})`);
    }
    this.size = workers;
    this.algorithm = algorithm;
    this.logger = logger ?? silentLogger;
    this.hashFile = hashFile ?? ((p) => fileDigest(this.algorithm, p));
  }

  get running(): boolean {
    return this.state === "running";
  }

  /** Highest number of hashes that were in flight at the same time. */
  get peakConcurrency(): number {
    return this.peak;
  }

  start(): void {
    if (this.state === "running") return;
    if (this.state === "stopping") {
      throw new Error("digest pool is stopping");
    }
    this.state = "running";
    this.loops = Array.from({ length: this.size }, (_, i) => this.work(i));
    this.logger.debug("digest pool started", {
      workers: this.size,
      algorithm: this.algorithm,
    });
  }

  digest(absolutePath: string): Promise<string> {
    if (this.state === "stopping") {
      return Promise.reject(
        new DigestError("digest pool is stopping", absolutePath),
      );
    }
    this.start();
    return new Promise<string>((resolve, reject) => {
      const job: Job = { path: absolutePath, resolve, reject };
      const waiter = this.waiters.shift();
      if (waiter) waiter(job);
      else this.queue.push(job);
    });
  }

  /** Finishes every queued job, then lets the workers exit. */
  async stop(): Promise<void> {
    if (this.state !== "running") return;
    this.state = "stopping";
    for (const waiter of this.waiters.splice(0)) waiter(null);
    await Promise.all(this.loops);
    this.loops = [];
    this.state = "idle";
    this.logger.debug("digest pool stopped", { peak: this.peak });
  }

  private next(): Promise<Job | null> {
    const job = this.queue.shift();
    if (job) return Promise.resolve(job);
    if (this.state !== "running") return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private async work(id: number): Promise<void> {
    while (true) {
      const job = await this.next();
      if (!job) return;
      this.active += 1;
      this.peak = Math.max(this.peak, this.active);
      try {
        job.resolve(await this.hashFile(job.path));
      } catch (err) {
        this.logger.debug("digest failed", {
          worker: id,
          path: job.path,
          err: describeError(err),
        });
        job.reject(
          err instanceof DigestError
            ? err
            : new DigestError(
                `failed to hash '${job.path}': ${describeError(err)}`,
                job.path,
                errorCode(err),
              ),
        );
      } finally {
        this.active -= 1;
      }
    }
  }
}
