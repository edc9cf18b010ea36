import { AdmissionError, ConflictError, NotFoundError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_RESULT_CACHE_TTL_MS,
  DEFAULT_SUBSCRIBER_BUFFER_SIZE,
  Job,
  type CachedResult,
} from "./job.js";
import type { JsonValue } from "./types.js";

const log = createLogger("registry");

export interface JobRegistryOptions {
  maxConcurrent: number;
  cleanupIntervalMs: number;
  bufferSize?: number;
  subscriberBufferSize?: number;
  resultCacheTtlMs?: number;
  now?: () => number;
}

/**
 * Owns every job. Admission is checked and the job inserted in one
 * synchronous step, so the ceiling holds under concurrent requests.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  // Result caches of evicted jobs, served until their own expiry.
  private readonly retainedResults = new Map<string, CachedResult>();
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: JobRegistryOptions) {
    this.now = options.now ?? Date.now;
  }

  get maxConcurrent(): number {
    return this.options.maxConcurrent;
  }

  get cleanupIntervalMs(): number {
    return this.options.cleanupIntervalMs;
  }

  create(connector: string, prompt: string, workDir?: string): Job {
    const active = this.count();
    if (active >= this.options.maxConcurrent) {
      log.warn("max concurrent jobs reached", { active, max: this.options.maxConcurrent });
      throw new AdmissionError(active, this.options.maxConcurrent);
    }

    const job = new Job({
      connector,
      prompt,
      workDir,
      bufferSize: this.options.bufferSize ?? DEFAULT_BUFFER_SIZE,
      subscriberBufferSize: this.options.subscriberBufferSize ?? DEFAULT_SUBSCRIBER_BUFFER_SIZE,
      resultCacheTtlMs: this.options.resultCacheTtlMs ?? DEFAULT_RESULT_CACHE_TTL_MS,
      now: this.now,
    });
    this.jobs.set(job.id, job);

    log.info("job created", { jobId: job.id, connector, workDir });
    return job;
  }

  get(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) throw new NotFoundError(id);
    return job;
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  list(): Job[] {
    return [...this.jobs.values()];
  }

  stop(id: string): void {
    const job = this.get(id);
    job.stop();
    log.info("job stop requested", { jobId: id, status: job.status });
  }

  remove(id: string): void {
    const job = this.get(id);
    if (!job.isTerminal) {
      log.warn("cannot remove active job", { jobId: id, status: job.status });
      throw new ConflictError(`cannot remove active job ${id} (status ${job.status})`);
    }
    this.jobs.delete(id);
    // A stopped job may still be tearing down; its spawner closes it later.
    if (job.isClosed) job.dispose();
    log.info("job removed", { jobId: id });
  }

  /** Jobs still pending or running. */
  count(): number {
    let active = 0;
    for (const job of this.jobs.values()) {
      if (!job.isTerminal) active++;
    }
    return active;
  }

  get size(): number {
    return this.jobs.size;
  }

  /** Cached `result` payload of a live or evicted job, if not expired. */
  getCachedResult(id: string): JsonValue | undefined {
    const job = this.jobs.get(id);
    if (job) return job.getCachedResultPayload();

    const retained = this.retainedResults.get(id);
    if (!retained) return undefined;
    if (this.now() >= retained.expiresAt) {
      this.retainedResults.delete(id);
      return undefined;
    }
    return retained.payload;
  }

  // --- Cleanup ---

  /** Removes terminal jobs completed at least one cleanup interval ago. */
  sweep(): number {
    const now = this.now();
    const threshold = this.options.cleanupIntervalMs;
    let removed = 0;

    for (const [id, job] of this.jobs) {
      const completedAt = job.completedAt;
      if (!job.isTerminal || !job.isClosed || !completedAt) continue;
      const age = now - completedAt.getTime();
      if (age < threshold) continue;

      const cached = job.getCachedResult();
      if (cached) this.retainedResults.set(id, cached);

      this.jobs.delete(id);
      job.dispose();
      removed++;
      log.debug("job cleaned up", { jobId: id, status: job.status, ageMs: age });
    }

    for (const [id, cached] of this.retainedResults) {
      if (now >= cached.expiresAt) this.retainedResults.delete(id);
    }

    if (removed > 0) {
      log.info("cleanup completed", { removed, remaining: this.jobs.size });
    }
    return removed;
  }

  startCleanup(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.cleanupIntervalMs);
    this.sweepTimer.unref();
    log.info("job cleanup started", { intervalMs: this.options.cleanupIntervalMs });
  }

  stopCleanup(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Stops every active job. */
  shutdown(): void {
    this.stopCleanup();
    for (const job of this.jobs.values()) {
      if (!job.isTerminal) {
        log.info("shutdown: stopping job", { jobId: job.id, pid: job.pid });
        job.stop();
      }
    }
  }
}
