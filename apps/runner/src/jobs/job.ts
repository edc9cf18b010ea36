import { randomUUID } from "node:crypto";
import { createLogger } from "../logging/logger.js";
import { EventChannel } from "./channel.js";
import { RingBuffer } from "./ring-buffer.js";
import {
  createEvent,
  isTerminalStatus,
  type JobEvent,
  type JobResult,
  type JobSnapshot,
  type JobStatus,
  type JsonValue,
  type ProcessHandle,
  type ResourceStats,
  type TerminalStatus,
} from "./types.js";

const log = createLogger("job");

export const DEFAULT_BUFFER_SIZE = 8192;
export const DEFAULT_SUBSCRIBER_BUFFER_SIZE = 100;
export const DEFAULT_RESULT_CACHE_TTL_MS = 10 * 60 * 1000;

export const STOPPED_EXIT_CODE = -1;

export interface JobInit {
  id?: string;
  connector: string;
  prompt: string;
  workDir?: string;
  bufferSize?: number;
  subscriberBufferSize?: number;
  resultCacheTtlMs?: number;
  now?: () => number;
}

export interface CachedResult {
  payload: JsonValue;
  expiresAt: number;
}

export interface Subscription {
  readonly id: string;
  readonly events: EventChannel<JobEvent>;
  unsubscribe(): void;
}

/**
 * One managed invocation of an external command: its event history, live
 * subscribers, result and the handles needed to cancel it.
 */
export class Job {
  readonly id: string;
  readonly connector: string;
  readonly prompt: string;
  readonly workDir?: string;
  readonly startedAt: Date;

  private _status: JobStatus = "pending";
  private _completedAt?: Date;
  private result?: JobResult;
  private resultCache?: CachedResult;

  private readonly buffer: RingBuffer<JobEvent>;
  private readonly subscribers = new Map<string, EventChannel<JobEvent>>();
  private readonly subscriberBufferSize: number;
  private readonly resultCacheTtlMs: number;
  private readonly now: () => number;

  private controller?: AbortController;
  private process?: ProcessHandle;
  private stopRequested = false;
  private closed = false;
  private _resourceStats?: ResourceStats;

  constructor(init: JobInit) {
    this.now = init.now ?? Date.now;
    this.id = init.id ?? randomUUID();
    this.connector = init.connector;
    this.prompt = init.prompt;
    this.workDir = init.workDir || undefined;
    this.startedAt = new Date(this.now());
    this.buffer = new RingBuffer<JobEvent>(init.bufferSize ?? DEFAULT_BUFFER_SIZE);
    this.subscriberBufferSize = init.subscriberBufferSize ?? DEFAULT_SUBSCRIBER_BUFFER_SIZE;
    this.resultCacheTtlMs = init.resultCacheTtlMs ?? DEFAULT_RESULT_CACHE_TTL_MS;
  }

  get status(): JobStatus {
    return this._status;
  }

  get completedAt(): Date | undefined {
    return this._completedAt;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  /** True once the done event went out and the subscriber channels are closed. */
  get isClosed(): boolean {
    return this.closed;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  get resourceStats(): ResourceStats | undefined {
    return this._resourceStats;
  }

  set resourceStats(stats: ResourceStats | undefined) {
    this._resourceStats = stats;
  }

  // --- Events ---

  /** No-op once the job is closed: `done` is always the last event. */
  appendEvent(event: JobEvent): void {
    if (this.closed) {
      log.debug("event after close ignored", { jobId: this.id, kind: event.kind });
      return;
    }
    this.buffer.push(event);

    if (event.kind === "result") {
      this.resultCache = { payload: event.payload, expiresAt: this.now() + this.resultCacheTtlMs };
    }

    for (const [subscriberId, channel] of this.subscribers) {
      if (!channel.offer(event)) {
        log.debug("subscriber channel full, event dropped", {
          jobId: this.id,
          subscriberId,
          kind: event.kind,
        });
      }
    }
  }

  /** Buffered history, oldest first. */
  snapshot(): JobEvent[] {
    return this.buffer.snapshot();
  }

  get eventCount(): number {
    return this.buffer.length;
  }

  subscribe(subscriberId: string = randomUUID()): Subscription {
    const events = new EventChannel<JobEvent>(this.subscriberBufferSize);
    if (this.closed) {
      events.close();
    } else {
      this.subscribers.get(subscriberId)?.close();
      this.subscribers.set(subscriberId, events);
    }
    return {
      id: subscriberId,
      events,
      unsubscribe: () => this.unsubscribe(subscriberId),
    };
  }

  unsubscribe(subscriberId: string): void {
    const channel = this.subscribers.get(subscriberId);
    if (!channel) return;
    this.subscribers.delete(subscriberId);
    channel.close();
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  // --- Result ---

  getResult(): JobResult | undefined {
    return this.result;
  }

  getCachedResult(): CachedResult | undefined {
    if (!this.resultCache || this.now() >= this.resultCache.expiresAt) return undefined;
    return this.resultCache;
  }

  getCachedResultPayload(): JsonValue | undefined {
    return this.getCachedResult()?.payload;
  }

  // --- Lifecycle (driven by the spawner) ---

  markRunning(): void {
    if (this._status !== "pending") {
      throw new Error(`job ${this.id} cannot start from status ${this._status}`);
    }
    this._status = "running";
  }

  attachRun(controller: AbortController): void {
    this.controller = controller;
    if (this.stopRequested) controller.abort();
  }

  attachProcess(handle: ProcessHandle): void {
    this.process = handle;
    if (this.stopRequested) handle.kill("SIGKILL");
  }

  get hasRun(): boolean {
    return this.controller !== undefined;
  }

  /**
   * Requests cancellation. The job turns `stopped` right away; the spawner
   * observes the aborted signal and finishes the teardown.
   */
  stop(): void {
    if (this.stopRequested || this.closed) return;
    this.stopRequested = true;

    this.controller?.abort();
    this.process?.kill("SIGKILL");

    if (!this.isTerminal) {
      this.transition("stopped");
      this.result ??= { exitCode: STOPPED_EXIT_CODE, errorMessage: "Job stopped by request" };
    }

    if (!this.controller) {
      this.complete("stopped", this.result ?? { exitCode: STOPPED_EXIT_CODE }, "Job stopped before launch");
    }
  }

  get wasStopRequested(): boolean {
    return this.stopRequested;
  }

  /**
   * Terminal side effects, applied once: status, result, optional error
   * event, the done event, then every subscriber channel is closed.
   */
  complete(status: TerminalStatus, result: JobResult, errorMessage?: string): void {
    if (this.closed) return;

    this.transition(status);
    this.result ??= result;

    if (errorMessage) {
      this.appendEvent(createEvent("error", { error: errorMessage }, this.now()));
    }
    this.appendEvent(
      createEvent(
        "done",
        { processId: this.id, status: this._status, result: resultToJson(this.result) },
        this.now()
      )
    );

    this.closed = true;
    for (const [subscriberId, channel] of this.subscribers) {
      channel.close();
      this.subscribers.delete(subscriberId);
    }

    this.process = undefined;
    this.controller = undefined;
  }

  private transition(status: JobStatus): void {
    if (this.isTerminal) return;
    this._status = status;
    if (isTerminalStatus(status)) {
      this._completedAt = new Date(this.now());
    }
  }

  // --- Views ---

  toSnapshot(): JobSnapshot {
    return {
      id: this.id,
      connector: this.connector,
      prompt: this.prompt,
      ...(this.workDir ? { workDir: this.workDir } : {}),
      status: this._status,
      startedAt: this.startedAt.toISOString(),
      ...(this._completedAt ? { completedAt: this._completedAt.toISOString() } : {}),
      ...(this.result ? { result: this.result } : {}),
      ...(this.pid !== undefined ? { pid: this.pid } : {}),
      eventCount: this.buffer.length,
      ...(this._resourceStats ? { resourceStats: this._resourceStats } : {}),
    };
  }

  /** Releases buffered events once the job leaves the registry. */
  dispose(): void {
    this.buffer.clear();
  }
}

function resultToJson(result: JobResult | undefined): JsonValue {
  if (!result) return null;
  const out: { [key: string]: JsonValue } = { exitCode: result.exitCode };
  if (result.output !== undefined) out.output = result.output;
  if (result.errorMessage !== undefined) out.errorMessage = result.errorMessage;
  return out;
}
