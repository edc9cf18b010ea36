import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import pidusage from "pidusage";
import type { Connector, ConnectorCommand } from "../connectors/types.js";
import { ConflictError, LaunchError, ParseError, errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { STOPPED_EXIT_CODE, type Job } from "./job.js";
import { MAX_LINE_CHARS, readLines } from "./line-reader.js";
import { createEvent, type JsonValue, type ParsedLine } from "./types.js";

const log = createLogger("spawner");

export const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_STDIO_DRAIN_MS = 1000;
const LOG_PREVIEW_CHARS = 500;

/** The slice of a ChildProcess the spawner relies on. */
export interface ChildLike extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (
  executable: string,
  args: readonly string[],
  options: { cwd?: string; env: NodeJS.ProcessEnv }
) => ChildLike;

export type SampleUsage = (pid: number) => Promise<{ cpu: number; memory: number }>;

export interface SpawnerOptions {
  defaultTimeoutMs?: number;
  /** CPU/memory sampling period for running processes; 0 disables. */
  resourceSampleMs?: number;
  /**
   * How long output may keep flowing after the process exited. Past it the
   * pipes are destroyed, e.g. when a leftover grandchild still holds them.
   */
  stdioDrainMs?: number;
  maxLineChars?: number;
  spawnProcess?: SpawnProcess;
  sampleUsage?: SampleUsage;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

export interface SpawnOptions {
  timeoutMs?: number;
}

type ProcessOutcome =
  | { type: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { type: "error"; error: Error }
  | { type: "aborted" };

class RunTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Job timed out after ${timeoutMs}ms`);
  }
}

const defaultSpawnProcess: SpawnProcess = (executable, args, options) =>
  spawn(executable, [...args], {
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
  });

function childEnv(base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env = { ...base };
  // Claude refuses to start inside another Claude session.
  delete env.CLAUDECODE;
  return env;
}

function preview(payload: JsonValue): string {
  const text = JSON.stringify(payload);
  return text.length > LOG_PREVIEW_CHARS ? `${text.slice(0, LOG_PREVIEW_CHARS)}... (truncated)` : text;
}

// "exit", not "close": the pipes may outlive the process.
function waitForExit(child: ChildLike): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    child.once("error", (error: Error) => resolve({ type: "error", error }));
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) =>
      resolve({ type: "exit", code, signal })
    );
  });
}

function waitForAbort(signal: AbortSignal): { promise: Promise<ProcessOutcome>; dispose: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<ProcessOutcome>((resolve) => {
    if (signal.aborted) {
      resolve({ type: "aborted" });
      return;
    }
    onAbort = () => resolve({ type: "aborted" });
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (onAbort) signal.removeEventListener("abort", onAbort);
    },
  };
}

function abortMessage(signal: AbortSignal): string {
  return signal.reason instanceof RunTimeoutError ? signal.reason.message : "Job stopped by request";
}

/**
 * Drives a job from `pending` to a terminal state by supervising one
 * external process. stdout and stderr are read concurrently; lines keep
 * their order within each stream and interleave across the two by arrival.
 */
export class Spawner {
  private readonly defaultTimeoutMs: number;
  private readonly resourceSampleMs: number;
  private readonly stdioDrainMs: number;
  private readonly maxLineChars: number;
  private readonly spawnProcess: SpawnProcess;
  private readonly sampleUsage: SampleUsage;
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => number;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: SpawnerOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.resourceSampleMs = options.resourceSampleMs ?? 0;
    this.stdioDrainMs = options.stdioDrainMs ?? DEFAULT_STDIO_DRAIN_MS;
    this.maxLineChars = options.maxLineChars ?? MAX_LINE_CHARS;
    this.spawnProcess = options.spawnProcess ?? defaultSpawnProcess;
    this.sampleUsage = options.sampleUsage ?? pidusage;
    this.env = childEnv(options.env ?? process.env);
    this.now = options.now ?? Date.now;
  }

  /** Starts supervising `job` and returns at once. */
  spawn(job: Job, connector: Connector, options: SpawnOptions = {}): void {
    if (job.status !== "pending" || job.hasRun) {
      throw new ConflictError(`job ${job.id} was already started (status ${job.status})`);
    }

    let command: ConnectorCommand;
    try {
      command = connector.buildCommand(job.prompt);
    } catch (err) {
      const message = `failed to build command: ${errorMessage(err)}`;
      job.complete("failed", { exitCode: 1, errorMessage: message }, message);
      throw new LaunchError(message, { cause: err });
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    job.markRunning();
    job.attachRun(controller);

    const timer = setTimeout(() => controller.abort(new RunTimeoutError(timeoutMs)), timeoutMs);

    log.info("spawning process", { jobId: job.id, connector: connector.name(), timeoutMs });

    const task: Promise<void> = this.run(job, connector, command, controller.signal)
      .catch((err: unknown) => {
        const message = `runner crashed: ${errorMessage(err)}`;
        log.error(message, { jobId: job.id });
        job.complete("failed", { exitCode: 1, errorMessage: message }, message);
      })
      .finally(() => {
        clearTimeout(timer);
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  get activeRuns(): number {
    return this.inFlight.size;
  }

  /** Resolves once every run started so far has finished. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  private async run(job: Job, connector: Connector, command: ConnectorCommand, signal: AbortSignal): Promise<void> {
    const startedAt = this.now();

    if (signal.aborted) {
      const message = abortMessage(signal);
      job.complete("stopped", { exitCode: STOPPED_EXIT_CODE, errorMessage: message }, message);
      return;
    }

    let child: ChildLike;
    try {
      child = this.spawnProcess(command.executable, command.args, { cwd: job.workDir, env: this.env });
    } catch (err) {
      this.failLaunch(job, err);
      return;
    }

    const exited = waitForExit(child);
    const abort = waitForAbort(signal);
    job.attachProcess(child);

    log.info("process started", {
      jobId: job.id,
      connector: connector.name(),
      pid: child.pid,
      command: command.executable,
      args: command.args,
      workDir: job.workDir,
    });

    const stopReading = new AbortController();
    const reading = Promise.all([
      this.readOutput(child.stdout, job, connector, stopReading.signal),
      this.readOutput(child.stderr, job, connector, stopReading.signal),
    ]);
    const sampler = this.startSampling(job, child);

    try {
      const outcome = await Promise.race([exited, abort.promise]);

      if (outcome.type === "aborted") {
        log.warn("process cancelled", { jobId: job.id, reason: abortMessage(signal) });
        child.kill("SIGKILL");
        await exited;
      } else if (outcome.type === "error" && !signal.aborted) {
        stopReading.abort();
        child.stdout?.destroy();
        child.stderr?.destroy();
        this.failLaunch(job, outcome.error);
        return;
      }

      const readErrors = await this.finishReading(job, child, reading, stopReading);
      const durationMs = this.now() - startedAt;

      // A stop may land while the output drains after a clean exit.
      if (signal.aborted || outcome.type !== "exit") {
        const message = abortMessage(signal);
        job.complete("stopped", { exitCode: STOPPED_EXIT_CODE, errorMessage: message }, message);
        return;
      }

      if (outcome.code === 0 && readErrors.length === 0) {
        const output = job.getCachedResultPayload();
        job.complete("completed", { exitCode: 0, ...(output !== undefined ? { output } : {}) });
        log.info("process completed", { jobId: job.id, connector: connector.name(), exitCode: 0, durationMs });
        return;
      }

      const exitCode = outcome.code ?? 1;
      const message =
        outcome.code === 0
          ? `failed to read output: ${readErrors.map((err) => err.message).join("; ")}`
          : outcome.code !== null
            ? `exit status ${outcome.code}`
            : `terminated by signal ${outcome.signal ?? "unknown"}`;
      log.error("process failed", { jobId: job.id, connector: connector.name(), exitCode, durationMs, error: message });
      job.complete("failed", { exitCode: exitCode === 0 ? 1 : exitCode, errorMessage: message }, message);
    } finally {
      abort.dispose();
      if (sampler) clearInterval(sampler);
      const result = job.getResult();
      log.info("execution finished", {
        jobId: job.id,
        status: job.status,
        exitCode: result?.exitCode,
        totalDurationMs: this.now() - startedAt,
      });
    }
  }

  /** Waits for the readers to reach EOF, destroying the pipes if they outlive the grace period. */
  private async finishReading(
    job: Job,
    child: ChildLike,
    reading: Promise<(Error | undefined)[]>,
    stopReading: AbortController
  ): Promise<Error[]> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const drained = await Promise.race([
      reading.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.stdioDrainMs);
      }),
    ]);
    clearTimeout(timer);

    if (!drained) {
      log.warn("output still open after exit, closing pipes", { jobId: job.id, graceMs: this.stdioDrainMs });
      stopReading.abort();
      child.stdout?.destroy();
      child.stderr?.destroy();
    }
    return (await reading).filter((err): err is Error => err !== undefined);
  }

  private failLaunch(job: Job, err: unknown): void {
    const error = new LaunchError(`failed to start command: ${errorMessage(err)}`, { cause: err });
    log.error(error.message, { jobId: job.id });
    job.complete("failed", { exitCode: 1, errorMessage: error.message }, error.message);
  }

  private async readOutput(
    stream: Readable | null,
    job: Job,
    connector: Connector,
    stopped: AbortSignal
  ): Promise<Error | undefined> {
    if (!stream) return undefined;
    const lines = readLines(stream, {
      maxLineChars: this.maxLineChars,
      onOversized: (length) => log.warn("line too long, dropped", { jobId: job.id, length }),
    });
    try {
      for await (const line of lines) {
        if (stopped.aborted) break;
        this.handleLine(line, job, connector);
      }
      return undefined;
    } catch (err) {
      if (stopped.aborted) return undefined;
      log.error("error reading output", { jobId: job.id, error: errorMessage(err) });
      return err instanceof Error ? err : new Error(String(err));
    }
  }

  private handleLine(line: string, job: Job, connector: Connector): void {
    let parsed: ParsedLine | null;
    try {
      parsed = connector.parseLine(line);
    } catch (err) {
      const parseError = new ParseError(line, { cause: err });
      log.warn(parseError.message, { jobId: job.id, line: line.slice(0, LOG_PREVIEW_CHARS) });
      return;
    }
    if (!parsed) return;

    const event = createEvent(parsed.kind, parsed.payload, this.now());
    job.appendEvent(event);

    if (event.kind === "result") {
      log.info("result data cached", {
        jobId: job.id,
        connector: connector.name(),
        dataSize: JSON.stringify(event.payload).length,
      });
    }
    log.debug("cli event", { jobId: job.id, kind: event.kind, data: preview(event.payload) });
  }

  private startSampling(job: Job, child: ChildLike): ReturnType<typeof setInterval> | undefined {
    const pid = child.pid;
    if (this.resourceSampleMs <= 0 || pid === undefined) return undefined;
    const timer = setInterval(() => {
      if (job.isTerminal) return;
      this.sampleUsage(pid)
        .then((stats) => {
          job.resourceStats = { cpu: stats.cpu, memory: stats.memory, sampledAt: this.now() };
        })
        .catch((err: unknown) => {
          log.debug("resource sample failed", { jobId: job.id, error: errorMessage(err) });
        });
    }, this.resourceSampleMs);
    timer.unref();
    return timer;
  }
}
