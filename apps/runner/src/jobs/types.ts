export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JobStatus = "pending" | "running" | "completed" | "failed" | "stopped";

export type TerminalStatus = Extract<JobStatus, "completed" | "failed" | "stopped">;

export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
  return status === "completed" || status === "failed" || status === "stopped";
}

export type JobEventKind = "output" | "result" | "error" | "done";

export interface JobEvent {
  readonly kind: JobEventKind;
  readonly payload: JsonValue;
  /** ISO-8601 */
  readonly timestamp: string;
}

/** What a connector produces from one line; the spawner stamps the time. */
export interface ParsedLine {
  kind: Extract<JobEventKind, "output" | "result">;
  payload: JsonValue;
}

export interface JobResult {
  exitCode: number;
  output?: JsonValue;
  errorMessage?: string;
}

export interface ResourceStats {
  cpu: number;
  memory: number;
  sampledAt: number;
}

export interface JobSnapshot {
  id: string;
  connector: string;
  prompt: string;
  workDir?: string;
  status: JobStatus;
  startedAt: string;
  completedAt?: string;
  result?: JobResult;
  pid?: number;
  eventCount: number;
  resourceStats?: ResourceStats;
}

/** The part of a child process a job needs in order to stop it. */
export interface ProcessHandle {
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
}

export function createEvent(kind: JobEventKind, payload: JsonValue, now: number = Date.now()): JobEvent {
  return Object.freeze({ kind, payload, timestamp: new Date(now).toISOString() });
}
