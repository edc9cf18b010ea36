import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { configSchema, type RunnerConfig } from "../config/index.js";
import type { ChildLike, SpawnProcess } from "../jobs/spawner.js";

/** In-process stand-in for a child process with piped stdout/stderr. */
export class FakeChild extends EventEmitter implements ChildLike {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: (NodeJS.Signals | number | undefined)[] = [];
  exited = false;
  /** When set, exiting leaves the pipes open, as a surviving grandchild would. */
  pipesHeld = false;
  private pipesClosed = false;

  constructor(readonly pid: number | undefined = 4242) {
    super();
  }

  emitLine(line: string, stream: "stdout" | "stderr" = "stdout"): void {
    this[stream].write(`${line}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    if (!this.pipesHeld) this.closePipes();
    setImmediate(() => this.emit("exit", code, signal));
  }

  closePipes(): void {
    if (this.pipesClosed) return;
    this.pipesClosed = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit("close"));
  }

  failToStart(error: Error): void {
    this.exited = true;
    this.closePipes();
    this.emit("error", error);
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    this.exit(null, typeof signal === "string" ? signal : "SIGTERM");
    return true;
  }
}

export interface SpawnCall {
  executable: string;
  args: string[];
  cwd?: string;
}

export function createFakeSpawn(): {
  spawnProcess: SpawnProcess;
  children: FakeChild[];
  calls: SpawnCall[];
  last(): FakeChild;
} {
  const children: FakeChild[] = [];
  const calls: SpawnCall[] = [];
  return {
    spawnProcess: (executable, args, options) => {
      const child = new FakeChild(4242 + children.length);
      children.push(child);
      calls.push({ executable, args: [...args], cwd: options.cwd });
      return child;
    },
    children,
    calls,
    last() {
      const child = children[children.length - 1];
      if (!child) throw new Error("no child process was spawned");
      return child;
    },
  };
}

export function testConfig(overrides: Partial<RunnerConfig["process"]> = {}): RunnerConfig {
  const config = configSchema.parse({
    server: { sseKeepAliveMs: 0 },
    process: { resourceSampleMs: 0, ...overrides },
    connectors: {
      claude: { command: "claude", args: [], available: true },
      gemini: { command: "gemini", args: [], available: false },
    },
  });
  return config;
}

/** Resolves after pending I/O callbacks (decoded lines, exit and close events) ran. */
export function flushIo(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
