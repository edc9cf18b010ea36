import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { loadConfig, resolveConfigPath } from "./index.js";

let dir: string;

function writeConfig(relativePath: string, contents: string): void {
  const full = join(dir, relativePath);
  mkdirSync(join(full, ".."), { recursive: true });
  writeFileSync(full, contents);
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "runner-config-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("falls back to defaults without a file", () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.server).toEqual({ host: "localhost", port: 8080, sseKeepAliveMs: 30_000 });
    expect(config.process).toEqual({
      defaultTimeoutMs: 1_800_000,
      maxConcurrent: 10,
      cleanupIntervalMs: 300_000,
      bufferSize: 8192,
      subscriberBufferSize: 100,
      resultCacheTtlMs: 600_000,
      resourceSampleMs: 5_000,
    });
    expect(config.connectors.claude).toEqual({
      command: "claude",
      args: ["--output-format", "stream-json", "--verbose"],
      available: true,
    });
    expect(config.connectors.gemini).toEqual({ command: "gemini", args: [], available: false });
    expect(config.logging).toEqual({ level: "info", format: "text" });
  });

  it("matches the shipped example file", () => {
    const example = fileURLToPath(new URL("../../../../config.example.yaml", import.meta.url));

    expect(loadConfig({ path: example, env: {} })).toEqual(loadConfig({ cwd: dir, env: {} }));
  });

  it("reads config.yaml from the working directory", () => {
    writeConfig("config.yaml", "server:\n  port: 9090\nprocess:\n  maxConcurrent: 3\n");

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.server.port).toBe(9090);
    expect(config.server.host).toBe("localhost");
    expect(config.process.maxConcurrent).toBe(3);
    expect(config.process.bufferSize).toBe(8192);
  });

  it("searches config/config.yaml next", () => {
    writeConfig("config/config.yaml", "logging:\n  level: debug\n");

    expect(resolveConfigPath({ cwd: dir, env: {} })).toBe(join(dir, "config/config.yaml"));
    expect(loadConfig({ cwd: dir, env: {} }).logging.level).toBe("debug");
  });

  it("uses RUNNER_CONFIG when set", () => {
    writeConfig("custom.yaml", "server:\n  host: 0.0.0.0\n");

    expect(loadConfig({ cwd: dir, env: { RUNNER_CONFIG: "custom.yaml" } }).server.host).toBe("0.0.0.0");
  });

  it("treats an empty file as defaults", () => {
    writeConfig("config.yaml", "");

    expect(loadConfig({ cwd: dir, env: {} }).server.port).toBe(8080);
  });

  it("lets environment variables win over the file", () => {
    writeConfig("config.yaml", "server:\n  port: 9090\n");

    const config = loadConfig({
      cwd: dir,
      env: {
        RUNNER_PORT: "7070",
        RUNNER_MAX_CONCURRENT: "4",
        RUNNER_CLEANUP_INTERVAL_MS: "1000",
        RUNNER_LOG_FORMAT: "json",
      },
    });

    expect(config.server.port).toBe(7070);
    expect(config.process.maxConcurrent).toBe(4);
    expect(config.process.cleanupIntervalMs).toBe(1000);
    expect(config.logging.format).toBe("json");
  });

  it("overrides a connector command but keeps its args", () => {
    const config = loadConfig({ cwd: dir, env: { RUNNER_CLAUDE_COMMAND: "/opt/claude/bin/claude" } });

    expect(config.connectors.claude.command).toBe("/opt/claude/bin/claude");
    expect(config.connectors.claude.args).toEqual(["--output-format", "stream-json", "--verbose"]);
  });

  it("rejects non-numeric numbers from the environment", () => {
    expect(() => loadConfig({ cwd: dir, env: { RUNNER_PORT: "abc" } })).toThrow(
      'RUNNER_PORT must be a number, got "abc"'
    );
  });

  it("rejects values outside their range", () => {
    writeConfig("config.yaml", "process:\n  maxConcurrent: 0\n");

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/^invalid configuration: process\.maxConcurrent: /);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ cwd: dir, env: { RUNNER_LOG_LEVEL: "loud" } })).toThrow(/logging\.level/);
  });

  it("rejects a file that is not a mapping", () => {
    writeConfig("config.yaml", "- a\n- b\n");

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/must contain a mapping/);
  });

  it("rejects malformed YAML", () => {
    writeConfig("config.yaml", "server: [unclosed\n");

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/^invalid YAML in /);
  });

  it("reports a missing explicit file", () => {
    expect(() => loadConfig({ cwd: dir, path: "nope.yaml", env: {} })).toThrow(/^failed to read config file /);
  });
});
