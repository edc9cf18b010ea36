import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorMessage } from "../errors.js";
import { configSchema, type RunnerConfig } from "./schema.js";

export { configSchema } from "./schema.js";
export type { RunnerConfig, ConnectorConfig } from "./schema.js";

export interface LoadConfigOptions {
  /** Explicit YAML path. Wins over RUNNER_CONFIG and the search path. */
  path?: string;
  cwd?: string;
  env?: Record<string, string | undefined>;
}

const SEARCH_PATHS = ["config.yaml", "config/config.yaml"];

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// --- File ---

export function resolveConfigPath(options: LoadConfigOptions = {}): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.path ?? options.env?.RUNNER_CONFIG;
  if (explicit) return resolve(cwd, explicit);
  for (const candidate of SEARCH_PATHS) {
    const full = resolve(cwd, candidate);
    if (existsSync(full)) return full;
  }
  return undefined;
}

function readConfigFile(filePath: string): Raw {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`failed to read config file ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

// --- Env overrides ---

type EnvTarget = { section: string; key: string; kind: "string" | "number" };

const ENV_OVERRIDES: Record<string, EnvTarget> = {
  RUNNER_HOST: { section: "server", key: "host", kind: "string" },
  RUNNER_PORT: { section: "server", key: "port", kind: "number" },
  RUNNER_MAX_CONCURRENT: { section: "process", key: "maxConcurrent", kind: "number" },
  RUNNER_DEFAULT_TIMEOUT_MS: { section: "process", key: "defaultTimeoutMs", kind: "number" },
  RUNNER_CLEANUP_INTERVAL_MS: { section: "process", key: "cleanupIntervalMs", kind: "number" },
  RUNNER_BUFFER_SIZE: { section: "process", key: "bufferSize", kind: "number" },
  RUNNER_LOG_LEVEL: { section: "logging", key: "level", kind: "string" },
  RUNNER_LOG_FORMAT: { section: "logging", key: "format", kind: "string" },
};

const CONNECTOR_COMMAND_OVERRIDES = {
  RUNNER_CLAUDE_COMMAND: "claude",
  RUNNER_GEMINI_COMMAND: "gemini",
} as const satisfies Record<string, keyof RunnerConfig["connectors"]>;

function section(target: Raw, key: string): Raw {
  const existing = target[key];
  if (isRecord(existing)) return existing;
  const created: Raw = {};
  target[key] = created;
  return created;
}

function applyEnv(raw: Raw, env: Record<string, string | undefined>): Raw {
  for (const [name, target] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name]?.trim();
    if (!value) continue;
    if (target.kind === "number") {
      const num = Number(value);
      if (!Number.isFinite(num)) {
        throw new ConfigError(`${name} must be a number, got "${value}"`);
      }
      section(raw, target.section)[target.key] = num;
    } else {
      section(raw, target.section)[target.key] = value;
    }
  }
  return raw;
}

// Applied after parsing so a bare command override keeps the connector's default args.
function applyCommandOverrides(config: RunnerConfig, env: Record<string, string | undefined>): RunnerConfig {
  for (const [name, connector] of Object.entries(CONNECTOR_COMMAND_OVERRIDES)) {
    const value = env[name]?.trim();
    if (value) config.connectors[connector].command = value;
  }
  return config;
}

// --- Load ---

/**
 * Resolves the runner configuration: defaults, then the YAML file (if any),
 * then RUNNER_* environment variables.
 */
export function loadConfig(options: LoadConfigOptions = {}): RunnerConfig {
  const env = options.env ?? process.env;
  const filePath = resolveConfigPath({ ...options, env });
  const raw = filePath ? readConfigFile(filePath) : {};
  const merged = applyEnv(raw, env);

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${details}`);
  }
  return applyCommandOverrides(result.data, env);
}
