import type { RunnerConfig } from "./config/index.js";
import { ConnectorRegistry } from "./connectors/registry.js";
import { JobRegistry } from "./jobs/registry.js";
import { Spawner, type SpawnProcess } from "./jobs/spawner.js";

export interface Runtime {
  config: RunnerConfig;
  registry: JobRegistry;
  connectors: ConnectorRegistry;
  spawner: Spawner;
}

export interface RuntimeOverrides {
  connectors?: ConnectorRegistry;
  spawnProcess?: SpawnProcess;
  now?: () => number;
}

/** Wires the collaborators together. Nothing here is a module-level singleton. */
export function createRuntime(config: RunnerConfig, overrides: RuntimeOverrides = {}): Runtime {
  const registry = new JobRegistry({
    maxConcurrent: config.process.maxConcurrent,
    cleanupIntervalMs: config.process.cleanupIntervalMs,
    bufferSize: config.process.bufferSize,
    subscriberBufferSize: config.process.subscriberBufferSize,
    resultCacheTtlMs: config.process.resultCacheTtlMs,
    now: overrides.now,
  });

  const spawner = new Spawner({
    defaultTimeoutMs: config.process.defaultTimeoutMs,
    resourceSampleMs: config.process.resourceSampleMs,
    spawnProcess: overrides.spawnProcess,
    now: overrides.now,
  });

  return {
    config,
    registry,
    connectors: overrides.connectors ?? ConnectorRegistry.fromConfig(config),
    spawner,
  };
}
