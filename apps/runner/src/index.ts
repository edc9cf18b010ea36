import { serve, type ServerType } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./config/index.js";
import { errorMessage } from "./errors.js";
import { configureLogging, createLogger } from "./logging/logger.js";
import { createRuntime, type Runtime } from "./runtime.js";

const log = createLogger("runner");

let server: ServerType | undefined;
let runtime: Runtime | undefined;

function bootstrap(): void {
  const config = loadConfig();
  configureLogging({ level: config.logging.level, format: config.logging.format });

  runtime = createRuntime(config);
  const app = createApp(runtime);

  log.info("starting agent runner", {
    host: config.server.host,
    port: config.server.port,
    maxConcurrent: config.process.maxConcurrent,
  });

  runtime.registry.startCleanup();

  server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    log.info(`listening on http://${config.server.host}:${info.port}`);
    log.info("connectors", { available: runtime?.connectors.available().join(", ") || "(none)" });
  });
}

try {
  bootstrap();
} catch (err) {
  log.error("FATAL: bootstrap failed", { error: errorMessage(err) });
  process.exit(1);
}

// --- Graceful shutdown ---

let shuttingDown = false;

async function onShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info(`${signal} received, shutting down`);

  // Force exit if cleanup hangs
  const forceExit = setTimeout(() => {
    log.error("shutdown timed out, forcing exit");
    process.exit(1);
  }, 5_000);
  forceExit.unref();

  try {
    if (runtime) {
      runtime.registry.shutdown();
      await runtime.spawner.drain();
    }

    const active = server;
    if (active) {
      await new Promise<void>((resolve, reject) => {
        active.close((err) => (err ? reject(err) : resolve()));
      });
    }
  } catch (err) {
    log.error("error during shutdown", { error: errorMessage(err) });
  }

  process.exit(0);
}

process.on("SIGTERM", () => void onShutdown("SIGTERM"));
process.on("SIGINT", () => void onShutdown("SIGINT"));
