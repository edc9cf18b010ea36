import { Hono, type MiddlewareHandler } from "hono";
import { createLogger } from "../logging/logger.js";
import type { Runtime } from "../runtime.js";
import { createConnectorRoutes } from "./connectors.js";
import { createProcessRoutes } from "./processes.js";
import { createStreamRoutes } from "./stream.js";

const log = createLogger("http");

// Streams log their own lifecycle.
export function requestLogger(): MiddlewareHandler {
  return async (c, next) => {
    const started = Date.now();
    await next();
    if (c.req.path.includes("/stream/")) return;
    log.info("http request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - started,
    });
  };
}

export function createRoutes(runtime: Runtime): Hono {
  const routes = new Hono();
  routes.route("/", createProcessRoutes(runtime));
  routes.route("/", createStreamRoutes(runtime));
  routes.route("/", createConnectorRoutes(runtime));
  return routes;
}
