import { Hono } from "hono";
import { createLogger } from "./logging/logger.js";
import { createRoutes, requestLogger } from "./routes/index.js";
import { toHttpError } from "./routes/errors.js";
import type { Runtime } from "./runtime.js";

const log = createLogger("app");

export const API_PREFIX = "/api/v1";

export function createApp(runtime: Runtime): Hono {
  const app = new Hono();

  app.use("*", requestLogger());

  app.get("/health", (c) =>
    c.json({
      status: "healthy",
      activeJobs: runtime.registry.count(),
      totalJobs: runtime.registry.size,
      maxConcurrent: runtime.registry.maxConcurrent,
      uptime: process.uptime(),
    })
  );

  app.get("/ready", (c) => c.json({ status: "ready" }));

  app.route(API_PREFIX, createRoutes(runtime));

  app.notFound((c) => c.json({ error: "not found" }, 404));

  app.onError((err, c) => {
    log.error("unhandled request error", { method: c.req.method, path: c.req.path, error: err.message });
    const { status, body } = toHttpError(err);
    return c.json(body, status);
  });

  return app;
}
