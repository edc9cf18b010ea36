import { Hono } from "hono";
import { z } from "zod";
import type { Connector } from "../connectors/types.js";
import { errorMessage } from "../errors.js";
import type { Job } from "../jobs/job.js";
import { createLogger } from "../logging/logger.js";
import type { Runtime } from "../runtime.js";
import { errorResponse } from "./errors.js";

const log = createLogger("http");

export const runRequestSchema = z.object({
  connector: z.string().min(1, "connector is required"),
  prompt: z.string().min(1, "prompt is required"),
  workDir: z.string().optional(),
});

export function createProcessRoutes(runtime: Runtime): Hono {
  const { registry, connectors, spawner } = runtime;
  const routes = new Hono();

  // POST /run: admit a job and start it in the background
  routes.post("/run", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch (err) {
      log.warn("invalid request body", { error: errorMessage(err) });
      return c.json({ error: "Invalid request body", details: "body must be JSON" }, 400);
    }

    const parsed = runRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => issue.message).join("; ");
      log.warn("invalid request body", { details });
      return c.json({ error: "Invalid request body", details }, 400);
    }
    const body = parsed.data;

    let connector: Connector;
    let job: Job;
    try {
      connector = connectors.get(body.connector);
      job = registry.create(body.connector, body.prompt, body.workDir);
    } catch (err) {
      return errorResponse(c, err);
    }

    try {
      spawner.spawn(job, connector);
    } catch (err) {
      log.error("failed to spawn process", { jobId: job.id, error: errorMessage(err) });
      return errorResponse(c, err);
    }

    log.info("process spawned", { jobId: job.id, connector: body.connector });
    return c.json({ processId: job.id }, 202);
  });

  // GET /process/:id: status snapshot
  routes.get("/process/:id", (c) => {
    try {
      return c.json(registry.get(c.req.param("id")).toSnapshot());
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  // GET /result/:id: final result, or 202 while still running
  routes.get("/result/:id", (c) => {
    let job: Job;
    try {
      job = registry.get(c.req.param("id"));
    } catch (err) {
      return errorResponse(c, err);
    }

    const result = job.getResult();
    if (!result || !job.isTerminal) {
      return c.json({ status: job.status, message: "Process is still running" }, 202);
    }
    return c.json(result);
  });

  // GET /result-data/:id: cached payload of the last result event
  routes.get("/result-data/:id", (c) => {
    const id = c.req.param("id");
    const payload = registry.getCachedResult(id);
    if (payload === undefined) {
      return c.json(
        {
          error: "Result data not found or expired",
          message: `Result data is only cached for ${Math.round(runtime.config.process.resultCacheTtlMs / 60_000)} minutes`,
        },
        404
      );
    }
    log.info("result data retrieved from cache", { jobId: id });
    return c.json(payload);
  });

  // DELETE /process/:id: stop, then remove
  routes.delete("/process/:id", (c) => {
    const id = c.req.param("id");
    try {
      registry.stop(id);
      registry.remove(id);
    } catch (err) {
      return errorResponse(c, err);
    }
    log.info("process stopped and removed", { jobId: id });
    return c.json({ message: "Process deleted successfully" });
  });

  // GET /processes: every job's snapshot
  routes.get("/processes", (c) => {
    const processes = registry.list().map((job) => job.toSnapshot());
    return c.json({ processes, count: processes.length });
  });

  return routes;
}
