import { Hono } from "hono";
import { streamSSE, type SSEStreamingApi } from "hono/streaming";
import { errorMessage } from "../errors.js";
import type { Job } from "../jobs/job.js";
import type { JobEvent } from "../jobs/types.js";
import { createLogger } from "../logging/logger.js";
import type { Runtime } from "../runtime.js";
import { errorResponse } from "./errors.js";

const log = createLogger("stream");

async function writeEvent(stream: SSEStreamingApi, event: JobEvent): Promise<void> {
  await stream.writeSSE({ event: event.kind, data: JSON.stringify(event) });
}

/**
 * GET /stream/:id: subscribes, replays the buffered history, then follows
 * live events until `done` or the client goes away. Events already written
 * are skipped by identity. Once the live channel has dropped events, the
 * missing ones are filled in from the history, in order, before the next
 * live event or after the channel closes.
 */
export function createStreamRoutes(runtime: Runtime): Hono {
  const keepAliveMs = runtime.config.server.sseKeepAliveMs;
  const routes = new Hono();

  routes.get("/stream/:id", (c) => {
    let job: Job;
    try {
      job = runtime.registry.get(c.req.param("id"));
    } catch (err) {
      return errorResponse(c, err);
    }

    return streamSSE(
      c,
      async (stream) => {
        log.info("stream started", { jobId: job.id });

        const subscription = job.subscribe();
        const history = job.snapshot();
        const sent = new Set<JobEvent>();
        let finished = false;

        const send = async (event: JobEvent): Promise<void> => {
          if (finished || sent.has(event)) return;
          sent.add(event);
          await writeEvent(stream, event);
          if (event.kind === "done") finished = true;
        };

        let dropsSeen = 0;
        const fillIn = async (until?: JobEvent): Promise<void> => {
          dropsSeen = subscription.events.dropped;
          const buffered = job.snapshot();
          const end = until ? buffered.indexOf(until) : buffered.length;
          for (const event of buffered.slice(0, Math.max(end, 0))) await send(event);
        };

        stream.onAbort(() => {
          log.info("client disconnected", { jobId: job.id, subscriberId: subscription.id });
          subscription.unsubscribe();
        });

        const keepAlive =
          keepAliveMs > 0
            ? setInterval(() => {
                stream.write(": ping\n\n").catch((err: unknown) => {
                  log.debug("keep-alive write failed", { jobId: job.id, error: errorMessage(err) });
                  subscription.unsubscribe();
                });
              }, keepAliveMs)
            : undefined;

        try {
          for (const event of history) await send(event);
          if (!finished) {
            for await (const event of subscription.events) {
              if (subscription.events.dropped > dropsSeen) await fillIn(event);
              await send(event);
              if (finished) break;
            }
          }
          if (!finished && !stream.aborted && job.isClosed) await fillIn();
        } finally {
          if (keepAlive) clearInterval(keepAlive);
          subscription.unsubscribe();
          if (subscription.events.dropped > 0) {
            log.warn("events dropped for slow subscriber", {
              jobId: job.id,
              subscriberId: subscription.id,
              dropped: subscription.events.dropped,
            });
          }
          log.info("stream closed", { jobId: job.id, done: finished });
        }
      },
      async (err) => {
        log.warn("failed to write SSE event", { jobId: job.id, error: err.message });
      }
    );
  });

  return routes;
}
