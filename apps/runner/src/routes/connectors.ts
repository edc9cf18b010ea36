import { Hono } from "hono";
import type { Runtime } from "../runtime.js";

export function createConnectorRoutes(runtime: Runtime): Hono {
  const routes = new Hono();

  // GET /connectors: names of connectors that can take jobs right now
  routes.get("/connectors", (c) => {
    const connectors = runtime.connectors.available();
    return c.json({ connectors, count: connectors.length });
  });

  return routes;
}
