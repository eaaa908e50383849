import { Hono } from "hono";
import { logger } from "../../config/logger.js";

/** Liveness plus a database ping. Public, used by load balancers. */
export function createHealthRoutes(ping: () => Promise<void>): Hono {
  const routes = new Hono();

  routes.get("/", async (c) => {
    try {
      await ping();
      return c.json({ status: "ok", service: "pressroom-platform", database: "ok" });
    } catch (err) {
      logger.warn("Health check database ping failed", { err });
      return c.json({ status: "degraded", service: "pressroom-platform", database: "unreachable" });
    }
  });

  return routes;
}
