import { Hono } from "hono";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import type { AppServices } from "../../services.js";

/** Mounted at /api/v1/dashboard. */
export function createDashboardRoutes(services: AppServices): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth({ tokens: services.tokens, users: services.users }));

  routes.get("/editor", async (c) => c.json(await services.dashboards.editor(c.get("user"))));
  routes.get("/journalist", async (c) => c.json(await services.dashboards.journalist(c.get("user"))));
  routes.get("/publisher", async (c) => c.json(await services.dashboards.publisher(c.get("user"))));

  return routes;
}
