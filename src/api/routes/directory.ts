import { Hono } from "hono";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import type { AppServices } from "../../services.js";
import { paginate } from "../pagination.js";
import { journalistRow, publisherRow } from "../serializers.js";

/** Read-only publisher and journalist lists. Mounted at /api/v1. */
export function createDirectoryRoutes(services: AppServices, pageSize: number): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  const auth = requireAuth({ tokens: services.tokens, users: services.users });

  routes.get("/publishers", auth, async (c) => {
    return c.json(await paginate(c, pageSize, (window) => services.profiles.listPublishers(window), publisherRow));
  });

  routes.get("/journalists", auth, async (c) => {
    return c.json(await paginate(c, pageSize, (window) => services.profiles.listJournalists(window), journalistRow));
  });

  return routes;
}
