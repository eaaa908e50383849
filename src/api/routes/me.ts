import { Hono } from "hono";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import { notFound } from "../../domain/errors.js";
import type { AppServices } from "../../services.js";

/** The authenticated user and the profiles they hold. Mounted at /api/v1/me. */
export function createMeRoutes(services: AppServices): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth({ tokens: services.tokens, users: services.users }));

  routes.get("/", async (c) => {
    const { id } = c.get("user");
    const [user, profiles] = await Promise.all([services.users.getById(id), services.profiles.profileIds(id)]);
    if (!user) throw notFound("User not found.");
    return c.json({ user, profiles });
  });

  return routes;
}
