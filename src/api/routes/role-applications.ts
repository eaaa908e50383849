import { Hono } from "hono";
import { z } from "zod";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import { APPLIABLE_ROLES } from "../../domain/types.js";
import type { AppServices } from "../../services.js";
import { parseBody } from "../validation.js";

const submitSchema = z.object({
  appliedRole: z.enum(APPLIABLE_ROLES),
  motivation: z.string(),
});

/** A reader's own role application. Mounted at /api/v1/role-applications. */
export function createRoleApplicationRoutes(services: AppServices): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth({ tokens: services.tokens, users: services.users }));

  routes.get("/", async (c) => {
    return c.json(await services.roleApplications.status(c.get("user")));
  });

  routes.post("/", async (c) => {
    const body = await parseBody(c, submitSchema);
    const application = await services.roleApplications.submit(c.get("user"), body.appliedRole, body.motivation);
    return c.json(application, 201);
  });

  return routes;
}
