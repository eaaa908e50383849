import { Hono } from "hono";
import { z } from "zod";
import { type AuthEnv, requireAuth, requireStaff } from "../../auth/index.js";
import { ARTICLE_STATUSES, ROLES } from "../../domain/types.js";
import type { AppServices } from "../../services.js";
import { parseBody } from "../validation.js";

const decisionSchema = z.object({
  publisherId: z.string().min(1).optional(),
});

const roleSchema = z.object({ role: z.enum(ROLES) });
const statusSchema = z.object({ status: z.enum(ARTICLE_STATUSES) });

/** Staff-only administration. Mounted at /api/v1/staff. */
export function createStaffRoutes(services: AppServices): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth({ tokens: services.tokens, users: services.users }));
  routes.use("*", requireStaff());

  routes.get("/role-applications", async (c) => {
    return c.json(await services.roleApplications.staffView());
  });

  routes.post("/role-applications/:id/approve", async (c) => {
    const body = await parseBody(c, decisionSchema, { optional: true });
    const result = await services.roleTransitions.applyRoleDecision(c.req.param("id"), "approved", {
      publisherId: body.publisherId,
      decidedBy: c.get("user").id,
    });
    return c.json(result);
  });

  routes.post("/role-applications/:id/reject", async (c) => {
    const result = await services.roleTransitions.applyRoleDecision(c.req.param("id"), "rejected", {
      decidedBy: c.get("user").id,
    });
    return c.json(result);
  });

  routes.patch("/users/:id/role", async (c) => {
    const body = await parseBody(c, roleSchema);
    return c.json(await services.roleTransitions.assignRole(c.req.param("id"), body.role));
  });

  routes.patch("/articles/:id/status", async (c) => {
    const body = await parseBody(c, statusSchema);
    const article = await services.review.setStatus(c.req.param("id"), body.status, c.get("user").id);
    return c.json({ id: article.id, status: article.status });
  });

  return routes;
}
