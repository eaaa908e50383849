import { Hono } from "hono";
import { z } from "zod";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import type { AppServices } from "../../services.js";
import { paginate } from "../pagination.js";
import { contentDetail, contentRow, newsletterDetail } from "../serializers.js";
import { parseBody } from "../validation.js";

const createSchema = z.object({
  title: z.string(),
  content: z.string(),
});

const updateSchema = z.object({
  title: z.string().optional(),
  content: z.string().optional(),
});

/** Newsletters have no review step. Mounted at /api/v1/newsletters. */
export function createNewsletterRoutes(services: AppServices, pageSize: number): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth({ tokens: services.tokens, users: services.users }));

  routes.get("/", async (c) => {
    const user = c.get("user");
    const page = await paginate(
      c,
      pageSize,
      (window) => services.visibility.visibleNewsletters(user, window),
      contentRow,
    );
    return c.json(page);
  });

  routes.get("/:id", async (c) => {
    const view = await services.content.getNewsletter(c.get("user"), c.req.param("id"));
    return c.json(newsletterDetail(view));
  });

  routes.post("/", async (c) => {
    const body = await parseBody(c, createSchema);
    const { newsletter, notification } = await services.content.createNewsletter(c.get("user"), body);
    return c.json(
      {
        ...contentDetail(newsletter),
        notification: { sent: notification.sent.length, failed: notification.failed.length },
      },
      201,
    );
  });

  routes.patch("/:id", async (c) => {
    const body = await parseBody(c, updateSchema);
    const detail = await services.content.updateNewsletter(c.get("user"), c.req.param("id"), body);
    return c.json(contentDetail(detail));
  });

  routes.delete("/:id", async (c) => {
    await services.content.deleteNewsletter(c.get("user"), c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
