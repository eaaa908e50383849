import { Hono } from "hono";
import { z } from "zod";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import type { AppServices } from "../../services.js";
import { paginate } from "../pagination.js";
import { articleDetail, contentDetail, contentRow } from "../serializers.js";
import { parseBody } from "../validation.js";

const createSchema = z.object({
  title: z.string(),
  content: z.string(),
});

const updateSchema = z.object({
  title: z.string().optional(),
  content: z.string().optional(),
});

/** Article listing, detail, authoring and review. Mounted at /api/v1/articles. */
export function createArticleRoutes(services: AppServices, pageSize: number): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth({ tokens: services.tokens, users: services.users }));

  routes.get("/", async (c) => {
    const user = c.get("user");
    const page = await paginate(c, pageSize, (window) => services.visibility.visibleArticles(user, window), contentRow);
    return c.json(page);
  });

  // Registered before "/:id" so the static segments win.
  routes.get("/by_journalist", async (c) => {
    const journalistId = c.req.query("journalist_id");
    if (!journalistId) return c.json({ error: "journalist_id parameter is required" }, 400);
    const items = await services.visibility.articlesByJournalist(c.get("user"), journalistId);
    return c.json(items.map(contentRow));
  });

  routes.get("/by_publisher", async (c) => {
    const publisherId = c.req.query("publisher_id");
    if (!publisherId) return c.json({ error: "publisher_id parameter is required" }, 400);
    const items = await services.visibility.articlesByPublisher(c.get("user"), publisherId);
    return c.json(items.map(contentRow));
  });

  routes.get("/:id", async (c) => {
    const view = await services.content.getArticle(c.get("user"), c.req.param("id"));
    return c.json(articleDetail(view));
  });

  routes.post("/", async (c) => {
    const body = await parseBody(c, createSchema);
    const detail = await services.content.createArticle(c.get("user"), body);
    return c.json({ ...contentDetail(detail), status: detail.status }, 201);
  });

  routes.patch("/:id", async (c) => {
    const body = await parseBody(c, updateSchema);
    const detail = await services.content.updateArticle(c.get("user"), c.req.param("id"), body);
    return c.json({ ...contentDetail(detail), status: detail.status });
  });

  routes.delete("/:id", async (c) => {
    await services.content.deleteArticle(c.get("user"), c.req.param("id"));
    return c.body(null, 204);
  });

  routes.post("/:id/approve", async (c) => {
    const { article, notification } = await services.review.approve(c.get("user"), c.req.param("id"));
    return c.json({
      id: article.id,
      status: article.status,
      message: `Article "${article.title}" has been approved.`,
      notification,
    });
  });

  routes.post("/:id/reject", async (c) => {
    const { article, notification } = await services.review.reject(c.get("user"), c.req.param("id"));
    return c.json({
      id: article.id,
      status: article.status,
      message: `Article "${article.title}" has been rejected.`,
      notification,
    });
  });

  return routes;
}
