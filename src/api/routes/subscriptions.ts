import { Hono } from "hono";
import { type AuthEnv, requireAuth } from "../../auth/index.js";
import type { AppServices } from "../../services.js";
import type { SubscriptionTargetKind } from "../../subscriptions/subscription-repository.js";
import { contentRow } from "../serializers.js";

function targetKind(segment: string): SubscriptionTargetKind | null {
  if (segment === "journalists") return "journalist";
  if (segment === "publishers") return "publisher";
  return null;
}

/** Subscription management and browsing for readers. Mounted at /api/v1. */
export function createSubscriptionRoutes(services: AppServices): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();
  const auth = requireAuth({ tokens: services.tokens, users: services.users });

  routes.get("/subscriptions", auth, async (c) => {
    const mine = await services.subscriptions.mySubscriptions(c.get("user"));
    return c.json({ ...mine, recentArticles: mine.recentArticles.map(contentRow) });
  });

  routes.post("/subscriptions/:kind/:id", auth, async (c) => {
    const kind = targetKind(c.req.param("kind"));
    if (!kind) return c.json({ error: "Not found" }, 404);
    const result = await services.subscriptions.subscribe(c.get("user"), { kind, id: c.req.param("id") });
    return c.json(result, result.outcome === "subscribed" ? 201 : 200);
  });

  routes.delete("/subscriptions/:kind/:id", auth, async (c) => {
    const kind = targetKind(c.req.param("kind"));
    if (!kind) return c.json({ error: "Not found" }, 404);
    const result = await services.subscriptions.unsubscribe(c.get("user"), { kind, id: c.req.param("id") });
    return c.json(result);
  });

  routes.get("/browse/journalists", auth, async (c) => {
    return c.json({ results: await services.subscriptions.browseJournalists(c.get("user")) });
  });

  routes.get("/browse/publishers", auth, async (c) => {
    return c.json({ results: await services.subscriptions.browsePublishers(c.get("user")) });
  });

  return routes;
}
