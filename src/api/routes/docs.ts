import { Hono } from "hono";

export interface RouteEntry {
  method: string;
  path: string;
}

const PUBLIC_PATHS = [
  "/health",
  "/api/v1/docs",
  "/api/v1/auth/register",
  "/api/v1/auth/token",
  "/api/v1/auth/forgot-password",
  "/api/v1/auth/reset-password/:token",
];

/**
 * Machine-readable list of every endpoint the app serves. Middleware
 * registrations (method ALL) are left out.
 */
export function describeRoutes(routes: RouteEntry[]): { method: string; path: string; auth: boolean }[] {
  const seen = new Set<string>();
  const endpoints: { method: string; path: string; auth: boolean }[] = [];
  for (const { method, path } of routes) {
    if (method === "ALL") continue;
    const key = `${method} ${path}`;
    if (seen.has(key)) continue;
    seen.add(key);
    endpoints.push({ method, path, auth: !PUBLIC_PATHS.includes(path) });
  }
  return endpoints;
}

export function createDocsRoutes(listRoutes: () => RouteEntry[]): Hono {
  const routes = new Hono();
  routes.get("/", (c) => c.json({ endpoints: describeRoutes(listRoutes()) }));
  return routes;
}
