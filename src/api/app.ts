import { sql } from "drizzle-orm";
import { Hono } from "hono";
import type { ErrorHandler } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { secureHeaders } from "hono/secure-headers";
import type { AuthEnv } from "../auth/index.js";
import { logger } from "../config/logger.js";
import { DOMAIN_ERROR_STATUS, DomainError } from "../domain/errors.js";
import type { AppServices } from "../services.js";
import { createArticleRoutes } from "./routes/articles.js";
import { createAuthRoutes } from "./routes/auth.js";
import { createDashboardRoutes } from "./routes/dashboard.js";
import { createDirectoryRoutes } from "./routes/directory.js";
import { createDocsRoutes } from "./routes/docs.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMeRoutes } from "./routes/me.js";
import { createNewsletterRoutes } from "./routes/newsletters.js";
import { createRoleApplicationRoutes } from "./routes/role-applications.js";
import { createStaffRoutes } from "./routes/staff.js";
import { createSubscriptionRoutes } from "./routes/subscriptions.js";

export interface AppOptions {
  uiOrigins: string[];
  pageSize: number;
}

// Global error handler. Domain errors carry their own status; anything else
// is logged and reported as a 500 without internals.
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof DomainError) {
    return c.json(
      err.details ? { error: err.message, details: err.details } : { error: err.message },
      DOMAIN_ERROR_STATUS[err.code],
    );
  }
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });
  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

/** Build the HTTP app. Trailing slashes are optional on every route. */
export function createApp(services: AppServices, options: AppOptions): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>({ strict: false });

  app.use(
    "/*",
    cors({
      origin: options.uiOrigins,
      credentials: true,
      allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE"],
      allowHeaders: ["Content-Type", "Authorization"],
    }),
  );
  app.use("/*", secureHeaders());

  app.route(
    "/health",
    createHealthRoutes(async () => {
      await services.db.execute(sql`select 1`);
    }),
  );

  app.route("/api/v1/auth", createAuthRoutes(services));
  app.route("/api/v1/me", createMeRoutes(services));
  app.route("/api/v1/articles", createArticleRoutes(services, options.pageSize));
  app.route("/api/v1/newsletters", createNewsletterRoutes(services, options.pageSize));
  app.route("/api/v1", createDirectoryRoutes(services, options.pageSize));
  app.route("/api/v1", createSubscriptionRoutes(services));
  app.route("/api/v1/role-applications", createRoleApplicationRoutes(services));
  app.route("/api/v1/dashboard", createDashboardRoutes(services));
  app.route("/api/v1/staff", createStaffRoutes(services));
  app.route("/api/v1/docs", createDocsRoutes(() => app.routes));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);
  return app;
}
