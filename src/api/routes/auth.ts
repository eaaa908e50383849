import { Hono } from "hono";
import { z } from "zod";
import { type AuthEnv, extractAuthToken, requireAuth } from "../../auth/index.js";
import type { AppServices } from "../../services.js";
import { parseBody } from "../validation.js";

const registerSchema = z.object({
  username: z.string().min(1).max(150),
  email: z.string().email(),
  password: z.string(),
  confirmPassword: z.string(),
  firstName: z.string().max(150).optional(),
  lastName: z.string().max(150).optional(),
});

const tokenSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const forgotSchema = z.object({ email: z.string().email() });

const resetSchema = z.object({
  password: z.string(),
  confirmPassword: z.string(),
});

/** Registration, credential exchange, logout and password reset. Mounted at /api/v1/auth. */
export function createAuthRoutes(services: AppServices): Hono<AuthEnv> {
  const routes = new Hono<AuthEnv>();

  routes.post("/register", async (c) => {
    const body = await parseBody(c, registerSchema);
    const { user, token } = await services.credentials.register(body);
    return c.json({ user, token }, 201);
  });

  routes.post("/token", async (c) => {
    const body = await parseBody(c, tokenSchema);
    const token = await services.credentials.exchangeCredentials(body.username, body.password);
    return c.json({ token });
  });

  routes.post("/logout", requireAuth({ tokens: services.tokens, users: services.users }), async (c) => {
    const token = extractAuthToken(c.req.header("Authorization"));
    if (token) await services.credentials.revokeToken(token);
    return c.json({ ok: true });
  });

  routes.post("/forgot-password", async (c) => {
    const body = await parseBody(c, forgotSchema);
    await services.passwordReset.requestReset(body.email);
    return c.json({ message: "A password reset link has been sent to your email." });
  });

  routes.get("/reset-password/:token", async (c) => {
    const state = await services.passwordReset.checkToken(c.req.param("token"));
    return c.json({ state });
  });

  routes.post("/reset-password/:token", async (c) => {
    const body = await parseBody(c, resetSchema);
    await services.passwordReset.resetPassword(c.req.param("token"), body.password, body.confirmPassword);
    return c.json({ message: "Your password has been reset. You can now log in." });
  });

  return routes;
}
