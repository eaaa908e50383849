/**
 * Auth — token authentication and staff gating for Hono routes.
 *
 * Clients present `Authorization: Token <value>` (or `Bearer <value>`).
 * The token is hashed and resolved through the api_tokens table.
 */

import type { Context, Next } from "hono";
import type { Role } from "../domain/types.js";
import { hashToken, type IApiTokenRepository } from "./api-token-repository.js";
import type { IUserRepository } from "./user-repository.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AuthUser {
  id: string;
  username: string;
  email: string;
  role: Role;
  isStaff: boolean;
}

export interface AuthEnv {
  Variables: {
    user: AuthUser;
    /** SHA-256 digest of the token that authenticated this request. */
    tokenHash: string;
  };
}

export interface AuthDeps {
  tokens: Pick<IApiTokenRepository, "findUserIdByHash">;
  users: Pick<IUserRepository, "getById">;
}

// ---------------------------------------------------------------------------
// Token extraction
// ---------------------------------------------------------------------------

const AUTH_SCHEMES = ["token", "bearer"];

/**
 * Extract the token from an Authorization header value.
 * Returns `null` if the header is missing, empty, or uses another scheme.
 */
export function extractAuthToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  const space = trimmed.indexOf(" ");
  if (space === -1) return null;
  const scheme = trimmed.slice(0, space).toLowerCase();
  if (!AUTH_SCHEMES.includes(scheme)) return null;
  const token = trimmed.slice(space + 1).trim();
  return token || null;
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/**
 * Create a `requireAuth` middleware that rejects unauthenticated requests.
 *
 * On success, sets `c.set("user", ...)` and `c.set("tokenHash", ...)`.
 */
export function requireAuth(deps: AuthDeps | (() => AuthDeps)) {
  const getDeps = typeof deps === "function" ? deps : () => deps;
  return async (c: Context<AuthEnv>, next: Next) => {
    const token = extractAuthToken(c.req.header("Authorization"));
    if (!token) {
      return c.json({ error: "Authentication credentials were not provided." }, 401);
    }

    const { tokens, users } = getDeps();
    const tokenHash = hashToken(token);
    const userId = await tokens.findUserIdByHash(tokenHash);
    const user = userId ? await users.getById(userId) : null;
    if (!user) {
      return c.json({ error: "Invalid token." }, 401);
    }

    c.set("user", {
      id: user.id,
      username: user.username,
      email: user.email,
      role: user.role,
      isStaff: user.isStaff,
    });
    c.set("tokenHash", tokenHash);
    return next();
  };
}

/** Reject non-staff users. Must be used after `requireAuth`. */
export function requireStaff() {
  return async (c: Context<AuthEnv>, next: Next) => {
    const user = c.get("user");
    if (!user) {
      return c.json({ error: "Authentication credentials were not provided." }, 401);
    }
    if (!user.isStaff) {
      return c.json({ error: "You do not have permission to perform this action." }, 403);
    }
    return next();
  };
}
