import { createHash, randomBytes } from "node:crypto";
import { and, eq, isNull } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { apiTokens } from "../db/schema/index.js";

/** SHA-256 hex digest of a raw token. Only digests are persisted. */
export function hashToken(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

/** A fresh opaque token: 20 random bytes, hex encoded. */
export function generateToken(): string {
  return randomBytes(20).toString("hex");
}

export interface IApiTokenRepository {
  /** Issue a new token for the user. Returns the plaintext, which is not recoverable later. */
  issue(userId: string, label?: string): Promise<string>;
  /** Resolve a live (non-revoked) token digest to its user id, touching last_used_at. */
  findUserIdByHash(keyHash: string): Promise<string | null>;
  /** Revoke one token. Returns false when it was unknown or already revoked. */
  revokeByHash(keyHash: string): Promise<boolean>;
  revokeAllForUser(userId: string): Promise<number>;
}

export class DrizzleApiTokenRepository implements IApiTokenRepository {
  constructor(private readonly db: DrizzleDb) {}

  async issue(userId: string, label = ""): Promise<string> {
    const token = generateToken();
    await this.db.insert(apiTokens).values({
      id: crypto.randomUUID(),
      userId,
      keyHash: hashToken(token),
      label,
      createdAt: Date.now(),
    });
    return token;
  }

  async findUserIdByHash(keyHash: string): Promise<string | null> {
    const rows = await this.db
      .update(apiTokens)
      .set({ lastUsedAt: Date.now() })
      .where(and(eq(apiTokens.keyHash, keyHash), isNull(apiTokens.revokedAt)))
      .returning({ userId: apiTokens.userId });
    return rows[0]?.userId ?? null;
  }

  async revokeByHash(keyHash: string): Promise<boolean> {
    const rows = await this.db
      .update(apiTokens)
      .set({ revokedAt: Date.now() })
      .where(and(eq(apiTokens.keyHash, keyHash), isNull(apiTokens.revokedAt)))
      .returning({ id: apiTokens.id });
    return rows.length > 0;
  }

  async revokeAllForUser(userId: string): Promise<number> {
    const rows = await this.db
      .update(apiTokens)
      .set({ revokedAt: Date.now() })
      .where(and(eq(apiTokens.userId, userId), isNull(apiTokens.revokedAt)))
      .returning({ id: apiTokens.id });
    return rows.length;
  }
}
