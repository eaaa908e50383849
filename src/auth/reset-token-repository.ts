import { and, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { resetTokens } from "../db/schema/index.js";

export interface ResetToken {
  id: string;
  userId: string;
  expiresAt: number;
  used: boolean;
}

export interface IResetTokenRepository {
  create(userId: string, tokenHash: string, expiresAt: number): Promise<void>;
  getByHash(tokenHash: string): Promise<ResetToken | null>;
  /** Mark the token used. Returns false if another request consumed it first. */
  consume(id: string): Promise<boolean>;
}

export class DrizzleResetTokenRepository implements IResetTokenRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(userId: string, tokenHash: string, expiresAt: number): Promise<void> {
    await this.db.insert(resetTokens).values({
      id: crypto.randomUUID(),
      userId,
      tokenHash,
      expiresAt,
      createdAt: Date.now(),
    });
  }

  async getByHash(tokenHash: string): Promise<ResetToken | null> {
    const rows = await this.db
      .select({
        id: resetTokens.id,
        userId: resetTokens.userId,
        expiresAt: resetTokens.expiresAt,
        used: resetTokens.used,
      })
      .from(resetTokens)
      .where(eq(resetTokens.tokenHash, tokenHash))
      .limit(1);
    return rows[0] ?? null;
  }

  async consume(id: string): Promise<boolean> {
    const rows = await this.db
      .update(resetTokens)
      .set({ used: true })
      .where(and(eq(resetTokens.id, id), eq(resetTokens.used, false)))
      .returning({ id: resetTokens.id });
    return rows.length > 0;
  }
}
