import { sql } from "drizzle-orm";
import { bigint, boolean, index, pgTable, text } from "drizzle-orm/pg-core";
import { users } from "./users.js";

/** API tokens from the credential exchange. Only the SHA-256 digest is stored. */
export const apiTokens = pgTable(
  "api_tokens",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    /** SHA-256 hex digest of the raw token. Raw token is NEVER stored. */
    keyHash: text("key_hash").notNull().unique(),
    label: text("label").notNull().default(""),
    createdAt: bigint("created_at", { mode: "number" })
      .notNull()
      .default(sql`(extract(epoch from now()) * 1000)::bigint`),
    lastUsedAt: bigint("last_used_at", { mode: "number" }),
    /** Unix epoch ms. Null = not revoked. */
    revokedAt: bigint("revoked_at", { mode: "number" }),
  },
  (table) => [index("idx_api_tokens_user").on(table.userId)],
);

/** Single-use password reset tokens, hashed, valid for five minutes. */
export const resetTokens = pgTable(
  "reset_tokens",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    tokenHash: text("token_hash").notNull().unique(),
    expiresAt: bigint("expires_at", { mode: "number" }).notNull(),
    used: boolean("used").notNull().default(false),
    createdAt: bigint("created_at", { mode: "number" })
      .notNull()
      .default(sql`(extract(epoch from now()) * 1000)::bigint`),
  },
  (table) => [index("idx_reset_tokens_user").on(table.userId)],
);
