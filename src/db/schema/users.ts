import { sql } from "drizzle-orm";
import { bigint, boolean, check, index, pgTable, text } from "drizzle-orm/pg-core";
import { ROLES } from "../../domain/types.js";

/**
 * Platform users. Every account starts as a reader; the other roles are
 * granted through an approved role application or a staff edit.
 */
export const users = pgTable(
  "users",
  {
    id: text("id").primaryKey(),
    username: text("username").notNull().unique(),
    email: text("email").notNull(),
    firstName: text("first_name").notNull().default(""),
    lastName: text("last_name").notNull().default(""),
    /** scrypt$<salt hex>$<hash hex> */
    passwordHash: text("password_hash").notNull(),
    role: text("role", { enum: ROLES }).notNull().default("reader"),
    /** Staff members review role applications and may edit roles directly. */
    isStaff: boolean("is_staff").notNull().default(false),
    createdAt: bigint("created_at", { mode: "number" })
      .notNull()
      .default(sql`(extract(epoch from now()) * 1000)::bigint`),
  },
  (table) => [
    index("idx_users_email").on(table.email),
    index("idx_users_role").on(table.role),
    check("chk_users_role", sql`${table.role} IN ('reader', 'journalist', 'editor', 'publisher')`),
  ],
);
