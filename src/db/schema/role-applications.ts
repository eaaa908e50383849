import { sql } from "drizzle-orm";
import { bigint, check, index, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";
import { APPLIABLE_ROLES, APPLICATION_STATUSES } from "../../domain/types.js";
import { users } from "./users.js";

/**
 * A reader's request for an elevated role, decided by staff.
 * At most one pending application per user (partial unique index).
 */
export const roleApplications = pgTable(
  "role_applications",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    appliedRole: text("applied_role", { enum: APPLIABLE_ROLES }).notNull(),
    motivation: text("motivation").notNull(),
    status: text("status", { enum: APPLICATION_STATUSES }).notNull().default("pending"),
    submittedAt: bigint("submitted_at", { mode: "number" }).notNull(),
    decidedAt: bigint("decided_at", { mode: "number" }),
    /** Staff user who made the decision. */
    decidedBy: text("decided_by"),
  },
  (table) => [
    index("idx_role_applications_status").on(table.status, table.submittedAt),
    uniqueIndex("uniq_role_applications_pending").on(table.userId).where(sql`${table.status} = 'pending'`),
    check("chk_role_applications_role", sql`${table.appliedRole} IN ('journalist', 'editor', 'publisher')`),
    check("chk_role_applications_status", sql`${table.status} IN ('pending', 'approved', 'rejected')`),
  ],
);
