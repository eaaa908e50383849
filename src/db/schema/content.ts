import { sql } from "drizzle-orm";
import { bigint, check, index, pgTable, text } from "drizzle-orm/pg-core";
import { ARTICLE_STATUSES } from "../../domain/types.js";
import { journalists, publishers } from "./profiles.js";

/**
 * Articles go through editor review: pending -> approved | rejected.
 * Only approved articles appear in listings.
 */
export const articles = pgTable(
  "articles",
  {
    id: text("id").primaryKey(),
    title: text("title").notNull(),
    content: text("content").notNull(),
    journalistId: text("journalist_id")
      .notNull()
      .references(() => journalists.id, { onDelete: "cascade" }),
    publisherId: text("publisher_id")
      .notNull()
      .references(() => publishers.id, { onDelete: "cascade" }),
    status: text("status", { enum: ARTICLE_STATUSES }).notNull().default("pending"),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => [
    index("idx_articles_status_created").on(table.status, table.createdAt),
    index("idx_articles_journalist").on(table.journalistId),
    index("idx_articles_publisher").on(table.publisherId),
    check("chk_articles_status", sql`${table.status} IN ('pending', 'approved', 'rejected')`),
  ],
);

/** Newsletters have no review gate: visible as soon as they are created. */
export const newsletters = pgTable(
  "newsletters",
  {
    id: text("id").primaryKey(),
    title: text("title").notNull(),
    content: text("content").notNull(),
    journalistId: text("journalist_id")
      .notNull()
      .references(() => journalists.id, { onDelete: "cascade" }),
    publisherId: text("publisher_id")
      .notNull()
      .references(() => publishers.id, { onDelete: "cascade" }),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" }).notNull(),
  },
  (table) => [
    index("idx_newsletters_created").on(table.createdAt),
    index("idx_newsletters_journalist").on(table.journalistId),
    index("idx_newsletters_publisher").on(table.publisherId),
  ],
);
