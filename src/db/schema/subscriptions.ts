import { sql } from "drizzle-orm";
import { bigint, boolean, index, pgTable, text, unique } from "drizzle-orm/pg-core";
import { journalists, publishers } from "./profiles.js";
import { users } from "./users.js";

/**
 * Reader subscriptions. One row per (reader, target) pair; unsubscribing
 * flips is_active instead of deleting, and subscribing again reactivates it.
 */
export const journalistSubscriptions = pgTable(
  "journalist_subscriptions",
  {
    id: text("id").primaryKey(),
    readerId: text("reader_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    journalistId: text("journalist_id")
      .notNull()
      .references(() => journalists.id, { onDelete: "cascade" }),
    isActive: boolean("is_active").notNull().default(true),
    subscribedAt: bigint("subscribed_at", { mode: "number" })
      .notNull()
      .default(sql`(extract(epoch from now()) * 1000)::bigint`),
  },
  (table) => [
    unique("uniq_journalist_subscription").on(table.readerId, table.journalistId),
    index("idx_journalist_subs_target").on(table.journalistId, table.isActive),
  ],
);

export const publisherSubscriptions = pgTable(
  "publisher_subscriptions",
  {
    id: text("id").primaryKey(),
    readerId: text("reader_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    publisherId: text("publisher_id")
      .notNull()
      .references(() => publishers.id, { onDelete: "cascade" }),
    isActive: boolean("is_active").notNull().default(true),
    subscribedAt: bigint("subscribed_at", { mode: "number" })
      .notNull()
      .default(sql`(extract(epoch from now()) * 1000)::bigint`),
  },
  (table) => [
    unique("uniq_publisher_subscription").on(table.readerId, table.publisherId),
    index("idx_publisher_subs_target").on(table.publisherId, table.isActive),
  ],
);
