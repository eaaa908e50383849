import { and, eq, inArray, or, type SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import type { DrizzleDb } from "../db/index.js";
import { journalistSubscriptions, publisherSubscriptions } from "../db/schema/index.js";
import { displayName } from "../auth/user-repository.js";

/** Row shape of a content listing: id, title, journalist_name, publisher_name, created_at. */
export interface ContentListItem {
  id: string;
  title: string;
  journalistId: string;
  journalistName: string;
  publisherId: string;
  publisherName: string;
  createdAt: number;
}

export interface ContentAuthor {
  id: string;
  userId: string;
  name: string;
  username: string;
  email: string;
  publisherName: string;
}

export interface ContentDetail {
  id: string;
  title: string;
  content: string;
  journalist: ContentAuthor;
  publisher: { id: string; name: string };
  createdAt: number;
  updatedAt: number;
}

export interface ContentListFilter {
  /** Restrict to content reachable through this reader's active subscriptions. */
  subscriberId?: string;
  journalistId?: string;
  publisherId?: string;
}

export interface NewContent {
  title: string;
  content: string;
  journalistId: string;
  publisherId: string;
  /** Defaults to now. */
  createdAt?: number;
}

export interface ContentChanges {
  title?: string;
  content?: string;
}

export interface ListRow {
  id: string;
  title: string;
  journalistId: string;
  username: string;
  firstName: string;
  lastName: string;
  publisherId: string;
  publisherName: string;
  createdAt: number;
}

export function toListItem(row: ListRow): ContentListItem {
  return {
    id: row.id,
    title: row.title,
    journalistId: row.journalistId,
    journalistName: displayName(row),
    publisherId: row.publisherId,
    publisherName: row.publisherName,
    createdAt: row.createdAt,
  };
}

/**
 * `journalist_id IN (active journalist subscriptions) OR publisher_id IN (active publisher subscriptions)`.
 * A row matching both branches is still one row.
 */
export function subscribedContent(
  db: DrizzleDb,
  readerId: string,
  journalistColumn: AnyPgColumn,
  publisherColumn: AnyPgColumn,
): SQL | undefined {
  return or(
    inArray(
      journalistColumn,
      db
        .select({ id: journalistSubscriptions.journalistId })
        .from(journalistSubscriptions)
        .where(and(eq(journalistSubscriptions.readerId, readerId), eq(journalistSubscriptions.isActive, true))),
    ),
    inArray(
      publisherColumn,
      db
        .select({ id: publisherSubscriptions.publisherId })
        .from(publisherSubscriptions)
        .where(and(eq(publisherSubscriptions.readerId, readerId), eq(publisherSubscriptions.isActive, true))),
    ),
  );
}

/** Title and content are trimmed; both required, title at most 255 characters. */
export const MAX_TITLE_LENGTH = 255;
