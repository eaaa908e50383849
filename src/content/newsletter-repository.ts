import { and, asc, count, desc, eq, type SQL } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { journalists, newsletters, publishers, users } from "../db/schema/index.js";
import { displayName } from "../auth/user-repository.js";
import type { PageResult, PageWindow } from "../domain/types.js";
import {
  type ContentChanges,
  type ContentDetail,
  type ContentListFilter,
  type ContentListItem,
  type NewContent,
  subscribedContent,
  toListItem,
} from "./content-queries.js";

export interface Newsletter {
  id: string;
  title: string;
  content: string;
  journalistId: string;
  publisherId: string;
  createdAt: number;
  updatedAt: number;
}

export interface INewsletterRepository {
  create(input: NewContent): Promise<Newsletter>;
  getById(id: string): Promise<Newsletter | null>;
  getDetail(id: string): Promise<ContentDetail | null>;
  update(id: string, changes: ContentChanges): Promise<Newsletter | null>;
  delete(id: string): Promise<boolean>;
  /** Newsletters have no review gate: every row is listable. Newest first. */
  list(filter: ContentListFilter, window?: PageWindow): Promise<PageResult<ContentListItem>>;
  countFor(filter: { publisherId?: string; journalistId?: string }): Promise<number>;
}

const listColumns = {
  id: newsletters.id,
  title: newsletters.title,
  journalistId: newsletters.journalistId,
  username: users.username,
  firstName: users.firstName,
  lastName: users.lastName,
  publisherId: newsletters.publisherId,
  publisherName: publishers.name,
  createdAt: newsletters.createdAt,
};

export class DrizzleNewsletterRepository implements INewsletterRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(input: NewContent): Promise<Newsletter> {
    const now = input.createdAt ?? Date.now();
    const rows = await this.db
      .insert(newsletters)
      .values({
        id: crypto.randomUUID(),
        title: input.title,
        content: input.content,
        journalistId: input.journalistId,
        publisherId: input.publisherId,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return rows[0];
  }

  async getById(id: string): Promise<Newsletter | null> {
    const rows = await this.db.select().from(newsletters).where(eq(newsletters.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getDetail(id: string): Promise<ContentDetail | null> {
    const rows = await this.db
      .select({
        newsletter: newsletters,
        userId: users.id,
        username: users.username,
        firstName: users.firstName,
        lastName: users.lastName,
        email: users.email,
        publisherName: publishers.name,
      })
      .from(newsletters)
      .innerJoin(journalists, eq(journalists.id, newsletters.journalistId))
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, newsletters.publisherId))
      .where(eq(newsletters.id, id))
      .limit(1);
    const row = rows[0];
    if (!row) return null;
    return {
      id: row.newsletter.id,
      title: row.newsletter.title,
      content: row.newsletter.content,
      journalist: {
        id: row.newsletter.journalistId,
        userId: row.userId,
        name: displayName(row),
        username: row.username,
        email: row.email,
        publisherName: row.publisherName,
      },
      publisher: { id: row.newsletter.publisherId, name: row.publisherName },
      createdAt: row.newsletter.createdAt,
      updatedAt: row.newsletter.updatedAt,
    };
  }

  async update(id: string, changes: ContentChanges): Promise<Newsletter | null> {
    const rows = await this.db
      .update(newsletters)
      .set({ ...changes, updatedAt: Date.now() })
      .where(eq(newsletters.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.db.delete(newsletters).where(eq(newsletters.id, id)).returning({ id: newsletters.id });
    return rows.length > 0;
  }

  async list(filter: ContentListFilter, window?: PageWindow): Promise<PageResult<ContentListItem>> {
    const conditions: (SQL | undefined)[] = [];
    if (filter.subscriberId) {
      conditions.push(
        subscribedContent(this.db, filter.subscriberId, newsletters.journalistId, newsletters.publisherId),
      );
    }
    if (filter.journalistId) conditions.push(eq(newsletters.journalistId, filter.journalistId));
    if (filter.publisherId) conditions.push(eq(newsletters.publisherId, filter.publisherId));
    const where = and(...conditions);

    let query = this.db
      .select(listColumns)
      .from(newsletters)
      .innerJoin(journalists, eq(journalists.id, newsletters.journalistId))
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, newsletters.publisherId))
      .where(where)
      .orderBy(desc(newsletters.createdAt), asc(newsletters.id))
      .$dynamic();
    if (window) query = query.limit(window.limit).offset(window.offset);

    const [rows, totals] = await Promise.all([
      query,
      this.db.select({ total: count() }).from(newsletters).where(where),
    ]);
    return { total: totals[0]?.total ?? 0, items: rows.map(toListItem) };
  }

  async countFor(filter: { publisherId?: string; journalistId?: string }): Promise<number> {
    const rows = await this.db
      .select({ n: count() })
      .from(newsletters)
      .where(
        and(
          filter.publisherId ? eq(newsletters.publisherId, filter.publisherId) : undefined,
          filter.journalistId ? eq(newsletters.journalistId, filter.journalistId) : undefined,
        ),
      );
    return rows[0]?.n ?? 0;
  }
}
