import { and, asc, count, desc, eq, type SQL } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { articles, journalists, publishers, users } from "../db/schema/index.js";
import { displayName } from "../auth/user-repository.js";
import type { ArticleStatus, PageResult, PageWindow } from "../domain/types.js";
import {
  type ContentChanges,
  type ContentDetail,
  type ContentListFilter,
  type ContentListItem,
  type NewContent,
  subscribedContent,
  toListItem,
} from "./content-queries.js";

export interface Article {
  id: string;
  title: string;
  content: string;
  journalistId: string;
  publisherId: string;
  status: ArticleStatus;
  createdAt: number;
  updatedAt: number;
}

export interface ArticleDetail extends ContentDetail {
  status: ArticleStatus;
}

export interface ArticleListItem extends ContentListItem {
  status: ArticleStatus;
}

export interface IArticleRepository {
  create(input: NewContent): Promise<Article>;
  getById(id: string): Promise<Article | null>;
  getDetail(id: string): Promise<ArticleDetail | null>;
  update(id: string, changes: ContentChanges): Promise<Article | null>;
  delete(id: string): Promise<boolean>;
  /**
   * Move an article to `status`. With `from`, only an article currently in
   * that status moves. Returns the updated article, or null when nothing changed.
   */
  setStatus(id: string, status: ArticleStatus, from?: ArticleStatus): Promise<Article | null>;
  /** Approved articles, newest first. One query, no duplicates. */
  listApproved(filter: ContentListFilter, window?: PageWindow): Promise<PageResult<ArticleListItem>>;
  /** Every article (any status) of a publisher or journalist, newest first. */
  listAll(filter: { publisherId?: string; journalistId?: string }): Promise<ArticleListItem[]>;
  statusCounts(filter: { publisherId?: string; journalistId?: string }): Promise<Record<ArticleStatus, number>>;
}

const listColumns = {
  id: articles.id,
  title: articles.title,
  status: articles.status,
  journalistId: articles.journalistId,
  username: users.username,
  firstName: users.firstName,
  lastName: users.lastName,
  publisherId: articles.publisherId,
  publisherName: publishers.name,
  createdAt: articles.createdAt,
};

export class DrizzleArticleRepository implements IArticleRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(input: NewContent): Promise<Article> {
    const now = input.createdAt ?? Date.now();
    const rows = await this.db
      .insert(articles)
      .values({
        id: crypto.randomUUID(),
        title: input.title,
        content: input.content,
        journalistId: input.journalistId,
        publisherId: input.publisherId,
        status: "pending",
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return rows[0];
  }

  async getById(id: string): Promise<Article | null> {
    const rows = await this.db.select().from(articles).where(eq(articles.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getDetail(id: string): Promise<ArticleDetail | null> {
    const rows = await this.db
      .select({
        article: articles,
        userId: users.id,
        username: users.username,
        firstName: users.firstName,
        lastName: users.lastName,
        email: users.email,
        publisherName: publishers.name,
      })
      .from(articles)
      .innerJoin(journalists, eq(journalists.id, articles.journalistId))
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, articles.publisherId))
      .where(eq(articles.id, id))
      .limit(1);
    const row = rows[0];
    if (!row) return null;
    return {
      id: row.article.id,
      title: row.article.title,
      content: row.article.content,
      status: row.article.status,
      journalist: {
        id: row.article.journalistId,
        userId: row.userId,
        name: displayName(row),
        username: row.username,
        email: row.email,
        publisherName: row.publisherName,
      },
      publisher: { id: row.article.publisherId, name: row.publisherName },
      createdAt: row.article.createdAt,
      updatedAt: row.article.updatedAt,
    };
  }

  async update(id: string, changes: ContentChanges): Promise<Article | null> {
    const rows = await this.db
      .update(articles)
      .set({ ...changes, updatedAt: Date.now() })
      .where(eq(articles.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.db.delete(articles).where(eq(articles.id, id)).returning({ id: articles.id });
    return rows.length > 0;
  }

  async setStatus(id: string, status: ArticleStatus, from?: ArticleStatus): Promise<Article | null> {
    const where = from ? and(eq(articles.id, id), eq(articles.status, from)) : eq(articles.id, id);
    const rows = await this.db.update(articles).set({ status, updatedAt: Date.now() }).where(where).returning();
    return rows[0] ?? null;
  }

  async listApproved(filter: ContentListFilter, window?: PageWindow): Promise<PageResult<ArticleListItem>> {
    const conditions: (SQL | undefined)[] = [eq(articles.status, "approved")];
    if (filter.subscriberId) {
      conditions.push(subscribedContent(this.db, filter.subscriberId, articles.journalistId, articles.publisherId));
    }
    if (filter.journalistId) conditions.push(eq(articles.journalistId, filter.journalistId));
    if (filter.publisherId) conditions.push(eq(articles.publisherId, filter.publisherId));
    const where = and(...conditions);

    let query = this.db
      .select(listColumns)
      .from(articles)
      .innerJoin(journalists, eq(journalists.id, articles.journalistId))
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, articles.publisherId))
      .where(where)
      .orderBy(desc(articles.createdAt), asc(articles.id))
      .$dynamic();
    if (window) query = query.limit(window.limit).offset(window.offset);

    const [rows, totals] = await Promise.all([query, this.db.select({ total: count() }).from(articles).where(where)]);
    return {
      total: totals[0]?.total ?? 0,
      items: rows.map((row) => ({ ...toListItem(row), status: row.status })),
    };
  }

  async listAll(filter: { publisherId?: string; journalistId?: string }): Promise<ArticleListItem[]> {
    const rows = await this.db
      .select(listColumns)
      .from(articles)
      .innerJoin(journalists, eq(journalists.id, articles.journalistId))
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, articles.publisherId))
      .where(ownerFilter(filter))
      .orderBy(desc(articles.createdAt), asc(articles.id));
    return rows.map((row) => ({ ...toListItem(row), status: row.status }));
  }

  async statusCounts(filter: { publisherId?: string; journalistId?: string }): Promise<Record<ArticleStatus, number>> {
    const rows = await this.db
      .select({ status: articles.status, n: count() })
      .from(articles)
      .where(ownerFilter(filter))
      .groupBy(articles.status);
    const counts: Record<ArticleStatus, number> = { pending: 0, approved: 0, rejected: 0 };
    for (const row of rows) counts[row.status] = row.n;
    return counts;
  }
}

function ownerFilter(filter: { publisherId?: string; journalistId?: string }): SQL | undefined {
  return and(
    filter.publisherId ? eq(articles.publisherId, filter.publisherId) : undefined,
    filter.journalistId ? eq(articles.journalistId, filter.journalistId) : undefined,
  );
}
