import { and, asc, count, desc, eq, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import {
  articles,
  journalists,
  journalistSubscriptions,
  publishers,
  publisherSubscriptions,
  users,
} from "../db/schema/index.js";
import { displayName } from "../auth/user-repository.js";

export type SubscriptionTargetKind = "journalist" | "publisher";

export interface SubscriptionTarget {
  kind: SubscriptionTargetKind;
  id: string;
}

export type SubscribeOutcome = "subscribed" | "resubscribed" | "already_subscribed";
export type UnsubscribeOutcome = "unsubscribed" | "not_subscribed";

export interface JournalistSubscriptionView {
  subscriptionId: string;
  journalistId: string;
  journalistName: string;
  username: string;
  publisherId: string;
  publisherName: string;
  subscribedAt: number;
}

export interface PublisherSubscriptionView {
  subscriptionId: string;
  publisherId: string;
  publisherName: string;
  subscribedAt: number;
}

export interface Subscriber {
  userId: string;
  username: string;
  email: string;
}

export interface BrowseJournalist {
  id: string;
  name: string;
  username: string;
  publisherId: string;
  publisherName: string;
  articleCount: number;
  subscriberCount: number;
  subscribed: boolean;
}

export interface BrowsePublisher {
  id: string;
  name: string;
  description: string | null;
  articleCount: number;
  subscriberCount: number;
  subscribed: boolean;
}

export interface ISubscriptionRepository {
  subscribe(readerId: string, target: SubscriptionTarget): Promise<SubscribeOutcome>;
  unsubscribe(readerId: string, target: SubscriptionTarget): Promise<UnsubscribeOutcome>;
  isActive(readerId: string, target: SubscriptionTarget): Promise<boolean>;
  /** Set every active subscription of the reader inactive. Returns how many rows changed. */
  deactivateAllForReader(readerId: string): Promise<{ journalists: number; publishers: number }>;
  activeCounts(readerId: string): Promise<{ journalists: number; publishers: number }>;
  listActiveJournalistSubscriptions(readerId: string): Promise<JournalistSubscriptionView[]>;
  listActivePublisherSubscriptions(readerId: string): Promise<PublisherSubscriptionView[]>;
  /** Active subscribers of the journalist, then of the publisher. May repeat users and emails. */
  subscribersOf(journalistId: string, publisherId: string): Promise<Subscriber[]>;
  activeSubscriberCount(target: SubscriptionTarget): Promise<number>;
  browseJournalists(readerId: string): Promise<BrowseJournalist[]>;
  browsePublishers(readerId: string): Promise<BrowsePublisher[]>;
}

export class DrizzleSubscriptionRepository implements ISubscriptionRepository {
  constructor(private readonly db: DrizzleDb) {}

  async subscribe(readerId: string, target: SubscriptionTarget): Promise<SubscribeOutcome> {
    const now = Date.now();
    if (target.kind === "journalist") {
      const inserted = await this.db
        .insert(journalistSubscriptions)
        .values({ id: crypto.randomUUID(), readerId, journalistId: target.id, isActive: true, subscribedAt: now })
        .onConflictDoNothing({ target: [journalistSubscriptions.readerId, journalistSubscriptions.journalistId] })
        .returning({ id: journalistSubscriptions.id });
      if (inserted.length > 0) return "subscribed";
      const reactivated = await this.db
        .update(journalistSubscriptions)
        .set({ isActive: true })
        .where(
          and(
            eq(journalistSubscriptions.readerId, readerId),
            eq(journalistSubscriptions.journalistId, target.id),
            eq(journalistSubscriptions.isActive, false),
          ),
        )
        .returning({ id: journalistSubscriptions.id });
      return reactivated.length > 0 ? "resubscribed" : "already_subscribed";
    }

    const inserted = await this.db
      .insert(publisherSubscriptions)
      .values({ id: crypto.randomUUID(), readerId, publisherId: target.id, isActive: true, subscribedAt: now })
      .onConflictDoNothing({ target: [publisherSubscriptions.readerId, publisherSubscriptions.publisherId] })
      .returning({ id: publisherSubscriptions.id });
    if (inserted.length > 0) return "subscribed";
    const reactivated = await this.db
      .update(publisherSubscriptions)
      .set({ isActive: true })
      .where(
        and(
          eq(publisherSubscriptions.readerId, readerId),
          eq(publisherSubscriptions.publisherId, target.id),
          eq(publisherSubscriptions.isActive, false),
        ),
      )
      .returning({ id: publisherSubscriptions.id });
    return reactivated.length > 0 ? "resubscribed" : "already_subscribed";
  }

  async unsubscribe(readerId: string, target: SubscriptionTarget): Promise<UnsubscribeOutcome> {
    const rows =
      target.kind === "journalist"
        ? await this.db
            .update(journalistSubscriptions)
            .set({ isActive: false })
            .where(
              and(
                eq(journalistSubscriptions.readerId, readerId),
                eq(journalistSubscriptions.journalistId, target.id),
                eq(journalistSubscriptions.isActive, true),
              ),
            )
            .returning({ id: journalistSubscriptions.id })
        : await this.db
            .update(publisherSubscriptions)
            .set({ isActive: false })
            .where(
              and(
                eq(publisherSubscriptions.readerId, readerId),
                eq(publisherSubscriptions.publisherId, target.id),
                eq(publisherSubscriptions.isActive, true),
              ),
            )
            .returning({ id: publisherSubscriptions.id });
    return rows.length > 0 ? "unsubscribed" : "not_subscribed";
  }

  async isActive(readerId: string, target: SubscriptionTarget): Promise<boolean> {
    const rows =
      target.kind === "journalist"
        ? await this.db
            .select({ id: journalistSubscriptions.id })
            .from(journalistSubscriptions)
            .where(
              and(
                eq(journalistSubscriptions.readerId, readerId),
                eq(journalistSubscriptions.journalistId, target.id),
                eq(journalistSubscriptions.isActive, true),
              ),
            )
            .limit(1)
        : await this.db
            .select({ id: publisherSubscriptions.id })
            .from(publisherSubscriptions)
            .where(
              and(
                eq(publisherSubscriptions.readerId, readerId),
                eq(publisherSubscriptions.publisherId, target.id),
                eq(publisherSubscriptions.isActive, true),
              ),
            )
            .limit(1);
    return rows.length > 0;
  }

  async deactivateAllForReader(readerId: string): Promise<{ journalists: number; publishers: number }> {
    const j = await this.db
      .update(journalistSubscriptions)
      .set({ isActive: false })
      .where(and(eq(journalistSubscriptions.readerId, readerId), eq(journalistSubscriptions.isActive, true)))
      .returning({ id: journalistSubscriptions.id });
    const p = await this.db
      .update(publisherSubscriptions)
      .set({ isActive: false })
      .where(and(eq(publisherSubscriptions.readerId, readerId), eq(publisherSubscriptions.isActive, true)))
      .returning({ id: publisherSubscriptions.id });
    return { journalists: j.length, publishers: p.length };
  }

  async activeCounts(readerId: string): Promise<{ journalists: number; publishers: number }> {
    const [j, p] = await Promise.all([
      this.db
        .select({ n: count() })
        .from(journalistSubscriptions)
        .where(and(eq(journalistSubscriptions.readerId, readerId), eq(journalistSubscriptions.isActive, true))),
      this.db
        .select({ n: count() })
        .from(publisherSubscriptions)
        .where(and(eq(publisherSubscriptions.readerId, readerId), eq(publisherSubscriptions.isActive, true))),
    ]);
    return { journalists: j[0]?.n ?? 0, publishers: p[0]?.n ?? 0 };
  }

  async listActiveJournalistSubscriptions(readerId: string): Promise<JournalistSubscriptionView[]> {
    const rows = await this.db
      .select({
        subscriptionId: journalistSubscriptions.id,
        journalistId: journalists.id,
        username: users.username,
        firstName: users.firstName,
        lastName: users.lastName,
        publisherId: publishers.id,
        publisherName: publishers.name,
        subscribedAt: journalistSubscriptions.subscribedAt,
      })
      .from(journalistSubscriptions)
      .innerJoin(journalists, eq(journalists.id, journalistSubscriptions.journalistId))
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, journalists.publisherId))
      .where(and(eq(journalistSubscriptions.readerId, readerId), eq(journalistSubscriptions.isActive, true)))
      .orderBy(desc(journalistSubscriptions.subscribedAt), asc(journalistSubscriptions.id));
    return rows.map((row) => ({
      subscriptionId: row.subscriptionId,
      journalistId: row.journalistId,
      journalistName: displayName(row),
      username: row.username,
      publisherId: row.publisherId,
      publisherName: row.publisherName,
      subscribedAt: row.subscribedAt,
    }));
  }

  async listActivePublisherSubscriptions(readerId: string): Promise<PublisherSubscriptionView[]> {
    return this.db
      .select({
        subscriptionId: publisherSubscriptions.id,
        publisherId: publishers.id,
        publisherName: publishers.name,
        subscribedAt: publisherSubscriptions.subscribedAt,
      })
      .from(publisherSubscriptions)
      .innerJoin(publishers, eq(publishers.id, publisherSubscriptions.publisherId))
      .where(and(eq(publisherSubscriptions.readerId, readerId), eq(publisherSubscriptions.isActive, true)))
      .orderBy(desc(publisherSubscriptions.subscribedAt), asc(publisherSubscriptions.id));
  }

  async subscribersOf(journalistId: string, publisherId: string): Promise<Subscriber[]> {
    const columns = { userId: users.id, username: users.username, email: users.email };
    const viaJournalist = await this.db
      .select(columns)
      .from(journalistSubscriptions)
      .innerJoin(users, eq(users.id, journalistSubscriptions.readerId))
      .where(and(eq(journalistSubscriptions.journalistId, journalistId), eq(journalistSubscriptions.isActive, true)))
      .orderBy(asc(journalistSubscriptions.subscribedAt), asc(users.id));
    const viaPublisher = await this.db
      .select(columns)
      .from(publisherSubscriptions)
      .innerJoin(users, eq(users.id, publisherSubscriptions.readerId))
      .where(and(eq(publisherSubscriptions.publisherId, publisherId), eq(publisherSubscriptions.isActive, true)))
      .orderBy(asc(publisherSubscriptions.subscribedAt), asc(users.id));
    return [...viaJournalist, ...viaPublisher];
  }

  async activeSubscriberCount(target: SubscriptionTarget): Promise<number> {
    const rows =
      target.kind === "journalist"
        ? await this.db
            .select({ n: count() })
            .from(journalistSubscriptions)
            .where(and(eq(journalistSubscriptions.journalistId, target.id), eq(journalistSubscriptions.isActive, true)))
        : await this.db
            .select({ n: count() })
            .from(publisherSubscriptions)
            .where(and(eq(publisherSubscriptions.publisherId, target.id), eq(publisherSubscriptions.isActive, true)));
    return rows[0]?.n ?? 0;
  }

  async browseJournalists(readerId: string): Promise<BrowseJournalist[]> {
    const articleCount = sql<number>`(select count(*) from ${articles} where ${articles.journalistId} = ${journalists.id} and ${articles.status} = 'approved')`.mapWith(
      Number,
    );
    const subscriberCount = sql<number>`(select count(*) from ${journalistSubscriptions} where ${journalistSubscriptions.journalistId} = ${journalists.id} and ${journalistSubscriptions.isActive} = true)`.mapWith(
      Number,
    );
    const subscribed = sql<boolean>`exists(select 1 from ${journalistSubscriptions} where ${journalistSubscriptions.journalistId} = ${journalists.id} and ${journalistSubscriptions.readerId} = ${readerId} and ${journalistSubscriptions.isActive} = true)`.mapWith(
      Boolean,
    );

    const rows = await this.db
      .select({
        id: journalists.id,
        username: users.username,
        firstName: users.firstName,
        lastName: users.lastName,
        publisherId: publishers.id,
        publisherName: publishers.name,
        articleCount,
        subscriberCount,
        subscribed,
      })
      .from(journalists)
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, journalists.publisherId))
      .orderBy(desc(articleCount), asc(users.username));

    return rows.map((row) => ({
      id: row.id,
      name: displayName(row),
      username: row.username,
      publisherId: row.publisherId,
      publisherName: row.publisherName,
      articleCount: row.articleCount,
      subscriberCount: row.subscriberCount,
      subscribed: row.subscribed,
    }));
  }

  async browsePublishers(readerId: string): Promise<BrowsePublisher[]> {
    const articleCount = sql<number>`(select count(*) from ${articles} where ${articles.publisherId} = ${publishers.id} and ${articles.status} = 'approved')`.mapWith(
      Number,
    );
    const subscriberCount = sql<number>`(select count(*) from ${publisherSubscriptions} where ${publisherSubscriptions.publisherId} = ${publishers.id} and ${publisherSubscriptions.isActive} = true)`.mapWith(
      Number,
    );
    const subscribed = sql<boolean>`exists(select 1 from ${publisherSubscriptions} where ${publisherSubscriptions.publisherId} = ${publishers.id} and ${publisherSubscriptions.readerId} = ${readerId} and ${publisherSubscriptions.isActive} = true)`.mapWith(
      Boolean,
    );

    return this.db
      .select({
        id: publishers.id,
        name: publishers.name,
        description: publishers.description,
        articleCount,
        subscriberCount,
        subscribed,
      })
      .from(publishers)
      .orderBy(desc(articleCount), asc(publishers.name));
  }
}
