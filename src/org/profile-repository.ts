import { asc, count, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { editors, journalists, publishers, users } from "../db/schema/index.js";
import { displayName } from "../auth/user-repository.js";
import type { PageResult, PageWindow } from "../domain/types.js";

// ---------------------------------------------------------------------------
// Domain types
// ---------------------------------------------------------------------------

export interface Publisher {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  createdAt: number;
}

/** Editors and journalists share a shape: one user attached to one publisher. */
export interface StaffProfile {
  id: string;
  userId: string;
  publisherId: string;
  createdAt: number;
}

export interface JournalistSummary {
  id: string;
  userId: string;
  /** Full name, or the username when none is on record. */
  name: string;
  username: string;
  email: string;
  publisherId: string;
  publisherName: string;
}

export interface EditorSummary {
  id: string;
  userId: string;
  name: string;
  username: string;
}

export interface ProfileIds {
  publisherId: string | null;
  editorId: string | null;
  journalistId: string | null;
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface IProfileRepository {
  getPublisherById(id: string): Promise<Publisher | null>;
  getPublisherByUserId(userId: string): Promise<Publisher | null>;
  getEditorByUserId(userId: string): Promise<StaffProfile | null>;
  getJournalistByUserId(userId: string): Promise<StaffProfile | null>;
  getJournalistSummary(id: string): Promise<JournalistSummary | null>;
  profileIds(userId: string): Promise<ProfileIds>;

  /** Existing publisher profile of the user, or a new one with this name. */
  getOrCreatePublisher(userId: string, name: string): Promise<Publisher>;
  /** Existing editor profile of the user (wherever it points), or a new one. */
  getOrCreateEditor(userId: string, publisherId: string): Promise<StaffProfile>;
  getOrCreateJournalist(userId: string, publisherId: string): Promise<StaffProfile>;

  listPublishers(window?: PageWindow): Promise<PageResult<Publisher>>;
  listJournalists(window?: PageWindow): Promise<PageResult<JournalistSummary>>;
  listEditorsOf(publisherId: string): Promise<EditorSummary[]>;
  listJournalistsOf(publisherId: string): Promise<JournalistSummary[]>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

const journalistSummaryColumns = {
  id: journalists.id,
  userId: journalists.userId,
  username: users.username,
  firstName: users.firstName,
  lastName: users.lastName,
  email: users.email,
  publisherId: publishers.id,
  publisherName: publishers.name,
};

type JournalistSummaryRow = {
  id: string;
  userId: string;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  publisherId: string;
  publisherName: string;
};

function toJournalistSummary(row: JournalistSummaryRow): JournalistSummary {
  return {
    id: row.id,
    userId: row.userId,
    name: displayName(row),
    username: row.username,
    email: row.email,
    publisherId: row.publisherId,
    publisherName: row.publisherName,
  };
}

export class DrizzleProfileRepository implements IProfileRepository {
  constructor(private readonly db: DrizzleDb) {}

  async getPublisherById(id: string): Promise<Publisher | null> {
    const rows = await this.db.select().from(publishers).where(eq(publishers.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getPublisherByUserId(userId: string): Promise<Publisher | null> {
    const rows = await this.db.select().from(publishers).where(eq(publishers.userId, userId)).limit(1);
    return rows[0] ?? null;
  }

  async getEditorByUserId(userId: string): Promise<StaffProfile | null> {
    const rows = await this.db.select().from(editors).where(eq(editors.userId, userId)).limit(1);
    return rows[0] ?? null;
  }

  async getJournalistByUserId(userId: string): Promise<StaffProfile | null> {
    const rows = await this.db.select().from(journalists).where(eq(journalists.userId, userId)).limit(1);
    return rows[0] ?? null;
  }

  async getJournalistSummary(id: string): Promise<JournalistSummary | null> {
    const rows = await this.db
      .select(journalistSummaryColumns)
      .from(journalists)
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, journalists.publisherId))
      .where(eq(journalists.id, id))
      .limit(1);
    return rows[0] ? toJournalistSummary(rows[0]) : null;
  }

  async profileIds(userId: string): Promise<ProfileIds> {
    const [publisher, editor, journalist] = await Promise.all([
      this.getPublisherByUserId(userId),
      this.getEditorByUserId(userId),
      this.getJournalistByUserId(userId),
    ]);
    return {
      publisherId: publisher?.id ?? null,
      editorId: editor?.id ?? null,
      journalistId: journalist?.id ?? null,
    };
  }

  async getOrCreatePublisher(userId: string, name: string): Promise<Publisher> {
    const existing = await this.getPublisherByUserId(userId);
    if (existing) return existing;
    await this.db
      .insert(publishers)
      .values({ id: crypto.randomUUID(), userId, name, createdAt: Date.now() })
      .onConflictDoNothing({ target: publishers.userId });
    const created = await this.getPublisherByUserId(userId);
    if (!created) throw new Error(`Publisher profile for user ${userId} was not created`);
    return created;
  }

  async getOrCreateEditor(userId: string, publisherId: string): Promise<StaffProfile> {
    await this.db
      .insert(editors)
      .values({ id: crypto.randomUUID(), userId, publisherId, createdAt: Date.now() })
      .onConflictDoNothing({ target: editors.userId });
    const row = await this.getEditorByUserId(userId);
    if (!row) throw new Error(`Editor profile for user ${userId} was not created`);
    return row;
  }

  async getOrCreateJournalist(userId: string, publisherId: string): Promise<StaffProfile> {
    await this.db
      .insert(journalists)
      .values({ id: crypto.randomUUID(), userId, publisherId, createdAt: Date.now() })
      .onConflictDoNothing({ target: journalists.userId });
    const row = await this.getJournalistByUserId(userId);
    if (!row) throw new Error(`Journalist profile for user ${userId} was not created`);
    return row;
  }

  async listPublishers(window?: PageWindow): Promise<PageResult<Publisher>> {
    let query = this.db.select().from(publishers).orderBy(asc(publishers.name), asc(publishers.id)).$dynamic();
    if (window) query = query.limit(window.limit).offset(window.offset);
    const [items, totals] = await Promise.all([query, this.db.select({ total: count() }).from(publishers)]);
    return { total: totals[0]?.total ?? 0, items };
  }

  async listJournalists(window?: PageWindow): Promise<PageResult<JournalistSummary>> {
    let query = this.db
      .select(journalistSummaryColumns)
      .from(journalists)
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, journalists.publisherId))
      .orderBy(asc(users.username), asc(journalists.id))
      .$dynamic();
    if (window) query = query.limit(window.limit).offset(window.offset);
    const [rows, totals] = await Promise.all([query, this.db.select({ total: count() }).from(journalists)]);
    return { total: totals[0]?.total ?? 0, items: rows.map(toJournalistSummary) };
  }

  async listEditorsOf(publisherId: string): Promise<EditorSummary[]> {
    const rows = await this.db
      .select({
        id: editors.id,
        userId: editors.userId,
        username: users.username,
        firstName: users.firstName,
        lastName: users.lastName,
      })
      .from(editors)
      .innerJoin(users, eq(users.id, editors.userId))
      .where(eq(editors.publisherId, publisherId))
      .orderBy(asc(users.username));
    return rows.map((row) => ({ id: row.id, userId: row.userId, name: displayName(row), username: row.username }));
  }

  async listJournalistsOf(publisherId: string): Promise<JournalistSummary[]> {
    const rows = await this.db
      .select(journalistSummaryColumns)
      .from(journalists)
      .innerJoin(users, eq(users.id, journalists.userId))
      .innerJoin(publishers, eq(publishers.id, journalists.publisherId))
      .where(eq(journalists.publisherId, publisherId))
      .orderBy(asc(users.username));
    return rows.map(toJournalistSummary);
  }
}
