import { and, asc, desc, eq, inArray } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { roleApplications, users } from "../db/schema/index.js";
import type { AppliableRole, ApplicationStatus } from "../domain/types.js";

export interface RoleApplication {
  id: string;
  userId: string;
  appliedRole: AppliableRole;
  motivation: string;
  status: ApplicationStatus;
  submittedAt: number;
  decidedAt: number | null;
  decidedBy: string | null;
}

export interface RoleApplicationWithUser extends RoleApplication {
  username: string;
  email: string;
}

export interface IRoleApplicationRepository {
  /** Throws a unique violation when the user already has a pending application. */
  create(userId: string, appliedRole: AppliableRole, motivation: string, submittedAt?: number): Promise<RoleApplication>;
  getById(id: string): Promise<RoleApplication | null>;
  getPendingForUser(userId: string): Promise<RoleApplication | null>;
  /**
   * Record a decision. When `from` is given, only an application currently in
   * one of those statuses moves. Returns null when nothing changed.
   */
  setStatus(
    id: string,
    status: ApplicationStatus,
    decidedBy: string | null,
    from?: ApplicationStatus[],
  ): Promise<RoleApplication | null>;
  /** Every application, ordered by status then newest first. */
  listAll(): Promise<RoleApplicationWithUser[]>;
}

export class DrizzleRoleApplicationRepository implements IRoleApplicationRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(
    userId: string,
    appliedRole: AppliableRole,
    motivation: string,
    submittedAt = Date.now(),
  ): Promise<RoleApplication> {
    const rows = await this.db
      .insert(roleApplications)
      .values({ id: crypto.randomUUID(), userId, appliedRole, motivation, status: "pending", submittedAt })
      .returning();
    return rows[0];
  }

  async getById(id: string): Promise<RoleApplication | null> {
    const rows = await this.db.select().from(roleApplications).where(eq(roleApplications.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async getPendingForUser(userId: string): Promise<RoleApplication | null> {
    const rows = await this.db
      .select()
      .from(roleApplications)
      .where(and(eq(roleApplications.userId, userId), eq(roleApplications.status, "pending")))
      .limit(1);
    return rows[0] ?? null;
  }

  async setStatus(
    id: string,
    status: ApplicationStatus,
    decidedBy: string | null,
    from?: ApplicationStatus[],
  ): Promise<RoleApplication | null> {
    const where = from
      ? and(eq(roleApplications.id, id), inArray(roleApplications.status, from))
      : eq(roleApplications.id, id);
    const rows = await this.db
      .update(roleApplications)
      .set({ status, decidedBy, decidedAt: Date.now() })
      .where(where)
      .returning();
    return rows[0] ?? null;
  }

  async listAll(): Promise<RoleApplicationWithUser[]> {
    const rows = await this.db
      .select({ application: roleApplications, username: users.username, email: users.email })
      .from(roleApplications)
      .innerJoin(users, eq(users.id, roleApplications.userId))
      .orderBy(asc(roleApplications.status), desc(roleApplications.submittedAt), asc(roleApplications.id));
    return rows.map((row) => ({ ...row.application, username: row.username, email: row.email }));
  }
}
