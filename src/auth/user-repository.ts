import { asc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { users } from "../db/schema/index.js";
import type { Role } from "../domain/types.js";

export interface User {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: Role;
  isStaff: boolean;
  createdAt: number;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  firstName?: string;
  lastName?: string;
  role?: Role;
  isStaff?: boolean;
}

export interface IUserRepository {
  create(input: NewUser): Promise<User>;
  getById(id: string): Promise<User | null>;
  getByUsername(username: string): Promise<User | null>;
  /** Oldest account registered with this email (emails are not unique). */
  getByEmail(email: string): Promise<User | null>;
  getPasswordHash(userId: string): Promise<string | null>;
  setPasswordHash(userId: string, passwordHash: string): Promise<void>;
  setRole(userId: string, role: Role): Promise<void>;
  list(): Promise<User[]>;
}

/** "First Last", or the username when no name is on record. */
export function displayName(user: Pick<User, "username" | "firstName" | "lastName">): string {
  const full = `${user.firstName} ${user.lastName}`.trim();
  return full || user.username;
}

function toUser(row: typeof users.$inferSelect): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    role: row.role,
    isStaff: row.isStaff,
    createdAt: row.createdAt,
  };
}

export class DrizzleUserRepository implements IUserRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(input: NewUser): Promise<User> {
    const rows = await this.db
      .insert(users)
      .values({
        id: crypto.randomUUID(),
        username: input.username,
        email: input.email,
        passwordHash: input.passwordHash,
        firstName: input.firstName ?? "",
        lastName: input.lastName ?? "",
        role: input.role ?? "reader",
        isStaff: input.isStaff ?? false,
        createdAt: Date.now(),
      })
      .returning();
    return toUser(rows[0]);
  }

  async getById(id: string): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async getByUsername(username: string): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.username, username)).limit(1);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async getByEmail(email: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(eq(users.email, email))
      .orderBy(asc(users.createdAt), asc(users.id))
      .limit(1);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async getPasswordHash(userId: string): Promise<string | null> {
    const rows = await this.db
      .select({ passwordHash: users.passwordHash })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);
    return rows[0]?.passwordHash ?? null;
  }

  async setPasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.db.update(users).set({ passwordHash }).where(eq(users.id, userId));
  }

  async setRole(userId: string, role: Role): Promise<void> {
    await this.db.update(users).set({ role }).where(eq(users.id, userId));
  }

  async list(): Promise<User[]> {
    const rows = await this.db.select().from(users).orderBy(asc(users.username));
    return rows.map(toUser);
  }
}
