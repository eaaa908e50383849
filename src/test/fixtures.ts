import type { AuthUser } from "../auth/index.js";
import { hashPassword } from "../auth/password.js";
import { DrizzleUserRepository, type User } from "../auth/user-repository.js";
import { type Article, DrizzleArticleRepository } from "../content/article-repository.js";
import { DrizzleNewsletterRepository, type Newsletter } from "../content/newsletter-repository.js";
import type { DrizzleDb } from "../db/index.js";
import type { ArticleStatus, Role } from "../domain/types.js";
import { DrizzleProfileRepository, type Publisher, type StaffProfile } from "../org/profile-repository.js";
import { DrizzleSubscriptionRepository } from "../subscriptions/subscription-repository.js";

export const TEST_PASSWORD = "test-password-1";

// Hashing is slow enough to matter across hundreds of fixtures.
let cachedHash: Promise<string> | null = null;
function testPasswordHash(): Promise<string> {
  if (!cachedHash) cachedHash = hashPassword(TEST_PASSWORD);
  return cachedHash;
}

export function asAuthUser(user: User): AuthUser {
  return { id: user.id, username: user.username, email: user.email, role: user.role, isStaff: user.isStaff };
}

export async function seedUser(
  db: DrizzleDb,
  username: string,
  opts: { role?: Role; isStaff?: boolean; email?: string; firstName?: string; lastName?: string } = {},
): Promise<User> {
  return new DrizzleUserRepository(db).create({
    username,
    email: opts.email ?? `${username}@example.com`,
    passwordHash: await testPasswordHash(),
    role: opts.role ?? "reader",
    isStaff: opts.isStaff ?? false,
    firstName: opts.firstName,
    lastName: opts.lastName,
  });
}

export async function seedPublisher(
  db: DrizzleDb,
  name: string,
  ownerUsername = `${name.toLowerCase().replace(/\W+/g, "")}-owner`,
): Promise<{ owner: User; publisher: Publisher }> {
  const owner = await seedUser(db, ownerUsername, { role: "publisher" });
  const publisher = await new DrizzleProfileRepository(db).getOrCreatePublisher(owner.id, name);
  return { owner, publisher };
}

export async function seedJournalist(
  db: DrizzleDb,
  username: string,
  publisherId: string,
  opts: { firstName?: string; lastName?: string; email?: string } = {},
): Promise<{ user: User; journalist: StaffProfile }> {
  const user = await seedUser(db, username, { ...opts, role: "journalist" });
  const journalist = await new DrizzleProfileRepository(db).getOrCreateJournalist(user.id, publisherId);
  return { user, journalist };
}

export async function seedEditor(
  db: DrizzleDb,
  username: string,
  publisherId: string,
): Promise<{ user: User; editor: StaffProfile }> {
  const user = await seedUser(db, username, { role: "editor" });
  const editor = await new DrizzleProfileRepository(db).getOrCreateEditor(user.id, publisherId);
  return { user, editor };
}

export async function seedArticle(
  db: DrizzleDb,
  author: StaffProfile,
  title: string,
  opts: { status?: ArticleStatus; createdAt?: number; content?: string } = {},
): Promise<Article> {
  const repo = new DrizzleArticleRepository(db);
  const article = await repo.create({
    title,
    content: opts.content ?? `Body of ${title}`,
    journalistId: author.id,
    publisherId: author.publisherId,
    createdAt: opts.createdAt,
  });
  if (!opts.status || opts.status === "pending") return article;
  const updated = await repo.setStatus(article.id, opts.status);
  if (!updated) throw new Error(`Could not set status of ${article.id}`);
  return updated;
}

export async function seedNewsletter(
  db: DrizzleDb,
  author: StaffProfile,
  title: string,
  opts: { createdAt?: number; content?: string } = {},
): Promise<Newsletter> {
  return new DrizzleNewsletterRepository(db).create({
    title,
    content: opts.content ?? `Body of ${title}`,
    journalistId: author.id,
    publisherId: author.publisherId,
    createdAt: opts.createdAt,
  });
}

export async function subscribeTo(
  db: DrizzleDb,
  reader: User,
  target: { kind: "journalist" | "publisher"; id: string },
): Promise<void> {
  await new DrizzleSubscriptionRepository(db).subscribe(reader.id, target);
}
