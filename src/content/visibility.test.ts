import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { DomainError } from "../domain/errors.js";
import { DrizzleSubscriptionRepository } from "../subscriptions/subscription-repository.js";
import { createTestDb, truncateAllTables } from "../test/db.js";
import {
  asAuthUser,
  seedArticle,
  seedEditor,
  seedJournalist,
  seedNewsletter,
  seedPublisher,
  seedUser,
} from "../test/fixtures.js";
import { DrizzleArticleRepository } from "./article-repository.js";
import { DrizzleNewsletterRepository } from "./newsletter-repository.js";
import { canViewArticleDetail, VisibilityFilter } from "./visibility.js";

describe("canViewArticleDetail", () => {
  it("lets anyone open an approved article", () => {
    expect(canViewArticleDetail(null, { status: "approved" })).toBe(true);
    expect(canViewArticleDetail({ id: "u1", role: "reader" }, { status: "approved" })).toBe(true);
  });

  it("limits pending and rejected articles to journalists and editors", () => {
    expect(canViewArticleDetail({ id: "u1", role: "journalist" }, { status: "pending" })).toBe(true);
    expect(canViewArticleDetail({ id: "u1", role: "editor" }, { status: "rejected" })).toBe(true);
    expect(canViewArticleDetail({ id: "u1", role: "reader" }, { status: "pending" })).toBe(false);
    expect(canViewArticleDetail({ id: "u1", role: "publisher" }, { status: "pending" })).toBe(false);
    expect(canViewArticleDetail(null, { status: "rejected" })).toBe(false);
  });
});

describe("VisibilityFilter", () => {
  let pool: PGlite;
  let db: DrizzleDb;
  let subscriptions: DrizzleSubscriptionRepository;
  let visibility: VisibilityFilter;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
    subscriptions = new DrizzleSubscriptionRepository(db);
    visibility = new VisibilityFilter(
      new DrizzleArticleRepository(db),
      new DrizzleNewsletterRepository(db),
      subscriptions,
    );
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    await truncateAllTables(pool);
  });

  /** Acme employs bob and carol; Globex employs dan. */
  async function world() {
    const { publisher: acme } = await seedPublisher(db, "Acme");
    const { publisher: globex } = await seedPublisher(db, "Globex");
    const { journalist: bob } = await seedJournalist(db, "bob", acme.id);
    const { journalist: carol } = await seedJournalist(db, "carol", acme.id);
    const { journalist: dan } = await seedJournalist(db, "dan", globex.id);
    const alice = asAuthUser(await seedUser(db, "alice"));
    return { acme, globex, bob, carol, dan, alice };
  }

  it("shows nothing to a reader without subscriptions", async () => {
    const { bob, alice } = await world();
    await seedArticle(db, bob, "approved", { status: "approved" });
    await seedNewsletter(db, bob, "weekly");

    expect(await visibility.visibleArticles(alice)).toEqual({ total: 0, items: [] });
    expect(await visibility.visibleNewsletters(alice)).toEqual({ total: 0, items: [] });
  });

  it("shows only approved articles of a subscribed journalist", async () => {
    const { bob, carol, alice } = await world();
    await seedArticle(db, bob, "bob approved", { status: "approved" });
    await seedArticle(db, bob, "bob pending");
    await seedArticle(db, bob, "bob rejected", { status: "rejected" });
    await seedArticle(db, carol, "carol approved", { status: "approved" });
    await subscriptions.subscribe(alice.id, { kind: "journalist", id: bob.id });

    const result = await visibility.visibleArticles(alice);
    expect(result.total).toBe(1);
    expect(result.items.map((a) => a.title)).toEqual(["bob approved"]);
  });

  it("shows every approved article of a subscribed publisher whoever wrote it", async () => {
    const { acme, bob, carol, dan, alice } = await world();
    await seedArticle(db, bob, "by bob", { status: "approved", createdAt: 1_000 });
    await seedArticle(db, carol, "by carol", { status: "approved", createdAt: 2_000 });
    await seedArticle(db, dan, "by dan", { status: "approved", createdAt: 3_000 });
    await subscriptions.subscribe(alice.id, { kind: "publisher", id: acme.id });

    const result = await visibility.visibleArticles(alice);
    expect(result.items.map((a) => a.title)).toEqual(["by carol", "by bob"]);
  });

  it("lists an article matched by both subscriptions once", async () => {
    const { acme, bob, alice } = await world();
    await seedArticle(db, bob, "both", { status: "approved" });
    await subscriptions.subscribe(alice.id, { kind: "journalist", id: bob.id });
    await subscriptions.subscribe(alice.id, { kind: "publisher", id: acme.id });

    const result = await visibility.visibleArticles(alice);
    expect(result.total).toBe(1);
    expect(result.items.map((a) => a.title)).toEqual(["both"]);
  });

  it("hides content again after unsubscribing, without deleting the row", async () => {
    const { bob, alice } = await world();
    await seedArticle(db, bob, "approved", { status: "approved" });
    await seedNewsletter(db, bob, "weekly");
    await subscriptions.subscribe(alice.id, { kind: "journalist", id: bob.id });
    expect((await visibility.visibleNewsletters(alice)).total).toBe(1);

    await subscriptions.unsubscribe(alice.id, { kind: "journalist", id: bob.id });
    expect((await visibility.visibleArticles(alice)).total).toBe(0);
    expect((await visibility.visibleNewsletters(alice)).total).toBe(0);
    const rows = await pool.query<{ n: number }>("SELECT count(*)::int AS n FROM journalist_subscriptions");
    expect(rows.rows[0].n).toBe(1);
  });

  it("shows every approved article and every newsletter to non-readers", async () => {
    const { acme, bob, dan } = await world();
    const { user: editorUser } = await seedEditor(db, "eve", acme.id);
    await seedArticle(db, bob, "acme", { status: "approved", createdAt: 1_000 });
    await seedArticle(db, dan, "globex", { status: "approved", createdAt: 2_000 });
    await seedArticle(db, dan, "draft");
    await seedNewsletter(db, dan, "news");

    const editor = asAuthUser(editorUser);
    expect((await visibility.visibleArticles(editor)).items.map((a) => a.title)).toEqual(["globex", "acme"]);
    expect((await visibility.visibleNewsletters(editor)).items.map((n) => n.title)).toEqual(["news"]);
  });

  it("windows the list and reports the full total", async () => {
    const { bob, alice } = await world();
    for (let i = 1; i <= 5; i++) {
      await seedArticle(db, bob, `a${i}`, { status: "approved", createdAt: i * 1_000 });
    }
    await subscriptions.subscribe(alice.id, { kind: "journalist", id: bob.id });

    const page = await visibility.visibleArticles(alice, { limit: 2, offset: 2 });
    expect(page.total).toBe(5);
    expect(page.items.map((a) => a.title)).toEqual(["a3", "a2"]);
  });

  it("fills list rows with journalist and publisher names", async () => {
    const { acme } = await world();
    const { journalist: frank } = await seedJournalist(db, "frank", acme.id, { firstName: "Frank", lastName: "Ng" });
    const article = await seedArticle(db, frank, "named", { status: "approved", createdAt: 5_000 });

    const [row] = (await visibility.visibleArticles({ id: "staff", role: "publisher" })).items;
    expect(row).toEqual({
      id: article.id,
      title: "named",
      status: "approved",
      journalistId: frank.id,
      journalistName: "Frank Ng",
      publisherId: acme.id,
      publisherName: "Acme",
      createdAt: 5_000,
    });
  });

  describe("articlesByJournalist / articlesByPublisher", () => {
    it("rejects a reader without a matching subscription", async () => {
      const { acme, bob, alice } = await world();
      await expect(visibility.articlesByJournalist(alice, bob.id)).rejects.toMatchObject({
        code: "FORBIDDEN",
        message: "You are not subscribed to this journalist",
      });
      await expect(visibility.articlesByPublisher(alice, acme.id)).rejects.toBeInstanceOf(DomainError);
    });

    it("returns approved articles only for a subscribed reader", async () => {
      const { acme, bob, carol, alice } = await world();
      await seedArticle(db, bob, "bob approved", { status: "approved", createdAt: 1_000 });
      await seedArticle(db, bob, "bob pending");
      await seedArticle(db, carol, "carol approved", { status: "approved", createdAt: 2_000 });
      await subscriptions.subscribe(alice.id, { kind: "publisher", id: acme.id });

      const byPublisher = await visibility.articlesByPublisher(alice, acme.id);
      expect(byPublisher.map((a) => a.title)).toEqual(["carol approved", "bob approved"]);

      // A publisher subscription does not open the journalist listing.
      await expect(visibility.articlesByJournalist(alice, bob.id)).rejects.toMatchObject({ code: "FORBIDDEN" });
    });

    it("needs no subscription for other roles", async () => {
      const { bob } = await world();
      await seedArticle(db, bob, "bob approved", { status: "approved" });
      await seedArticle(db, bob, "bob rejected", { status: "rejected" });
      const items = await visibility.articlesByJournalist({ id: "x", role: "journalist" }, bob.id);
      expect(items.map((a) => a.title)).toEqual(["bob approved"]);
    });
  });
});
