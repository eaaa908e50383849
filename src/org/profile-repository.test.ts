import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { createTestDb, truncateAllTables } from "../test/db.js";
import { seedEditor, seedJournalist, seedPublisher, seedUser } from "../test/fixtures.js";
import { DrizzleProfileRepository } from "./profile-repository.js";

describe("DrizzleProfileRepository", () => {
  let pool: PGlite;
  let db: DrizzleDb;
  let repo: DrizzleProfileRepository;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
    repo = new DrizzleProfileRepository(db);
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    await truncateAllTables(pool);
  });

  describe("getOrCreate", () => {
    it("keeps an existing publisher profile and its name", async () => {
      const { owner, publisher } = await seedPublisher(db, "Acme");

      const again = await repo.getOrCreatePublisher(owner.id, "Something Else");

      expect(again).toEqual(publisher);
    });

    it("keeps an editor attached to their first publisher", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const { publisher: globex } = await seedPublisher(db, "Globex");
      const { user, editor } = await seedEditor(db, "eve", acme.id);

      const again = await repo.getOrCreateEditor(user.id, globex.id);

      expect(again).toEqual(editor);
      expect(again.publisherId).toBe(acme.id);
    });

    it("creates a journalist profile once", async () => {
      const { publisher } = await seedPublisher(db, "Acme");
      const user = await seedUser(db, "bob", { role: "journalist" });

      const first = await repo.getOrCreateJournalist(user.id, publisher.id);
      const second = await repo.getOrCreateJournalist(user.id, publisher.id);

      expect(second.id).toBe(first.id);
      expect(await repo.getJournalistByUserId(user.id)).toEqual(first);
    });
  });

  it("reports every profile a user holds", async () => {
    const { owner, publisher } = await seedPublisher(db, "Acme");
    const { user, journalist } = await seedJournalist(db, "bob", publisher.id);

    expect(await repo.profileIds(owner.id)).toEqual({ publisherId: publisher.id, editorId: null, journalistId: null });
    expect(await repo.profileIds(user.id)).toEqual({ publisherId: null, editorId: null, journalistId: journalist.id });
  });

  it("summarises a journalist with their publisher", async () => {
    const { publisher } = await seedPublisher(db, "Acme");
    const { user, journalist } = await seedJournalist(db, "bob", publisher.id, { firstName: "Bob", lastName: "" });

    expect(await repo.getJournalistSummary(journalist.id)).toEqual({
      id: journalist.id,
      userId: user.id,
      name: "Bob",
      username: "bob",
      email: "bob@example.com",
      publisherId: publisher.id,
      publisherName: "Acme",
    });
    expect(await repo.getJournalistSummary(crypto.randomUUID())).toBeNull();
  });

  describe("listings", () => {
    it("lists publishers by name and pages them", async () => {
      await seedPublisher(db, "Globex");
      await seedPublisher(db, "Acme");
      await seedPublisher(db, "Initech");

      const all = await repo.listPublishers();
      expect(all.total).toBe(3);
      expect(all.items.map((p) => p.name)).toEqual(["Acme", "Globex", "Initech"]);

      const second = await repo.listPublishers({ limit: 2, offset: 2 });
      expect(second).toMatchObject({ total: 3, items: [{ name: "Initech" }] });
    });

    it("lists journalists by username, across or within a publisher", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const { publisher: globex } = await seedPublisher(db, "Globex");
      await seedJournalist(db, "zed", acme.id);
      await seedJournalist(db, "amy", globex.id);
      await seedJournalist(db, "bob", acme.id);

      const all = await repo.listJournalists();
      expect(all.items.map((j) => [j.username, j.publisherName])).toEqual([
        ["amy", "Globex"],
        ["bob", "Acme"],
        ["zed", "Acme"],
      ]);
      expect((await repo.listJournalistsOf(acme.id)).map((j) => j.username)).toEqual(["bob", "zed"]);
    });

    it("lists the editors of a publisher", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const { publisher: globex } = await seedPublisher(db, "Globex");
      await seedEditor(db, "vic", acme.id);
      await seedEditor(db, "eve", acme.id);
      await seedEditor(db, "gil", globex.id);

      expect((await repo.listEditorsOf(acme.id)).map((e) => e.username)).toEqual(["eve", "vic"]);
    });
  });
});
