import type { PGlite } from "@electric-sql/pglite";
import { Hono } from "hono";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import type { DrizzleDb } from "../db/index.js";
import { DomainError } from "../domain/errors.js";
import { type AppServices, createServices } from "../services.js";
import { createTestDb, truncateAllTables } from "../test/db.js";
import { FakeEmailSender, FakeSocialPoster } from "../test/fakes.js";
import {
  asAuthUser,
  seedArticle,
  seedEditor,
  seedJournalist,
  seedPublisher,
  seedUser,
  TEST_PASSWORD,
} from "../test/fixtures.js";
import { createApp, errorHandler } from "./app.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const PAGE_SIZE = 2;

describe("errorHandler", () => {
  function throwing(err: Error) {
    const app = new Hono();
    app.get("/", () => {
      throw err;
    });
    app.onError(errorHandler);
    return app;
  }

  it("maps domain errors to their status with details", async () => {
    const res = await throwing(new DomainError("VALIDATION", "Invalid title.", { title: ["bad"] })).request("/");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid title.", details: { title: ["bad"] } });

    const conflict = await throwing(new DomainError("CONFLICT", "Taken")).request("/");
    expect(conflict.status).toBe(409);
    expect(await conflict.json()).toEqual({ error: "Taken" });
  });

  it("hides unexpected errors behind a 500 and logs them", async () => {
    const res = await throwing(new Error("relation does not exist")).request("/");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Unhandled error in request",
      expect.objectContaining({ error: "relation does not exist", path: "/", method: "GET" }),
    );
  });
});

describe("HTTP API", () => {
  let pool: PGlite;
  let db: DrizzleDb;
  let email: FakeEmailSender;
  let social: FakeSocialPoster;
  let services: AppServices;
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
    email = new FakeEmailSender();
    social = new FakeSocialPoster();
    services = createServices(db, { email, social, appBaseUrl: "https://app.example.com" });
    app = createApp(services, { uiOrigins: ["http://localhost:3001"], pageSize: PAGE_SIZE });
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    vi.clearAllMocks();
    await truncateAllTables(pool);
    email.reset();
    social.reset();
  });

  function call(method: string, path: string, opts: { token?: string; body?: unknown; raw?: string } = {}) {
    const headers: Record<string, string> = {};
    if (opts.token) headers.Authorization = `Token ${opts.token}`;
    let body: string | undefined;
    if (opts.raw !== undefined || opts.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = opts.raw ?? JSON.stringify(opts.body);
    }
    return app.request(path, { method, headers, body });
  }

  async function login(username: string): Promise<string> {
    const res = await call("POST", "/api/v1/auth/token", { body: { username, password: TEST_PASSWORD } });
    const body: { token: string } = await res.json();
    return body.token;
  }

  describe("public endpoints", () => {
    it("reports health", async () => {
      const res = await call("GET", "/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok", service: "pressroom-platform", database: "ok" });
    });

    it("lists its own endpoints", async () => {
      const res = await call("GET", "/api/v1/docs");
      const { endpoints } = await res.json();
      expect(endpoints).toContainEqual({ method: "POST", path: "/api/v1/auth/register", auth: false });
      expect(endpoints).toContainEqual({ method: "GET", path: "/api/v1/articles/:id", auth: true });
      expect(endpoints).toContainEqual({ method: "PATCH", path: "/api/v1/staff/users/:id/role", auth: true });
    });

    it("answers unknown paths with a JSON 404", async () => {
      const res = await call("GET", "/api/v1/nothing-here");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });

    it("answers CORS preflight for the UI origin", async () => {
      const res = await app.request("/api/v1/articles", {
        method: "OPTIONS",
        headers: { Origin: "http://localhost:3001", "Access-Control-Request-Method": "GET" },
      });
      expect(res.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:3001");
    });
  });

  describe("auth", () => {
    it("registers a reader who can call authenticated endpoints, with or without a trailing slash", async () => {
      const res = await call("POST", "/api/v1/auth/register", {
        body: {
          username: "alice",
          email: "alice@example.com",
          password: "correct-horse",
          confirmPassword: "correct-horse",
        },
      });
      expect(res.status).toBe(201);
      const { user, token } = await res.json();
      expect(user).toMatchObject({ username: "alice", role: "reader", isStaff: false });

      for (const path of ["/api/v1/me", "/api/v1/me/"]) {
        const me = await call("GET", path, { token });
        expect(me.status).toBe(200);
        expect(await me.json()).toMatchObject({
          user: { username: "alice" },
          profiles: { publisherId: null, editorId: null, journalistId: null },
        });
      }
    });

    it("rejects malformed bodies", async () => {
      const invalid = await call("POST", "/api/v1/auth/register", {
        body: { username: "alice", email: "not-an-email", password: "x", confirmPassword: "x" },
      });
      expect(invalid.status).toBe(400);
      const body = await invalid.json();
      expect(body.error).toBe("Validation failed");
      expect(Object.keys(body.details.fieldErrors)).toEqual(["email"]);

      const garbled = await call("POST", "/api/v1/auth/token", { raw: "{not json" });
      expect(garbled.status).toBe(400);
      expect(await garbled.json()).toEqual({ error: "Invalid JSON body" });
    });

    it("refuses bad credentials and missing tokens", async () => {
      await seedUser(db, "alice");

      const wrong = await call("POST", "/api/v1/auth/token", { body: { username: "alice", password: "nope" } });
      expect(wrong.status).toBe(401);
      expect(await wrong.json()).toEqual({ error: "Invalid username or password" });

      const anonymous = await call("GET", "/api/v1/articles");
      expect(anonymous.status).toBe(401);
    });

    it("logs out only the presented token", async () => {
      await seedUser(db, "alice");
      const first = await login("alice");
      const second = await login("alice");

      const res = await call("POST", "/api/v1/auth/logout/", { token: first });
      expect(await res.json()).toEqual({ ok: true });
      expect((await call("GET", "/api/v1/me", { token: first })).status).toBe(401);
      expect((await call("GET", "/api/v1/me", { token: second })).status).toBe(200);
    });

    it("resets a forgotten password through the emailed link", async () => {
      await seedUser(db, "alice");

      const requested = await call("POST", "/api/v1/auth/forgot-password", { body: { email: "alice@example.com" } });
      expect(await requested.json()).toEqual({ message: "A password reset link has been sent to your email." });
      const token = /\/reset_password\/([^/]+)\//.exec(email.sent[0].text)?.[1] ?? "";

      expect(await (await call("GET", `/api/v1/auth/reset-password/${token}`)).json()).toEqual({ state: "valid" });
      const reset = await call("POST", `/api/v1/auth/reset-password/${token}`, {
        body: { password: "brand-new-pass", confirmPassword: "brand-new-pass" },
      });
      expect(await reset.json()).toEqual({ message: "Your password has been reset. You can now log in." });

      const relogin = await call("POST", "/api/v1/auth/token", {
        body: { username: "alice", password: "brand-new-pass" },
      });
      expect(relogin.status).toBe(200);
      expect(await (await call("GET", `/api/v1/auth/reset-password/${token}`)).json()).toEqual({ state: "invalid" });
    });

    it("reports an unknown email on forgot-password", async () => {
      const res = await call("POST", "/api/v1/auth/forgot-password", { body: { email: "nobody@example.com" } });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "No user with this email exists." });
    });
  });

  describe("newsroom journey", () => {
    it("takes a reader's application through to a subscriber reading an approved article", async () => {
      const staff = await seedUser(db, "root", { isStaff: true });
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const eve = await seedEditor(db, "eve", acme.id);
      await seedUser(db, "bob");
      await seedUser(db, "alice");
      const [staffToken, eveToken, bobToken, aliceToken] = await Promise.all(
        [staff.username, eve.user.username, "bob", "alice"].map(login),
      );

      // bob applies to become a journalist and staff approve him into Acme
      const applied = await call("POST", "/api/v1/role-applications/", {
        token: bobToken,
        body: { appliedRole: "journalist", motivation: "I cover city hall." },
      });
      expect(applied.status).toBe(201);
      const application = await applied.json();

      const decided = await call("POST", `/api/v1/staff/role-applications/${application.id}/approve`, {
        token: staffToken,
        body: { publisherId: acme.id },
      });
      expect(decided.status).toBe(200);
      expect(await decided.json()).toMatchObject({ role: "journalist", profile: { kind: "journalist" } });
      expect(email.recipients("role-approved")).toEqual(["bob@example.com"]);

      // alice follows Acme
      const subscribed = await call("POST", `/api/v1/subscriptions/publishers/${acme.id}`, { token: aliceToken });
      expect(subscribed.status).toBe(201);
      expect(await subscribed.json()).toMatchObject({ message: "Successfully subscribed to Acme!" });

      // bob files a story; it is invisible to alice until reviewed
      const created = await call("POST", "/api/v1/articles", {
        token: bobToken,
        body: { title: " Scoop ", content: "Facts" },
      });
      expect(created.status).toBe(201);
      const article = await created.json();
      expect(article).toMatchObject({ title: "Scoop", status: "pending", publisher: { id: acme.id, name: "Acme" } });

      expect(await (await call("GET", "/api/v1/articles", { token: aliceToken })).json()).toEqual({
        count: 0,
        next: null,
        previous: null,
        results: [],
      });
      expect((await call("GET", `/api/v1/articles/${article.id}`, { token: aliceToken })).status).toBe(404);

      const approved = await call("POST", `/api/v1/articles/${article.id}/approve/`, { token: eveToken });
      expect(approved.status).toBe(200);
      expect(await approved.json()).toEqual({
        id: article.id,
        status: "approved",
        message: 'Article "Scoop" has been approved.',
        notification: { sent: ["bob@example.com", "alice@example.com"], failed: [], posted: true },
      });

      const listed = await (await call("GET", "/api/v1/articles/", { token: aliceToken })).json();
      expect(listed.count).toBe(1);
      expect(listed.results[0]).toEqual({
        id: article.id,
        title: "Scoop",
        journalist_name: "bob",
        publisher_name: "Acme",
        created_at: article.created_at,
      });

      const detail = await (await call("GET", `/api/v1/articles/${article.id}`, { token: aliceToken })).json();
      expect(detail).toMatchObject({
        status: "approved",
        subscribed_to_journalist: false,
        subscribed_to_publisher: true,
      });

      const again = await call("POST", `/api/v1/articles/${article.id}/reject`, { token: eveToken });
      expect(again.status).toBe(409);
      expect(await again.json()).toEqual({ error: "This article has already been approved." });
    });

    it("publishes a newsletter and counts the notifications", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      await seedJournalist(db, "bob", acme.id);
      const alice = await seedUser(db, "alice");
      await services.subscriptions.subscribe(asAuthUser(alice), { kind: "publisher", id: acme.id });
      const bobToken = await login("bob");

      const res = await call("POST", "/api/v1/newsletters", {
        token: bobToken,
        body: { title: "Weekly", content: "News" },
      });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({ title: "Weekly", notification: { sent: 2, failed: 0 } });

      const list = await (await call("GET", "/api/v1/newsletters", { token: await login("alice") })).json();
      expect(list.results.map((n: { title: string }) => n.title)).toEqual(["Weekly"]);
    });
  });

  describe("listings", () => {
    it("pages approved articles with absolute links", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const bob = await seedJournalist(db, "bob", acme.id);
      for (const [i, title] of ["a1", "a2", "a3"].entries()) {
        await seedArticle(db, bob.journalist, title, { status: "approved", createdAt: (i + 1) * 1_000 });
      }
      const token = await login("bob");

      const first = await (await call("GET", "/api/v1/articles", { token })).json();
      expect(first).toMatchObject({ count: 3, next: "http://localhost/api/v1/articles?page=2", previous: null });
      expect(first.results.map((r: { title: string }) => r.title)).toEqual(["a3", "a2"]);

      const second = await (await call("GET", "/api/v1/articles?page=2", { token })).json();
      expect(second).toMatchObject({ count: 3, next: null, previous: "http://localhost/api/v1/articles" });
      expect(second.results.map((r: { title: string }) => r.title)).toEqual(["a1"]);

      const past = await call("GET", "/api/v1/articles?page=3", { token });
      expect(past.status).toBe(404);
      expect(await past.json()).toEqual({ error: "Invalid page." });
    });

    it("requires the owner parameter on by_journalist and by_publisher", async () => {
      await seedUser(db, "alice");
      const token = await login("alice");

      const noJournalist = await call("GET", "/api/v1/articles/by_journalist", { token });
      expect(noJournalist.status).toBe(400);
      expect(await noJournalist.json()).toEqual({ error: "journalist_id parameter is required" });

      const noPublisher = await call("GET", "/api/v1/articles/by_publisher/", { token });
      expect(await noPublisher.json()).toEqual({ error: "publisher_id parameter is required" });
    });

    it("lets a reader list one journalist only while subscribed", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const bob = await seedJournalist(db, "bob", acme.id);
      await seedArticle(db, bob.journalist, "a1", { status: "approved" });
      await seedUser(db, "alice");
      const token = await login("alice");
      const path = `/api/v1/articles/by_journalist?journalist_id=${bob.journalist.id}`;

      const refused = await call("GET", path, { token });
      expect(refused.status).toBe(403);
      expect(await refused.json()).toEqual({ error: "You are not subscribed to this journalist" });

      await call("POST", `/api/v1/subscriptions/journalists/${bob.journalist.id}`, { token });
      const allowed = await call("GET", path, { token });
      expect((await allowed.json()).map((r: { title: string }) => r.title)).toEqual(["a1"]);
    });

    it("lists publishers and journalists", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      await seedJournalist(db, "bob", acme.id);
      await seedUser(db, "alice");
      const token = await login("alice");

      expect(await (await call("GET", "/api/v1/publishers", { token })).json()).toEqual({
        count: 1,
        next: null,
        previous: null,
        results: [{ id: acme.id, name: "Acme" }],
      });
      const journalists = await (await call("GET", "/api/v1/journalists/", { token })).json();
      expect(journalists.results).toEqual([
        { id: expect.any(String), name: "bob", username: "bob", publisher_name: "Acme" },
      ]);
    });

    it("rejects unknown subscription targets", async () => {
      await seedUser(db, "alice");
      const res = await call("POST", "/api/v1/subscriptions/editors/x", { token: await login("alice") });
      expect(res.status).toBe(404);
    });
  });

  describe("staff", () => {
    it("is closed to non-staff", async () => {
      await seedUser(db, "alice");
      const res = await call("GET", "/api/v1/staff/role-applications", { token: await login("alice") });
      expect(res.status).toBe(403);
    });

    it("approves an application posted without a body", async () => {
      await seedUser(db, "root", { isStaff: true });
      await seedUser(db, "alice");
      const [staffToken, aliceToken] = await Promise.all(["root", "alice"].map(login));
      const applied = await call("POST", "/api/v1/role-applications/", {
        token: aliceToken,
        body: { appliedRole: "publisher", motivation: "I run a paper." },
      });
      const application: { id: string } = await applied.json();

      const decided = await call("POST", `/api/v1/staff/role-applications/${application.id}/approve`, {
        token: staffToken,
      });
      expect(decided.status).toBe(200);
      expect(await decided.json()).toMatchObject({ role: "publisher", profile: { kind: "publisher" } });

      const garbled = await call("POST", `/api/v1/staff/role-applications/${application.id}/approve`, {
        token: staffToken,
        raw: "{",
      });
      expect(garbled.status).toBe(400);
      expect(await garbled.json()).toEqual({ error: "Invalid JSON body" });
    });

    it("assigns roles and article statuses", async () => {
      await seedUser(db, "root", { isStaff: true });
      const alice = await seedUser(db, "alice");
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const bob = await seedJournalist(db, "bob", acme.id);
      const article = await seedArticle(db, bob.journalist, "a1");
      const token = await login("root");

      const role = await call("PATCH", `/api/v1/staff/users/${alice.id}/role`, { token, body: { role: "editor" } });
      expect(await role.json()).toMatchObject({ user: { id: alice.id, role: "editor" } });

      const bad = await call("PATCH", `/api/v1/staff/users/${alice.id}/role`, { token, body: { role: "admin" } });
      expect(bad.status).toBe(400);

      const status = await call("PATCH", `/api/v1/staff/articles/${article.id}/status`, {
        token,
        body: { status: "rejected" },
      });
      expect(await status.json()).toEqual({ id: article.id, status: "rejected" });
      expect(email.sent).toEqual([]);
    });
  });

  describe("dashboards", () => {
    it("serves the editor dashboard and forbids other roles", async () => {
      const { publisher: acme } = await seedPublisher(db, "Acme");
      const bob = await seedJournalist(db, "bob", acme.id);
      await seedEditor(db, "eve", acme.id);
      await seedArticle(db, bob.journalist, "a1");

      const res = await call("GET", "/api/v1/dashboard/editor", { token: await login("eve") });
      expect(await res.json()).toMatchObject({
        publisher: { name: "Acme" },
        counts: { pending: 1, approved: 0, rejected: 0, total: 1 },
      });

      const forbidden = await call("GET", "/api/v1/dashboard/editor", { token: await login("bob") });
      expect(forbidden.status).toBe(403);
    });
  });
});
