import type { FastifyInstance } from "fastify";

import { buildApp } from "../src/app.js";
import type { User } from "../src/db/stores.js";
import { MemoryDb, seedUser } from "./support/memory_db.js";

describe("HTTP API", () => {
  let db: MemoryDb;
  let app: FastifyInstance;

  beforeEach(async () => {
    db = new MemoryDb();
    app = await buildApp({ db, jwtSecret: "test-secret", logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  function bearer(user: User) {
    return { authorization: `Bearer ${app.jwt.sign({ sub: user.id, username: user.username })}` };
  }

  async function publish(owner: User, startingBid: string | number = "50") {
    const res = await app.inject({
      method: "POST",
      url: "/v1/listings",
      headers: bearer(owner),
      payload: { title: "Brass lamp", description: "Works", startingBid, category: "Books" },
    });
    expect(res.statusCode).toBe(201);
    const body: { data: { id: string } } = res.json();
    return body.data.id;
  }

  function bid(user: User, listingId: string, value: string | number) {
    return app.inject({
      method: "POST",
      url: `/v1/listings/${listingId}/bids`,
      headers: bearer(user),
      payload: { bid: value },
    });
  }

  it("answers the health check", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: "Auction House API" });
  });

  it("renders unknown routes in the error envelope", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: "NOT_FOUND", message: "Route GET /v1/nope not found" });
  });

  it("requires a token to publish", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/listings",
      payload: { title: "x", description: "y", startingBid: "1", category: "z" },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ ok: false, error: "UNAUTHORIZED", message: "Invalid or missing token" });
  });

  it("publishes a listing with its category and formatted price", async () => {
    const owner = await seedUser(db, "owner");
    const res = await app.inject({
      method: "POST",
      url: "/v1/listings",
      headers: bearer(owner),
      payload: { title: "Brass lamp", description: "Works", startingBid: 50.5, category: "Books" },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json().data).toMatchObject({
      title: "Brass lamp",
      startingPrice: "50.50",
      isActive: true,
      state: "open",
      ownerId: owner.id,
      winnerId: null,
      category: "Books",
    });
  });

  it("rejects a malformed starting bid", async () => {
    const owner = await seedUser(db, "owner");
    const res = await app.inject({
      method: "POST",
      url: "/v1/listings",
      headers: bearer(owner),
      payload: { title: "Lamp", description: "Works", startingBid: "-5", category: "Books" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: "VALIDATION_ERROR", message: "Validation error" });
    expect(res.json().details.fieldErrors.startingBid).toEqual([
      "Must be a non-negative amount with at most 8 digits and 2 decimal places",
    ]);
  });

  it("runs bidding through to a closed auction", async () => {
    const owner = await seedUser(db, "owner");
    const a = await seedUser(db, "a");
    const b = await seedUser(db, "b");
    const listingId = await publish(owner, "50.00");

    const first = await bid(a, listingId, "50.00");
    expect(first.statusCode).toBe(201);
    expect(first.json().data).toMatchObject({ currentPrice: "50.00", bid: { value: "50.00", bidderId: a.id } });

    const tie = await bid(b, listingId, 50);
    expect(tie.statusCode).toBe(422);
    expect(tie.json()).toEqual({ ok: false, error: "INVALID_BID", message: "Bid is not valid" });

    const raise = await bid(b, listingId, "60");
    expect(raise.statusCode).toBe(201);
    expect(raise.json().data.currentPrice).toBe("60.00");

    const page = await app.inject({ method: "GET", url: `/v1/listings/${listingId}` });
    expect(page.json().data).toMatchObject({ currentPrice: "60.00", bidCount: 2, watching: false });

    const history = await app.inject({ method: "GET", url: `/v1/listings/${listingId}/bids` });
    expect(history.json().data.map((row: { value: string }) => row.value)).toEqual(["60.00", "50.00"]);

    const notOwner = await app.inject({ method: "POST", url: `/v1/listings/${listingId}/close`, headers: bearer(b) });
    expect(notOwner.statusCode).toBe(403);
    expect(notOwner.json().error).toBe("FORBIDDEN");

    const closed = await app.inject({ method: "POST", url: `/v1/listings/${listingId}/close`, headers: bearer(owner) });
    expect(closed.statusCode).toBe(200);
    expect(closed.json().data).toMatchObject({
      isActive: false,
      state: "closed",
      winnerId: b.id,
      winningBid: { value: "60.00", bidderId: b.id },
    });

    const late = await bid(a, listingId, "100");
    expect(late.statusCode).toBe(409);
    expect(late.json()).toEqual({ ok: false, error: "LISTING_CLOSED", message: "Auction is closed" });
  });

  it("refuses to close a listing nobody bid on", async () => {
    const owner = await seedUser(db, "owner");
    const listingId = await publish(owner);

    const res = await app.inject({ method: "POST", url: `/v1/listings/${listingId}/close`, headers: bearer(owner) });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ ok: false, error: "NO_BIDS", message: "Auction could not be closed" });
    expect(db.state.listings[0]).toMatchObject({ isActive: true, winnerId: null });
  });

  it("distinguishes malformed and unknown listing ids", async () => {
    const bad = await app.inject({ method: "GET", url: "/v1/listings/abc" });
    expect(bad.statusCode).toBe(400);
    expect(bad.json().error).toBe("VALIDATION_ERROR");

    const missing = await app.inject({ method: "GET", url: "/v1/listings/999" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" });
  });

  it("rejects ids that do not fit in a bigint before they reach the store", async () => {
    const viewer = await seedUser(db, "viewer");
    const tooBig = "9223372036854775808";

    const listing = await app.inject({ method: "GET", url: `/v1/listings/${tooBig}` });
    expect(listing.statusCode).toBe(400);
    expect(listing.json().details.fieldErrors.id).toEqual(["Must be a numeric id"]);

    const longer = await app.inject({ method: "GET", url: "/v1/listings/99999999999999999999999" });
    expect(longer.statusCode).toBe(400);
    expect(longer.json().error).toBe("VALIDATION_ERROR");

    const filtered = await app.inject({ method: "GET", url: `/v1/listings?categoryId=${tooBig}` });
    expect(filtered.statusCode).toBe(400);
    expect(filtered.json().details.fieldErrors.categoryId).toEqual(["Must be a numeric id"]);

    const watched = await app.inject({ method: "PUT", url: `/v1/watchlist/${tooBig}`, headers: bearer(viewer) });
    expect(watched.statusCode).toBe(400);
    expect(watched.json().details.fieldErrors.listingId).toEqual(["Must be a numeric id"]);

    const largest = await app.inject({ method: "GET", url: "/v1/listings/9223372036854775807" });
    expect(largest.statusCode).toBe(404);
    expect(largest.json().error).toBe("LISTING_NOT_FOUND");
  });

  it("lists listings with paging and the active filter", async () => {
    const owner = await seedUser(db, "owner");
    await publish(owner);
    await publish(owner);

    const res = await app.inject({ method: "GET", url: "/v1/listings?limit=1&active=true" });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toHaveLength(1);
    expect(res.json().paging).toEqual({ limit: 1, offset: 0 });

    const categories = await app.inject({ method: "GET", url: "/v1/categories" });
    expect(categories.json().data.map((c: { name: string }) => c.name)).toEqual(["Books"]);
  });

  it("posts and lists comments", async () => {
    const owner = await seedUser(db, "owner");
    const listingId = await publish(owner);

    const posted = await app.inject({
      method: "POST",
      url: `/v1/listings/${listingId}/comments`,
      headers: bearer(owner),
      payload: { title: "Shipping", message: "Pickup only" },
    });
    expect(posted.statusCode).toBe(201);

    const list = await app.inject({ method: "GET", url: `/v1/listings/${listingId}/comments` });
    expect(list.json().data).toEqual([
      expect.objectContaining({ title: "Shipping", message: "Pickup only", userId: owner.id }),
    ]);
  });

  it("toggles the watchlist and reflects it on the listing page", async () => {
    const owner = await seedUser(db, "owner");
    const viewer = await seedUser(db, "viewer");
    const listingId = await publish(owner);

    const add = await app.inject({ method: "PUT", url: `/v1/watchlist/${listingId}`, headers: bearer(viewer) });
    expect(add.json().data).toEqual({ listingId, watching: true, changed: true });

    const again = await app.inject({ method: "PUT", url: `/v1/watchlist/${listingId}`, headers: bearer(viewer) });
    expect(again.json().data.changed).toBe(false);

    const page = await app.inject({ method: "GET", url: `/v1/listings/${listingId}`, headers: bearer(viewer) });
    expect(page.json().data.watching).toBe(true);

    const list = await app.inject({ method: "GET", url: "/v1/watchlist", headers: bearer(viewer) });
    expect(list.json().data.map((l: { id: string }) => l.id)).toEqual([listingId]);

    const remove = await app.inject({ method: "DELETE", url: `/v1/watchlist/${listingId}`, headers: bearer(viewer) });
    expect(remove.json().data).toEqual({ listingId, watching: false, changed: true });

    const anonymous = await app.inject({ method: "GET", url: "/v1/watchlist" });
    expect(anonymous.statusCode).toBe(401);
  });

  it("registers, logs in and resolves the current user", async () => {
    const mismatch = await app.inject({
      method: "POST",
      url: "/v1/auth/register",
      payload: { username: "alice", email: "alice@example.test", password: "test-password", confirmation: "other" },
    });
    expect(mismatch.statusCode).toBe(400);
    expect(mismatch.json().error).toBe("PASSWORD_MISMATCH");

    const registered = await app.inject({
      method: "POST",
      url: "/v1/auth/register",
      payload: {
        username: "alice",
        email: "alice@example.test",
        password: "test-password",
        confirmation: "test-password",
      },
    });
    expect(registered.statusCode).toBe(201);
    expect(registered.json().user).toEqual(
      expect.not.objectContaining({ passwordHash: expect.anything() })
    );

    const duplicate = await app.inject({
      method: "POST",
      url: "/v1/auth/register",
      payload: {
        username: "alice",
        email: "alice2@example.test",
        password: "test-password",
        confirmation: "test-password",
      },
    });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json().error).toBe("USERNAME_TAKEN");

    const wrong = await app.inject({
      method: "POST",
      url: "/v1/auth/login",
      payload: { username: "alice", password: "nope" },
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({
      ok: false,
      error: "UNAUTHORIZED",
      message: "Invalid username and/or password",
    });

    const login = await app.inject({
      method: "POST",
      url: "/v1/auth/login",
      payload: { username: "alice", password: "test-password" },
    });
    expect(login.statusCode).toBe(200);

    const me = await app.inject({
      method: "GET",
      url: "/v1/auth/me",
      headers: { authorization: `Bearer ${login.json().token}` },
    });
    expect(me.statusCode).toBe(200);
    expect(me.json().data).toMatchObject({ username: "alice", email: "alice@example.test" });
  });

  it("rejects a token signed with another secret", async () => {
    const other = await buildApp({ db, jwtSecret: "other-secret", logger: false });
    await other.ready();
    const token = other.jwt.sign({ sub: "1", username: "ghost" });
    await other.close();

    const res = await app.inject({ method: "GET", url: "/v1/auth/me", headers: { authorization: `Bearer ${token}` } });
    expect(res.statusCode).toBe(401);
  });
});
