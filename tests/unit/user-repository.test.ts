import { beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import type { CreateUserData, UserRepository } from "../../src/core/ports/user.repository.js";
import { brand } from "../../src/core/types/brand.js";
import { createInMemoryUserRepository } from "../../src/infrastructure/database/in-memory-user.repository.js";
import { steppingClock } from "../helpers.js";

const data = (email: string, overrides: Partial<CreateUserData> = {}): CreateUserData => ({
  email,
  passwordHash: "$2a$04$placeholderplaceholderplaceholderplaceholderpla",
  firstName: "Ada",
  lastName: "Lovelace",
  role: "gamer",
  status: "active",
  phone: null,
  ...overrides,
});

describe("InMemoryUserRepository", () => {
  let repo: UserRepository;

  beforeEach(() => {
    repo = createInMemoryUserRepository({ now: steppingClock() });
  });

  it("creates and retrieves a user", async () => {
    const created = await repo.create(data("ada@example.com", { phone: "5551234567" }));
    if (!created.ok) throw new Error("create failed");

    expect(created.value.avatarUrl).toBeNull();
    expect(created.value.phone).toBe("5551234567");
    expect(created.value.createdAt).toBe(created.value.updatedAt);

    const found = await repo.findById(created.value.id);
    expect(found).toEqual({ ok: true, value: created.value });
  });

  it("finds by exact email", async () => {
    await repo.create(data("ada@example.com"));

    const hit = await repo.findByEmail("ada@example.com");
    expect(hit.ok && hit.value?.firstName).toBe("Ada");

    const miss = await repo.findByEmail("nobody@example.com");
    expect(miss).toEqual({ ok: true, value: null });
  });

  it("rejects a duplicate email with CONFLICT", async () => {
    await repo.create(data("dup@example.com"));
    const second = await repo.create(data("dup@example.com"));

    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.code).toBe(ErrorCode.CONFLICT);
  });

  it("returns null for an unknown id", async () => {
    const result = await repo.findById(brand<string, "UserId">("missing"));
    expect(result).toEqual({ ok: true, value: null });
  });

  it("update rewrites profile fields and bumps updatedAt", async () => {
    const created = await repo.create(data("ada@example.com"));
    if (!created.ok) throw new Error("create failed");

    const updated = await repo.update(created.value.id, {
      firstName: "Augusta",
      lastName: "King",
      phone: "5550000000",
      avatarUrl: "https://cdn.example.com/a.png",
    });
    if (!updated.ok || updated.value === null) throw new Error("update failed");

    expect(updated.value).toMatchObject({
      firstName: "Augusta",
      lastName: "King",
      phone: "5550000000",
      avatarUrl: "https://cdn.example.com/a.png",
      email: "ada@example.com",
      role: "gamer",
      status: "active",
    });
    expect(updated.value.updatedAt).toBeGreaterThan(created.value.updatedAt);
  });

  it("update and updateStatus report a missing row without an error", async () => {
    const id = brand<string, "UserId">("missing");
    expect(
      await repo.update(id, { firstName: "A", lastName: "B", phone: null, avatarUrl: null }),
    ).toEqual({ ok: true, value: null });
    expect(await repo.updateStatus(id, "suspended")).toEqual({ ok: true, value: false });
  });

  it("updateStatus changes only status and updatedAt", async () => {
    const created = await repo.create(data("ada@example.com"));
    if (!created.ok) throw new Error("create failed");

    expect(await repo.updateStatus(created.value.id, "suspended")).toEqual({ ok: true, value: true });

    const found = await repo.findById(created.value.id);
    if (!found.ok || found.value === null) throw new Error("lookup failed");
    const { status, updatedAt, ...rest } = found.value;
    const { status: _s, updatedAt: _u, ...before } = created.value;
    expect(status).toBe("suspended");
    expect(updatedAt).toBeGreaterThan(created.value.updatedAt);
    expect(rest).toEqual(before);
  });

  it("lists newest first with filters, limit and offset", async () => {
    await repo.create(data("a@example.com", { role: "admin" }));
    await repo.create(data("b@example.com"));
    await repo.create(data("c@example.com", { role: "admin", status: "suspended" }));
    await repo.create(data("d@example.com"));

    const all = await repo.list({ limit: 10, offset: 0 });
    expect(all.ok && all.value.map((u) => u.email)).toEqual([
      "d@example.com",
      "c@example.com",
      "b@example.com",
      "a@example.com",
    ]);

    const admins = await repo.list({ role: "admin", limit: 10, offset: 0 });
    expect(admins.ok && admins.value.map((u) => u.email)).toEqual(["c@example.com", "a@example.com"]);

    const activeAdmins = await repo.list({ role: "admin", status: "active", limit: 10, offset: 0 });
    expect(activeAdmins.ok && activeAdmins.value.map((u) => u.email)).toEqual(["a@example.com"]);

    const page = await repo.list({ limit: 2, offset: 1 });
    expect(page.ok && page.value.map((u) => u.email)).toEqual(["c@example.com", "b@example.com"]);
  });

  it("keeps insertion order for identical timestamps", async () => {
    const fixed = createInMemoryUserRepository({ now: () => 1_700_000_000_000 });
    await fixed.create(data("first@example.com"));
    await fixed.create(data("second@example.com"));

    const listed = await fixed.list({ limit: 10, offset: 0 });
    expect(listed.ok && listed.value.map((u) => u.email)).toEqual([
      "second@example.com",
      "first@example.com",
    ]);
  });

  it("refuses work on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    const created = await repo.create(data("late@example.com"), controller.signal);
    expect(created.ok).toBe(false);
    if (!created.ok) expect(created.error.code).toBe(ErrorCode.CANCELLED);

    expect(await repo.findByEmail("late@example.com")).toEqual({ ok: true, value: null });
  });
});
