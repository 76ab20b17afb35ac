import { describe, expect, it } from "vitest";
import { ErrorCode, timeout } from "../../src/core/errors/app-error.js";
import { brand } from "../../src/core/types/brand.js";
import type { SqlExecutor } from "../../src/infrastructure/database/postgres/pool.js";
import { createPgUserRepository } from "../../src/infrastructure/database/postgres/pg-user.repository.js";
import { SQL, createUserQueries } from "../../src/infrastructure/database/postgres/user.queries.js";

const USER_ID = "0b6e1c7e-3f43-4d6e-9a4e-6f1f2f0f9a11";

const row = (overrides: Record<string, unknown> = {}) => ({
  id: USER_ID,
  email: "ada@example.com",
  password_hash: "$2a$04$placeholder",
  first_name: "Ada",
  last_name: "Lovelace",
  role: "gamer",
  status: "active",
  avatar_url: null,
  phone: "5551234567",
  created_at: new Date("2024-03-01T10:00:00.000Z"),
  updated_at: new Date("2024-03-02T10:00:00.000Z"),
  ...overrides,
});

interface Call {
  readonly text: string;
  readonly values: readonly unknown[];
}

type Reply = { rows?: unknown[]; rowCount?: number } | Error | Promise<never>;

/** Scripted stand-in for the pg pool: replies in order, records every call */
const fakeExec = (...replies: Reply[]) => {
  const calls: Call[] = [];
  const exec: SqlExecutor = async (text, values = []) => {
    calls.push({ text, values });
    const reply = replies.shift() ?? {};
    if (reply instanceof Promise) return reply;
    if (reply instanceof Error) throw reply;
    return { rows: reply.rows ?? [], rowCount: reply.rowCount ?? reply.rows?.length ?? 0 };
  };
  return { exec, calls };
};

const pgError = (code: string, message: string): Error => Object.assign(new Error(message), { code });

const repoWith = (...replies: Reply[]) => {
  const fake = fakeExec(...replies);
  return { repo: createPgUserRepository(createUserQueries(fake.exec)), calls: fake.calls };
};

describe("PgUserRepository", () => {
  it("maps a row to a User", async () => {
    const { repo, calls } = repoWith({ rows: [row()] });

    const result = await repo.findById(brand<string, "UserId">(USER_ID));
    expect(result).toEqual({
      ok: true,
      value: {
        id: USER_ID,
        email: "ada@example.com",
        passwordHash: "$2a$04$placeholder",
        firstName: "Ada",
        lastName: "Lovelace",
        role: "gamer",
        status: "active",
        avatarUrl: null,
        phone: "5551234567",
        createdAt: Date.parse("2024-03-01T10:00:00.000Z"),
        updatedAt: Date.parse("2024-03-02T10:00:00.000Z"),
      },
    });
    expect(calls).toEqual([{ text: SQL.selectUserById, values: [USER_ID] }]);
  });

  it("returns null when no row matches", async () => {
    const { repo } = repoWith({ rows: [] });
    expect(await repo.findByEmail("nobody@example.com")).toEqual({ ok: true, value: null });
  });

  it("never sends a malformed id to the database", async () => {
    const { repo, calls } = repoWith();
    const id = brand<string, "UserId">("not-a-uuid");

    expect(await repo.findById(id)).toEqual({ ok: true, value: null });
    expect(await repo.updateStatus(id, "inactive")).toEqual({ ok: true, value: false });
    expect(calls).toHaveLength(0);
  });

  it("inserts with parameters in column order", async () => {
    const { repo, calls } = repoWith({ rows: [row({ phone: null })] });

    const result = await repo.create({
      email: "ada@example.com",
      passwordHash: "$2a$04$placeholder",
      firstName: "Ada",
      lastName: "Lovelace",
      role: "gamer",
      status: "active",
      phone: null,
    });

    expect(result.ok).toBe(true);
    expect(calls[0]?.values).toEqual([
      "ada@example.com",
      "$2a$04$placeholder",
      "Ada",
      "Lovelace",
      "gamer",
      "active",
      null,
    ]);
  });

  it("translates a unique violation into CONFLICT", async () => {
    const { repo } = repoWith(pgError("23505", 'duplicate key value violates unique constraint "idx_users_email"'));

    const result = await repo.create({
      email: "dup@example.com",
      passwordHash: "$2a$04$placeholder",
      firstName: "Ada",
      lastName: "Lovelace",
      role: "gamer",
      status: "active",
      phone: null,
    });

    expect(result).toEqual({
      ok: false,
      error: { code: ErrorCode.CONFLICT, message: "User with this email already exists" },
    });
  });

  it("hides driver detail behind a generic INTERNAL", async () => {
    const cause = pgError("08006", "connection failure at 10.0.0.5");
    const { repo } = repoWith(cause);

    const result = await repo.findByEmail("ada@example.com");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.INTERNAL);
    expect(result.error.message).toBe("Database error");
    expect(result.error.cause).toBe(cause);
  });

  it("rejects a row whose role is outside the enumeration", async () => {
    const { repo } = repoWith({ rows: [row({ role: "moderator" })] });

    const result = await repo.findByEmail("ada@example.com");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(ErrorCode.INTERNAL);
  });

  it("reports whether a status update matched a row", async () => {
    const { repo, calls } = repoWith({ rowCount: 1 }, { rowCount: 0 });
    const id = brand<string, "UserId">(USER_ID);

    expect(await repo.updateStatus(id, "suspended")).toEqual({ ok: true, value: true });
    expect(await repo.updateStatus(id, "suspended")).toEqual({ ok: true, value: false });
    expect(calls[0]).toEqual({ text: SQL.updateUserStatus, values: [USER_ID, "suspended"] });
  });

  it("passes absent filters as NULL", async () => {
    const { repo, calls } = repoWith({ rows: [row()] }, { rows: [] });

    const all = await repo.list({ limit: 10, offset: 20 });
    expect(all.ok && all.value).toHaveLength(1);
    await repo.list({ role: "admin", status: "inactive", limit: 5, offset: 0 });

    expect(calls.map((c) => c.values)).toEqual([
      [null, null, 10, 20],
      ["admin", "inactive", 5, 0],
    ]);
  });

  it("does not touch the database once the signal has fired", async () => {
    const { repo, calls } = repoWith();
    const controller = new AbortController();
    controller.abort();

    const result = await repo.findByEmail("ada@example.com", controller.signal);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(ErrorCode.CANCELLED);
    expect(calls).toHaveLength(0);
  });

  it("stops waiting on a slow statement when the request times out", async () => {
    const { repo } = repoWith(new Promise<never>(() => {}));
    const controller = new AbortController();

    const pending = repo.findByEmail("ada@example.com", controller.signal);
    controller.abort(timeout());

    const result = await pending;
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(ErrorCode.TIMEOUT);
  });

  it("ping succeeds on any reply", async () => {
    const { repo, calls } = repoWith({ rows: [{ "?column?": 1 }] });
    expect(await repo.ping()).toEqual({ ok: true, value: undefined });
    expect(calls[0]?.text).toBe(SQL.ping);
  });
});
