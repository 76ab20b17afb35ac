import type { AddressInfo } from "node:net";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { timeout } from "../../src/core/errors/app-error.js";
import type { UserRepository } from "../../src/core/ports/user.repository.js";
import { err } from "../../src/core/types/result.js";
import { createInMemoryUserRepository } from "../../src/infrastructure/database/in-memory-user.repository.js";
import { buildApp, dataOf, readJson } from "./app.js";

describe("HTTP server (node:http)", () => {
  const app = buildApp({ env: { MAX_BODY_BYTES: "512" } });
  let base: string;

  beforeAll(async () => {
    const address: AddressInfo = await app.server.start();
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await app.server.stop();
  });

  it("serves the full create → get round trip", async () => {
    const created = await fetch(`${base}/api/v1/users`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        email: "socket@example.com",
        password: "correct-horse-1",
        firstName: "Sock",
        lastName: "Et",
        role: "gamer",
      }),
    });
    expect(created.status).toBe(201);
    const { id } = await dataOf(created);

    const fetched = await fetch(`${base}/api/v1/users/${String(id)}`);
    expect(fetched.status).toBe(200);
    expect(fetched.headers.get("x-request-id")).not.toBeNull();
    expect(fetched.headers.get("x-content-type-options")).toBe("nosniff");
  });

  it("rejects a body over the configured limit with 400", async () => {
    const res = await fetch(`${base}/api/v1/users`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ email: "big@example.com", padding: "x".repeat(1024) }),
    });
    expect(res.status).toBe(400);
    expect((await readJson(res))["error"]).toEqual({ code: "BAD_REQUEST", message: "Request body too large" });
  });

  it("answers 404 for unknown paths", async () => {
    const res = await fetch(`${base}/nowhere`);
    expect(res.status).toBe(404);
  });
});

describe("HTTP server request timeout", () => {
  const slow: UserRepository = {
    ...createInMemoryUserRepository(),
    // Resolves only when the request's signal fires
    findById: (_id, signal) =>
      new Promise((resolve) => {
        signal?.addEventListener("abort", () => resolve(err(timeout())), { once: true });
      }),
  };
  const app = buildApp({ env: { REQUEST_TIMEOUT_MS: "50" }, userRepo: slow });
  let base: string;

  beforeAll(async () => {
    const address = await app.server.start();
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await app.server.stop();
  });

  it("answers 504 once the deadline passes", async () => {
    const res = await fetch(`${base}/api/v1/users/6f9619ff-8b86-4d01-b42d-00c04fc964ff`);
    expect(res.status).toBe(504);
  });
});
