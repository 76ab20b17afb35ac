import { describe, expect, it } from "vitest";
import { createPasswordHasher } from "../../src/infrastructure/security/password-hasher.js";

describe("PasswordHasher (bcrypt)", () => {
  const hasher = createPasswordHasher(4);

  it("hashes and verifies a password", async () => {
    const hResult = await hasher.hash("SecureP@ss123");
    expect(hResult.ok).toBe(true);
    if (!hResult.ok) return;

    const vResult = await hasher.verify("SecureP@ss123", hResult.value);
    expect(vResult).toEqual({ ok: true, value: true });
  });

  it("rejects a wrong password", async () => {
    const hResult = await hasher.hash("CorrectPassword");
    if (!hResult.ok) throw new Error("hash failed");

    const vResult = await hasher.verify("WrongPassword", hResult.value);
    expect(vResult).toEqual({ ok: true, value: false });
  });

  it("embeds the configured cost and never stores the plaintext", async () => {
    const hResult = await hasher.hash("plain-secret");
    if (!hResult.ok) throw new Error("hash failed");

    expect(hResult.value).toMatch(/^\$2[aby]\$04\$/);
    expect(hResult.value).not.toContain("plain-secret");
  });

  it("salts every hash", async () => {
    const a = await hasher.hash("same");
    const b = await hasher.hash("same");
    if (!a.ok || !b.ok) throw new Error("hash failed");
    expect(a.value).not.toBe(b.value);
  });

  it("treats a malformed stored hash as a mismatch", async () => {
    const vResult = await hasher.verify("anything", "not-a-bcrypt-hash");
    expect(vResult).toEqual({ ok: true, value: false });
  });

  it("refuses to hash a password longer than 72 bytes", async () => {
    const hResult = await hasher.hash(`${"é".repeat(36)}A`);
    expect(hResult.ok).toBe(false);
    if (hResult.ok) return;
    expect(hResult.error.code).toBe("VALIDATION");
    expect(hResult.error.details).toEqual({
      formErrors: [],
      fieldErrors: { password: ["Password must be at most 72 bytes"] },
    });
  });

  it("does not match a longer password that shares the first 72 bytes", async () => {
    const stored = "é".repeat(36);
    const hResult = await hasher.hash(stored);
    if (!hResult.ok) throw new Error("hash failed");

    expect(await hasher.verify(`${stored}B`, hResult.value)).toEqual({ ok: true, value: false });
    expect(await hasher.verify(stored, hResult.value)).toEqual({ ok: true, value: true });
  });
});
