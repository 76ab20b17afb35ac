import { describe, expect, it } from "vitest";
import {
  createUserDto,
  listUsersQuery,
  loginDto,
  updateUserDto,
  updateUserStatusDto,
} from "../../src/application/dtos/user.dto.js";

const validCreate = {
  email: "  ada@example.com ",
  password: "correct-horse-1",
  firstName: " Ada ",
  lastName: "Lovelace",
  role: "gamer",
};

describe("createUserDto", () => {
  it("trims strings", () => {
    const parsed = createUserDto.parse(validCreate);
    expect(parsed.email).toBe("ada@example.com");
    expect(parsed.firstName).toBe("Ada");
  });

  it("keeps email case", () => {
    expect(createUserDto.parse({ ...validCreate, email: "Ada@Example.COM" }).email).toBe("Ada@Example.COM");
  });

  it.each([
    ["email", "not-an-email"],
    ["password", "short"],
    ["password", "x".repeat(73)],
    ["firstName", "A"],
    ["lastName", "L".repeat(101)],
    ["role", "moderator"],
    ["phone", "12345"],
    ["phone", "1".repeat(21)],
  ])("rejects %s = %j", (field, value) => {
    const result = createUserDto.safeParse({ ...validCreate, [field]: value });
    expect(result.success).toBe(false);
    if (!result.success) expect(Object.keys(result.error.flatten().fieldErrors)).toEqual([field]);
  });

  it("caps the password at 72 UTF-8 bytes, not 72 characters", () => {
    // "é" is two bytes, so 36 of them fill the limit exactly
    expect(createUserDto.safeParse({ ...validCreate, password: "é".repeat(36) }).success).toBe(true);

    const result = createUserDto.safeParse({ ...validCreate, password: `${"é".repeat(36)}A` });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors).toEqual({ password: ["Password must be at most 72 bytes"] });
    }
  });

  it("accepts an empty phone as not supplied", () => {
    expect(createUserDto.parse({ ...validCreate, phone: "" }).phone).toBe("");
  });
});

describe("updateUserDto", () => {
  it("requires both names", () => {
    expect(updateUserDto.safeParse({ firstName: "Ada" }).success).toBe(false);
  });

  it("accepts an empty avatar and rejects a non-URL", () => {
    expect(updateUserDto.safeParse({ firstName: "Ada", lastName: "King", avatarUrl: "" }).success).toBe(true);
    expect(updateUserDto.safeParse({ firstName: "Ada", lastName: "King", avatarUrl: "nope" }).success).toBe(
      false,
    );
  });
});

describe("status, login and list schemas", () => {
  it("accepts only known statuses", () => {
    expect(updateUserStatusDto.safeParse({ status: "suspended" }).success).toBe(true);
    expect(updateUserStatusDto.safeParse({ status: "deleted" }).success).toBe(false);
  });

  it("login needs a non-empty password", () => {
    expect(loginDto.safeParse({ email: "ada@example.com", password: "" }).success).toBe(false);
  });

  it("list filters are optional but must be known values", () => {
    expect(listUsersQuery.parse({})).toEqual({});
    expect(listUsersQuery.safeParse({ role: "root" }).success).toBe(false);
  });
});
