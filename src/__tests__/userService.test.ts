import crypto from "crypto";
import { AppContext } from "../context";
import { AuthError, ConflictError, NotFoundError, ValidationError } from "../utils/errors";
import { FIXED_NOW, makeTempDir, removeDir, testContext } from "./helpers/testEnv";

const sha256 = (value: string) => crypto.createHash("sha256").update(value).digest("hex");

describe("UserService", () => {
  let root: string;
  let ctx: AppContext;

  beforeEach(async () => {
    root = await makeTempDir();
    ctx = testContext(root);
  });

  afterEach(() => removeDir(root));

  it("creates users with a bcrypt hash and an empty collection", async () => {
    const user = await ctx.users.createUser({ username: "alice", password: "test-password" });

    expect(user).toEqual({
      username: "alice",
      role: "user",
      createdAt: FIXED_NOW.toISOString(),
      updatedAt: FIXED_NOW.toISOString(),
    });
    expect((await ctx.stores.credentials.find("alice"))?.passwordHash).toMatch(/^\$2[aby]\$10\$/);
    expect((await ctx.applications.list("alice")).total).toBe(0);
  });

  it("rejects duplicates and unsafe usernames", async () => {
    await ctx.users.createUser({ username: "alice", password: "test-password" });

    await expect(ctx.users.createUser({ username: "alice", password: "other" })).rejects.toBeInstanceOf(
      ConflictError,
    );
    await expect(ctx.users.createUser({ username: "../alice", password: "x" })).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(ctx.users.createUser({ username: "..", password: "x" })).rejects.toBeInstanceOf(ValidationError);
    await expect(ctx.users.createUser({ username: "bob", password: "" })).rejects.toThrow("password is required");
  });

  it("verifies credentials", async () => {
    await ctx.users.createUser({ username: "alice", password: "test-password", role: "admin" });

    await expect(ctx.users.verify("alice", "test-password")).resolves.toEqual({ username: "alice", role: "admin" });
    await expect(ctx.users.verify("alice", "wrong")).rejects.toThrow(new AuthError("Invalid credentials"));
    await expect(ctx.users.verify("ghost", "test-password")).rejects.toBeInstanceOf(AuthError);
  });

  it.each([
    ["a SHA-256 digest", sha256("legacy-pass")],
    ["a plain password", "legacy-pass"],
  ])("upgrades %s to bcrypt on login", async (_label, stored) => {
    await ctx.stores.credentials.create({
      username: "old",
      passwordHash: stored,
      role: "user",
      createdAt: "",
      updatedAt: "",
    });

    await expect(ctx.users.verify("old", "legacy-pass")).resolves.toEqual({ username: "old", role: "user" });

    const upgraded = await ctx.stores.credentials.find("old");
    expect(upgraded?.passwordHash).toMatch(/^\$2[aby]\$/);
    expect(upgraded?.updatedAt).toBe(FIXED_NOW.toISOString());
    await expect(ctx.users.verify("old", "legacy-pass")).resolves.toEqual({ username: "old", role: "user" });
  });

  it("keeps a password reset that races a legacy hash upgrade", async () => {
    await ctx.stores.credentials.create({
      username: "old",
      passwordHash: "legacy-pass",
      role: "user",
      createdAt: "",
      updatedAt: "",
    });

    await Promise.allSettled([
      ctx.users.verify("old", "legacy-pass"),
      ctx.users.updateUser("old", { password: "fresh-pass" }),
    ]);

    await expect(ctx.users.verify("old", "fresh-pass")).resolves.toEqual({ username: "old", role: "user" });
    await expect(ctx.users.verify("old", "legacy-pass")).rejects.toBeInstanceOf(AuthError);
  });

  it("updates password and role", async () => {
    await ctx.users.createUser({ username: "alice", password: "test-password" });

    const updated = await ctx.users.updateUser("alice", { password: "new-password", role: "admin" });

    expect(updated.role).toBe("admin");
    await expect(ctx.users.verify("alice", "new-password")).resolves.toEqual({ username: "alice", role: "admin" });
    await expect(ctx.users.verify("alice", "test-password")).rejects.toBeInstanceOf(AuthError);
    await expect(ctx.users.updateUser("ghost", { role: "admin" })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes users together with their applications", async () => {
    await ctx.users.createUser({ username: "alice", password: "test-password" });
    await ctx.applications.create("alice", { company: "Acme" });

    await ctx.users.deleteUser("alice", { username: "admin", role: "admin" });

    expect(await ctx.users.findSessionUser("alice")).toBeNull();
    expect((await ctx.applications.list("alice")).total).toBe(0);
    await expect(ctx.users.deleteUser("alice", { username: "admin", role: "admin" })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it("refuses to delete the acting admin", async () => {
    await ctx.users.createUser({ username: "admin", password: "test-password", role: "admin" });

    await expect(ctx.users.deleteUser("admin", { username: "admin", role: "admin" })).rejects.toThrow(
      "Admins cannot delete their own account",
    );
    expect(await ctx.users.count()).toBe(1);
  });
});
