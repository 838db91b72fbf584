import { NotFoundError, UniqueViolationError } from "../src/errors";
import { images, makeDeps } from "./helpers";

const profile = {
  username: "testuser",
  email: "test@test.com",
  imageUrl: "",
  headerImageUrl: "",
  bio: "",
  location: "",
};

describe("UserService", () => {
  let deps: ReturnType<typeof makeDeps>;

  beforeEach(() => {
    deps = makeDeps();
  });

  const signup = (username: string, email: string) =>
    deps.users.signup({ username, email, password: "password", imageUrl: "" });

  it("stores a new user as JSON under the users prefix", async () => {
    const user = await signup("testuser", "test@test.com");

    expect(await deps.objects.listKeys("users/")).toEqual([
      `users/${user.id}.json`,
    ]);
    expect(user.imageUrl).toBe(images.imageUrl);
    expect(user.headerImageUrl).toBe(images.headerImageUrl);
    expect(user.passwordHash).not.toBe("password");
    expect(await deps.users.findById(user.id)).toEqual(user);
  });

  it("keeps a custom image given at signup", async () => {
    const user = await deps.users.signup({
      username: "testuser",
      email: "test@test.com",
      password: "password",
      imageUrl: "https://img.example.com/me.png",
    });
    expect(user.imageUrl).toBe("https://img.example.com/me.png");
  });

  it("rejects a taken username or email", async () => {
    await signup("testuser", "test@test.com");

    await expect(signup("testuser", "other@test.com")).rejects.toMatchObject({
      field: "username",
      message: "Username already taken.",
    });
    await expect(signup("other", "test@test.com")).rejects.toBeInstanceOf(
      UniqueViolationError
    );
  });

  it("lets only one of two simultaneous sign-ups take a username", async () => {
    const results = await Promise.allSettled([
      signup("dup", "dup1@test.com"),
      signup("dup", "dup2@test.com"),
    ]);

    const statuses = results.map((r) => r.status).sort();
    expect(statuses).toEqual(["fulfilled", "rejected"]);
    const users = await deps.users.list();
    expect(users.filter((u) => u.username === "dup")).toHaveLength(1);
  });

  it("keeps usernames unique when a rename races a sign-up", async () => {
    const user = await signup("testuser", "test@test.com");

    const results = await Promise.allSettled([
      deps.users.updateProfile(user.id, { ...profile, username: "taken" }),
      signup("taken", "other@test.com"),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
    const holders = await deps.users.list("taken");
    expect(holders.map((u) => u.id)).toEqual([user.id]);
  });

  it("lists users by username, filtered by a search term", async () => {
    await signup("zed", "zed@test.com");
    await signup("Amy", "amy@test.com");
    await signup("jimbo", "jimbo@jimbo.com");

    expect((await deps.users.list()).map((u) => u.username)).toEqual([
      "Amy",
      "jimbo",
      "zed",
    ]);
    expect((await deps.users.list(" AM ")).map((u) => u.username)).toEqual([
      "Amy",
    ]);
  });

  it("authenticates by username and password", async () => {
    const user = await signup("testuser", "test@test.com");

    const found = await deps.users.authenticate("testuser", "password");
    expect(found?.id).toBe(user.id);
    expect(
      await deps.users.authenticate("testuser", "wrong-password")
    ).toBeUndefined();
    expect(await deps.users.authenticate("nobody", "password")).toBeUndefined();
  });

  it("updates a profile and falls back to the placeholder images", async () => {
    const user = await signup("testuser", "test@test.com");

    const updated = await deps.users.updateProfile(user.id, {
      ...profile,
      username: "renamed",
      bio: "My new bio",
    });

    expect(updated.username).toBe("renamed");
    expect(updated.bio).toBe("My new bio");
    expect(updated.imageUrl).toBe(images.imageUrl);
    expect(updated.headerImageUrl).toBe(images.headerImageUrl);
    expect(updated.updatedAt).toBeDefined();
    expect(await deps.users.findById(user.id)).toEqual(updated);
  });

  it("lets a user keep their own username but not take another's", async () => {
    const user = await signup("testuser", "test@test.com");
    await signup("jimbo", "jimbo@jimbo.com");

    await expect(
      deps.users.updateProfile(user.id, profile)
    ).resolves.toMatchObject({ username: "testuser" });
    const stolen = { ...profile, email: "jimbo@jimbo.com" };
    await expect(
      deps.users.updateProfile(user.id, stolen)
    ).rejects.toMatchObject({ field: "email" });
  });

  it("fails to update an unknown user", async () => {
    await expect(
      deps.users.updateProfile("0b6c1d5e-4a7f-4c1e-9a55-3f2d6a8b9c10", profile)
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("removes a user", async () => {
    const user = await signup("testuser", "test@test.com");

    expect(await deps.users.remove(user.id)).toBe(true);
    expect(await deps.users.findById(user.id)).toBeUndefined();
    expect(await deps.users.remove(user.id)).toBe(false);
  });
});

describe("UserStore", () => {
  it("never resolves ids that are not UUIDs", async () => {
    const { store, objects } = makeDeps();
    await objects.putObject("etc.json", Buffer.from("{}"));

    expect(await store.get("../etc")).toBeUndefined();
    expect(await store.get("9001")).toBeUndefined();
  });

  it("rejects a stored record with missing fields", async () => {
    const { store, objects } = makeDeps();
    const id = "0b6c1d5e-4a7f-4c1e-9a55-3f2d6a8b9c10";
    const partial = Buffer.from(JSON.stringify({ id }));
    await objects.putObject(`users/${id}.json`, partial);

    await expect(store.get(id)).rejects.toThrow();
  });
});
