import { randomUUID } from "node:crypto";
import { NotFoundError, UniqueViolationError } from "../errors";
import { ImageDefaults, User } from "../types";
import { hashPassword, verifyPassword } from "./password";
import { UserStore } from "./userStore";

export type SignupInput = {
  username: string;
  email: string;
  password: string;
  imageUrl: string;
};

export type ProfileChanges = {
  username: string;
  email: string;
  imageUrl: string;
  headerImageUrl: string;
  bio: string;
  location: string;
};

export class UserService {
  /** Tail of the queue that serialises uniqueness checks with their writes */
  private writes: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: UserStore,
    private readonly images: ImageDefaults
  ) {}

  findById(id: string): Promise<User | undefined> {
    return this.store.get(id);
  }

  /** Every user whose username contains `search`, case-insensitively */
  async list(search = ""): Promise<User[]> {
    const needle = search.trim().toLowerCase();
    const users = await this.store.list();
    return users
      .filter((u) => u.username.toLowerCase().includes(needle))
      .sort((a, b) => a.username.localeCompare(b.username));
  }

  async signup(input: SignupInput): Promise<User> {
    const passwordHash = await hashPassword(input.password);
    return this.exclusive(async () => {
      await this.assertUnique(input.username, input.email);
      const user: User = {
        id: randomUUID(),
        username: input.username,
        email: input.email,
        passwordHash,
        imageUrl: input.imageUrl || this.images.imageUrl,
        headerImageUrl: this.images.headerImageUrl,
        bio: "",
        location: "",
        createdAt: new Date().toISOString(),
      };
      await this.store.put(user);
      return user;
    });
  }

  async authenticate(
    username: string,
    password: string
  ): Promise<User | undefined> {
    const user = await this.store.find((u) => u.username === username);
    if (!user) return undefined;
    return (await verifyPassword(password, user.passwordHash))
      ? user
      : undefined;
  }

  updateProfile(id: string, changes: ProfileChanges): Promise<User> {
    return this.exclusive(async () => {
      const user = await this.store.get(id);
      if (!user) throw new NotFoundError(`User ${id} not found`);
      await this.assertUnique(changes.username, changes.email, id);

      const updated: User = {
        ...user,
        username: changes.username,
        email: changes.email,
        imageUrl: changes.imageUrl || this.images.imageUrl,
        headerImageUrl: changes.headerImageUrl || this.images.headerImageUrl,
        bio: changes.bio,
        location: changes.location,
        updatedAt: new Date().toISOString(),
      };
      await this.store.put(updated);
      return updated;
    });
  }

  remove(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const user = await this.store.get(id);
      if (!user) return false;
      await this.store.delete(id);
      return true;
    });
  }

  /** Runs `task` once every earlier write has settled */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task);
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async assertUnique(
    username: string,
    email: string,
    exceptId?: string
  ) {
    const others = (await this.store.list()).filter((u) => u.id !== exceptId);
    if (others.some((u) => u.username === username))
      throw new UniqueViolationError("username", "Username already taken.");
    if (others.some((u) => u.email === email))
      throw new UniqueViolationError("email", "Email already registered.");
  }
}
