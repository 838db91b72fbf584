import path from "path";
import { z } from "zod";
import { User } from "../types";
import { ObjectStore } from "./objectStore";

const userRecord = z.object({
  id: z.string().uuid(),
  username: z.string(),
  email: z.string(),
  passwordHash: z.string(),
  imageUrl: z.string(),
  headerImageUrl: z.string(),
  bio: z.string(),
  location: z.string(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
}) satisfies z.ZodType<User>;

const isUserId = (id: string) => z.string().uuid().safeParse(id).success;

/** Users kept one JSON object per user under `<prefix>/<id>.json` */
export class UserStore {
  constructor(
    private readonly objects: ObjectStore,
    private readonly prefix: string
  ) {}

  private keyFor(id: string) {
    return path.posix.join(this.prefix, `${id}.json`);
  }

  async get(id: string): Promise<User | undefined> {
    if (!isUserId(id)) return undefined;
    const buf = await this.objects.getObject(this.keyFor(id));
    if (!buf) return undefined;
    return userRecord.parse(JSON.parse(buf.toString("utf-8")));
  }

  async list(): Promise<User[]> {
    const keys = await this.objects.listKeys(this.prefix + "/");
    const ids = keys
      .filter((k) => k.endsWith(".json"))
      .map((k) => path.posix.basename(k, ".json"));
    const users = await Promise.all(ids.map((id) => this.get(id)));
    return users.filter((u): u is User => u !== undefined);
  }

  async find(predicate: (user: User) => boolean): Promise<User | undefined> {
    return (await this.list()).find(predicate);
  }

  async put(user: User): Promise<void> {
    const body = Buffer.from(JSON.stringify(user, null, 2), "utf-8");
    await this.objects.putObject(
      this.keyFor(user.id),
      body,
      "application/json"
    );
  }

  async delete(id: string): Promise<void> {
    if (!isUserId(id)) return;
    await this.objects.deleteObject(this.keyFor(id));
  }
}
