import path from "path";
import { ControllerDeps } from "../src/controllers/controller";
import { MemoryObjectStore } from "../src/services/objectStore";
import { UserStore } from "../src/services/userStore";
import { UserService } from "../src/services/users";
import { ImageDefaults, User } from "../src/types";
import { PageRenderer } from "../src/views/page";
import { TemplateLoader } from "../src/views/templates";

export const TEMPLATES_DIR = path.resolve(__dirname, "../templates");

export const images: ImageDefaults = {
  imageUrl: "/static/images/default-pic.svg",
  headerImageUrl: "/static/images/default-header.svg",
};

type TestDeps = ControllerDeps & {
  store: UserStore;
  objects: MemoryObjectStore;
};

export function makeDeps(): TestDeps {
  const objects = new MemoryObjectStore();
  const store = new UserStore(objects, "users");
  return {
    objects,
    store,
    users: new UserService(store, images),
    pages: new PageRenderer(new TemplateLoader(TEMPLATES_DIR)),
    images,
  };
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: "0b6c1d5e-4a7f-4c1e-9a55-3f2d6a8b9c10",
    username: "bob",
    email: "bob@example.com",
    passwordHash: "unused",
    imageUrl: images.imageUrl,
    headerImageUrl: images.headerImageUrl,
    bio: "",
    location: "",
    createdAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}
