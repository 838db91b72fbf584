export type User = {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  imageUrl: string;
  headerImageUrl: string;
  bio: string;
  location: string;
  createdAt: string;
  updatedAt?: string;
};

/** Placeholder images stored for users who never set their own */
export type ImageDefaults = {
  imageUrl: string;
  headerImageUrl: string;
};

export type FlashCategory = "success" | "danger" | "info";

export type FlashMessage = { category: FlashCategory; message: string };

/** The parts of a session the controllers read and write */
export interface SessionState {
  userId?: string;
  flash?: FlashMessage[];
  csrfToken?: string;
}

export type ViewResult =
  | { kind: "page"; status: number; html: string }
  | { kind: "redirect"; location: string };
