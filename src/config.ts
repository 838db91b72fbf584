import "dotenv/config";
import path from "path";

const list = (value: string | undefined) =>
  (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

export const cfg = {
  port: Number(process.env.PORT ?? 8080),
  region:
    process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || "eu-west-2",
  storageBucket: process.env.STORAGE_BUCKET ?? "",
  usersPrefix: process.env.USERS_PREFIX ?? "users",
  templatesDir:
    process.env.TEMPLATES_DIR ?? path.resolve(process.cwd(), "templates"),
  publicDir: process.env.PUBLIC_DIR ?? path.resolve(process.cwd(), "public"),
  defaultImageUrl:
    process.env.DEFAULT_IMAGE_URL ?? "/static/images/default-pic.svg",
  defaultHeaderImageUrl:
    process.env.DEFAULT_HEADER_IMAGE_URL ?? "/static/images/default-header.svg",
  corsOrigins: list(process.env.CORS_ORIGINS),
  csrfEnabled: process.env.CSRF_ENABLED !== "false",
  logLevel: process.env.LOG_LEVEL || "info",
};

/** Read only when the server boots, so tests never need it */
export function getSessionSecret(): string {
  const secret = process.env.SESSION_SECRET;
  if (!secret) throw new Error("SESSION_SECRET not set");
  return secret;
}
