import { pbkdf2, randomBytes, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";

const derive = promisify(pbkdf2);

const DIGEST = "sha256";
const ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;

/**
 * Hash a password as `pbkdf2$<iterations>$<salt>$<hash>`, salt and hash in
 * base64.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const hash = await derive(password, salt, ITERATIONS, KEY_LENGTH, DIGEST);
  return [
    "pbkdf2",
    ITERATIONS,
    salt.toString("base64"),
    hash.toString("base64"),
  ].join("$");
}

/** False for a wrong password and for anything not produced by hashPassword */
export async function verifyPassword(
  password: string,
  stored: string
): Promise<boolean> {
  const [scheme, rounds, saltB64, hashB64] = stored.split("$");
  const iterations = Number(rounds);
  if (scheme !== "pbkdf2" || !Number.isInteger(iterations) || iterations < 1)
    return false;
  if (!saltB64 || !hashB64) return false;

  const expected = Buffer.from(hashB64, "base64");
  if (expected.length === 0) return false;
  const actual = await derive(
    password,
    Buffer.from(saltB64, "base64"),
    iterations,
    expected.length,
    DIGEST
  );
  return timingSafeEqual(actual, expected);
}
