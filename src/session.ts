import { randomBytes } from "node:crypto";
import { FlashCategory, FlashMessage, SessionState } from "./types";

export function pushFlash(
  session: SessionState,
  category: FlashCategory,
  message: string
): void {
  session.flash = [...(session.flash ?? []), { category, message }];
}

/** Returns queued messages and forgets them */
export function takeFlash(session: SessionState): FlashMessage[] {
  const messages = session.flash ?? [];
  delete session.flash;
  return messages;
}

/** The session's form token, created the first time a form needs one */
export function csrfToken(session: SessionState): string {
  session.csrfToken ??= randomBytes(24).toString("base64url");
  return session.csrfToken;
}
