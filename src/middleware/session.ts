import { Request, RequestHandler } from "express";
import session from "express-session";
import { ForbiddenError } from "../errors";
import { FlashMessage } from "../types";

declare module "express-session" {
  interface SessionData {
    userId: string;
    flash: FlashMessage[];
    csrfToken: string;
  }
}

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export function sessionMiddleware(secret: string): RequestHandler {
  return session({
    name: "profile.sid",
    secret,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: "lax",
      secure: process.env.NODE_ENV === "production",
      maxAge: WEEK_MS,
    },
  });
}

/**
 * Every POST must send back the session's token as `csrf_token`.
 * Tokens are handed out by the pages that render forms.
 */
export function csrfProtection(enabled: boolean): RequestHandler {
  return (req, _res, next) => {
    if (!enabled || req.method !== "POST") return next();

    const expected = req.session.csrfToken;
    const submitted: unknown = req.body?.csrf_token;
    if (expected === undefined || submitted !== expected) {
      return next(new ForbiddenError("Invalid CSRF token"));
    }
    next();
  };
}

/** Swaps in a fresh session id, keeping nothing from the old session */
export function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}
