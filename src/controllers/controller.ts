import { logger } from "../logger";
import { UserService } from "../services/users";
import { csrfToken, pushFlash, takeFlash } from "../session";
import { ImageDefaults, SessionState, User, ViewResult } from "../types";
import { PageContext, PageRenderer } from "../views/page";

export type ControllerDeps = {
  users: UserService;
  pages: PageRenderer;
  images: ImageDefaults;
};

export const page = (html: string, status = 200): ViewResult => ({
  kind: "page",
  status,
  html,
});

export const redirect = (location: string): ViewResult => ({
  kind: "redirect",
  location,
});

export abstract class Controller {
  constructor(protected readonly deps: ControllerDeps) {}

  protected async currentUser(
    session: SessionState
  ): Promise<User | undefined> {
    if (!session.userId) return undefined;
    const user = await this.deps.users.findById(session.userId);
    if (!user) {
      logger.info("session points at a missing user", {
        userId: session.userId,
      });
      delete session.userId;
    }
    return user;
  }

  /** Consumes the session's flash messages */
  protected pageContext(
    session: SessionState,
    title: string,
    currentUser?: User
  ): PageContext {
    return {
      title,
      currentUser,
      flash: takeFlash(session),
      csrfToken: csrfToken(session),
    };
  }

  protected unauthorized(session: SessionState): ViewResult {
    pushFlash(session, "danger", "Access unauthorized.");
    return redirect("/");
  }
}
