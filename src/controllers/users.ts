import { NotFoundError, UniqueViolationError } from "../errors";
import { validateForm } from "../forms/form";
import {
  ProfileEditForm,
  profileEditDefinition,
  profileEditForm,
} from "../forms/userForms";
import { logger } from "../logger";
import { csrfToken, pushFlash } from "../session";
import { SessionState, User, ViewResult } from "../types";
import {
  renderEditProfile,
  renderUserIndex,
  renderUserProfile,
} from "../views/users";
import { Controller, page, redirect } from "./controller";

export class UserController extends Controller {
  async index(session: SessionState, search: unknown): Promise<ViewResult> {
    const q = typeof search === "string" ? search : "";
    const [users, currentUser] = await Promise.all([
      this.deps.users.list(q),
      this.currentUser(session),
    ]);
    const ctx = this.pageContext(session, "Users", currentUser);
    return page(await renderUserIndex(this.deps.pages, users, q, ctx));
  }

  async show(session: SessionState, id: string): Promise<ViewResult> {
    const user = await this.deps.users.findById(id);
    if (!user) throw new NotFoundError(`User ${id} not found`);
    const currentUser = await this.currentUser(session);
    const ctx = this.pageContext(session, `@${user.username}`, currentUser);
    return page(await renderUserProfile(this.deps.pages, user, ctx));
  }

  async editProfile(session: SessionState): Promise<ViewResult> {
    const user = await this.currentUser(session);
    if (!user) return this.unauthorized(session);
    const form = profileEditForm(user, csrfToken(session));
    return this.editPage(session, user, form);
  }

  /**
   * Saves the submitted profile once the current password checks out.
   * A wrong password changes nothing and sends the user back to the form.
   */
  async updateProfile(
    session: SessionState,
    body: unknown
  ): Promise<ViewResult> {
    const user = await this.currentUser(session);
    if (!user) return this.unauthorized(session);

    const result = validateForm(profileEditDefinition(this.deps.images), body);
    if (!result.ok) return this.editPage(session, user, result.form);
    const { form, values } = result;

    const confirmed = await this.deps.users.authenticate(
      user.username,
      values.password
    );
    if (!confirmed) {
      logger.warn("profile update rejected: wrong password", {
        userId: user.id,
      });
      pushFlash(session, "danger", "Incorrect password, please try again.");
      return redirect("/users/profile");
    }

    try {
      const updated = await this.deps.users.updateProfile(user.id, {
        username: values.username,
        email: values.email,
        imageUrl: values.image_url,
        headerImageUrl: values.header_image_url,
        bio: values.bio,
        location: values.location,
      });
      logger.info("profile updated", { userId: updated.id });
      pushFlash(session, "success", "Profile updated.");
      return redirect(`/users/${updated.id}`);
    } catch (e) {
      if (!(e instanceof UniqueViolationError)) throw e;
      form.addError(e.field, e.message);
      return this.editPage(session, user, form);
    }
  }

  async destroy(session: SessionState): Promise<ViewResult> {
    const user = await this.currentUser(session);
    if (!user) return this.unauthorized(session);

    await this.deps.users.remove(user.id);
    delete session.userId;
    logger.info("user deleted", { userId: user.id });
    pushFlash(session, "info", "Your account has been deleted.");
    return redirect("/signup");
  }

  private async editPage(
    session: SessionState,
    user: User,
    form: ProfileEditForm
  ) {
    const ctx = this.pageContext(session, "Edit Profile", user);
    const html = await renderEditProfile(
      this.deps.pages,
      form,
      user.id,
      this.deps.images,
      ctx
    );
    return page(html);
  }
}
