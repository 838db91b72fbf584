import { UniqueViolationError } from "../errors";
import { Form, validateForm } from "../forms/form";
import {
  LoginField,
  SignupField,
  loginDefinition,
  loginFields,
  signupDefinition,
  signupFields,
} from "../forms/userForms";
import { logger } from "../logger";
import { csrfToken, pushFlash } from "../session";
import { SessionState, ViewResult } from "../types";
import { renderLogin, renderSignup } from "../views/users";
import { Controller, page, redirect } from "./controller";

export class AuthController extends Controller {
  async home(session: SessionState): Promise<ViewResult> {
    const user = await this.currentUser(session);
    return redirect(user ? `/users/${user.id}` : "/login");
  }

  signupForm(session: SessionState): Promise<ViewResult> {
    const form = new Form(signupFields, { csrf_token: csrfToken(session) });
    return this.signupPage(session, form);
  }

  async signup(session: SessionState, body: unknown): Promise<ViewResult> {
    const result = validateForm(signupDefinition(this.deps.images), body);
    if (!result.ok) return this.signupPage(session, result.form);
    const { form, values } = result;

    try {
      const user = await this.deps.users.signup({
        username: values.username,
        email: values.email,
        password: values.password,
        imageUrl: values.image_url,
      });
      session.userId = user.id;
      logger.info("user signed up", { userId: user.id });
      pushFlash(session, "success", `Welcome, @${user.username}!`);
      return redirect(`/users/${user.id}`);
    } catch (e) {
      if (!(e instanceof UniqueViolationError)) throw e;
      form.addError(e.field, e.message);
      return this.signupPage(session, form);
    }
  }

  loginForm(session: SessionState): Promise<ViewResult> {
    const form = new Form(loginFields, { csrf_token: csrfToken(session) });
    return this.loginPage(session, form);
  }

  async login(session: SessionState, body: unknown): Promise<ViewResult> {
    const result = validateForm(loginDefinition, body);
    if (!result.ok) return this.loginPage(session, result.form);
    const { form, values } = result;

    const user = await this.deps.users.authenticate(
      values.username,
      values.password
    );
    if (!user) {
      logger.warn("login failed", { username: values.username });
      form.addError(undefined, "Invalid credentials.");
      return this.loginPage(session, form);
    }
    session.userId = user.id;
    logger.info("user logged in", { userId: user.id });
    pushFlash(session, "success", `Hello, @${user.username}!`);
    return redirect(`/users/${user.id}`);
  }

  logout(session: SessionState): ViewResult {
    delete session.userId;
    pushFlash(session, "success", "You have been logged out.");
    return redirect("/login");
  }

  private async signupPage(session: SessionState, form: Form<SignupField>) {
    // the session may have been regenerated since the token was posted
    form.field("csrf_token").data = csrfToken(session);
    const ctx = this.pageContext(session, "Sign up");
    return page(await renderSignup(this.deps.pages, form, ctx));
  }

  private async loginPage(session: SessionState, form: Form<LoginField>) {
    form.field("csrf_token").data = csrfToken(session);
    const ctx = this.pageContext(session, "Log in");
    return page(await renderLogin(this.deps.pages, form, ctx));
  }
}
