import { FlashMessage, User } from "../types";
import { attrs } from "./fields";
import { SafeHtml, html, raw } from "./html";
import { TemplateContext, TemplateLoader, renderTemplate } from "./templates";

export type PageContext = {
  title: string;
  currentUser?: User;
  flash?: FlashMessage[];
  csrfToken?: string;
};

export function csrfInput(token: string | undefined): SafeHtml {
  if (token === undefined) return html``;
  const hidden = { type: "hidden", name: "csrf_token", value: token };
  return html`<input${attrs(hidden)}>`;
}

const link = (href: string, text: string) =>
  html`<li><a href="${href}">${text}</a></li>`;

function navigation({ currentUser, csrfToken }: PageContext): SafeHtml {
  if (!currentUser) {
    return html`<ul class="nav">${[
      link("/signup", "Sign up"),
      link("/login", "Log in"),
    ]}</ul>`;
  }
  const logout = html`<form method="POST" action="/logout">${[
    csrfInput(csrfToken),
    html`<button class="btn btn-link">Log out</button>`,
  ]}</form>`;
  return html`<ul class="nav">${[
    link("/users", "Users"),
    link(`/users/${currentUser.id}`, `@${currentUser.username}`),
    link("/users/profile", "Edit profile"),
    html`<li>${logout}</li>`,
  ]}</ul>`;
}

function flashMessages(messages: readonly FlashMessage[]): SafeHtml {
  return html`${messages.map(
    ({ category, message }) =>
      html`<div class="alert alert-${category}">${message}</div>`
  )}`;
}

/** Renders a view, then places it in the `content` slot of `layouts/base` */
export class PageRenderer {
  constructor(private readonly templates: TemplateLoader) {}

  async render(
    view: string,
    context: TemplateContext,
    page: PageContext
  ): Promise<string> {
    const [layout, body] = await Promise.all([
      this.templates.load("layouts/base"),
      this.templates.load(view),
    ]);
    return renderTemplate(layout, {
      title: page.title,
      nav: navigation(page),
      flash: flashMessages(page.flash ?? []),
      content: raw(renderTemplate(body, context)),
    });
  }
}
