import { Form } from "../forms/form";
import {
  LoginField,
  ProfileEditForm,
  SignupField,
} from "../forms/userForms";
import { ImageDefaults, User } from "../types";
import {
  attrs,
  fieldErrors,
  fieldGroup,
  fieldGroups,
  fieldInput,
  formErrors,
  hiddenFields,
} from "./fields";
import { SafeHtml, html } from "./html";
import { PageContext, PageRenderer, csrfInput } from "./page";

export const PASSWORD_PLACEHOLDER = "Enter your password to confirm";

/** Rendered on their own below the generic field loop */
const SEPARATE_FIELDS = ["password", "image_url", "header_image_url"];

/** A stored placeholder shows as an empty input so the label reads through */
function imageField(
  form: ProfileEditForm,
  name: "image_url" | "header_image_url",
  sentinel: string
): SafeHtml {
  const field = form.field(name);
  return field.data === sentinel
    ? fieldGroup(field, { value: "" })
    : fieldGroup(field);
}

function passwordField(form: ProfileEditForm): SafeHtml {
  const password = form.field("password");
  return html`<div class="form-group">${[
    fieldErrors(password.errors),
    fieldInput(password, { placeholder: PASSWORD_PLACEHOLDER }),
  ]}</div>`;
}

export function renderEditProfile(
  pages: PageRenderer,
  form: ProfileEditForm,
  userId: string,
  images: ImageDefaults,
  page: PageContext
): Promise<string> {
  return pages.render(
    "users/edit",
    {
      hidden: hiddenFields(form),
      form_errors: formErrors(form),
      fields: fieldGroups(form, SEPARATE_FIELDS),
      image_url: imageField(form, "image_url", images.imageUrl),
      header_image_url: imageField(
        form,
        "header_image_url",
        images.headerImageUrl
      ),
      password: passwordField(form),
      cancel_href: `/users/${userId}`,
    },
    page
  );
}

function ownProfileActions(csrfToken: string | undefined): SafeHtml {
  const form = attrs({
    method: "POST",
    action: "/users/delete",
    class: "form-inline",
  });
  const remove = html`<form${form}>${[
    csrfInput(csrfToken),
    html`<button class="btn btn-outline-danger">Delete Profile</button>`,
  ]}</form>`;
  const edit = attrs({
    href: "/users/profile",
    class: "btn btn-outline-secondary",
  });
  return html`<a${edit}>Edit Profile</a>${remove}`;
}

export function renderUserProfile(
  pages: PageRenderer,
  user: User,
  page: PageContext
): Promise<string> {
  const own = page.currentUser?.id === user.id;
  return pages.render(
    "users/show",
    {
      username: user.username,
      image_url: user.imageUrl,
      header_image_url: user.headerImageUrl,
      bio: user.bio,
      location: user.location,
      actions: own ? ownProfileActions(page.csrfToken) : html``,
    },
    page
  );
}

function userCard(user: User): SafeHtml {
  const avatar = attrs({
    src: user.imageUrl,
    alt: `Image for ${user.username}`,
    class: "card-avatar",
  });
  const href = attrs({ href: `/users/${user.id}` });
  const label = html`<img${avatar}><span>@${user.username}</span>`;
  return html`<li class="user-card"><a${href}>${label}</a></li>`;
}

export function renderUserIndex(
  pages: PageRenderer,
  users: readonly User[],
  search: string,
  page: PageContext
): Promise<string> {
  const cards = users.length
    ? html`<ul class="user-list">${users.map(userCard)}</ul>`
    : html`<p class="no-users">Sorry, no users found.</p>`;
  return pages.render("users/index", { search, users: cards }, page);
}

export function renderSignup(
  pages: PageRenderer,
  form: Form<SignupField>,
  page: PageContext
): Promise<string> {
  return pages.render(
    "auth/signup",
    {
      hidden: hiddenFields(form),
      form_errors: formErrors(form),
      fields: fieldGroups(form),
    },
    page
  );
}

export function renderLogin(
  pages: PageRenderer,
  form: Form<LoginField>,
  page: PageContext
): Promise<string> {
  return pages.render(
    "auth/login",
    {
      hidden: hiddenFields(form),
      form_errors: formErrors(form),
      fields: fieldGroups(form),
    },
    page
  );
}
