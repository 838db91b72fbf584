import { z } from "zod";
import { ImageDefaults, User } from "../types";
import { FieldSpec, Form, FormDefinition } from "./form";

function isWebUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

const username = z.string().trim().min(1, "Username is required.");
const email = z
  .string()
  .trim()
  .min(1, "Email is required.")
  .email("Invalid email address.");

/** Empty, the stored placeholder, or an http(s) URL */
const imageUrl = (sentinel: string) =>
  z
    .string()
    .trim()
    .refine((v) => v === "" || v === sentinel || isWebUrl(v), {
      message: "Must be a valid http(s) URL.",
    });

const csrfToken = z.string();

const csrfField = {
  name: "csrf_token",
  label: "CSRF Token",
  type: "hidden",
} as const;

export const profileEditFields = [
  csrfField,
  { name: "username", label: "Username", type: "text" },
  { name: "email", label: "E-mail", type: "email" },
  { name: "image_url", label: "(Optional) Image URL", type: "url" },
  {
    name: "header_image_url",
    label: "(Optional) Header Image URL",
    type: "url",
  },
  { name: "bio", label: "(Optional) Tell us about yourself", type: "textarea" },
  { name: "location", label: "(Optional) Location", type: "text" },
  { name: "password", label: "Password", type: "password" },
] as const satisfies readonly FieldSpec[];

export type ProfileEditField = (typeof profileEditFields)[number]["name"];

export function profileEditDefinition(images: ImageDefaults) {
  return {
    fields: profileEditFields,
    schema: z.object({
      csrf_token: csrfToken,
      username,
      email,
      image_url: imageUrl(images.imageUrl),
      header_image_url: imageUrl(images.headerImageUrl),
      bio: z.string().trim(),
      location: z.string().trim(),
      password: z.string().min(6, "Password must be at least 6 characters."),
    }),
  } satisfies FormDefinition<ProfileEditField, z.ZodTypeAny>;
}

export type ProfileEditForm = Form<ProfileEditField>;

/** The edit form as first shown: the user's stored values, no password */
export function profileEditForm(user: User, csrf = ""): ProfileEditForm {
  return new Form(profileEditFields, {
    csrf_token: csrf,
    username: user.username,
    email: user.email,
    image_url: user.imageUrl,
    header_image_url: user.headerImageUrl,
    bio: user.bio,
    location: user.location,
  });
}

export const signupFields = [
  csrfField,
  { name: "username", label: "Username", type: "text" },
  { name: "email", label: "E-mail", type: "email" },
  { name: "password", label: "Password", type: "password" },
  { name: "image_url", label: "(Optional) Image URL", type: "url" },
] as const satisfies readonly FieldSpec[];

export type SignupField = (typeof signupFields)[number]["name"];

export function signupDefinition(images: ImageDefaults) {
  return {
    fields: signupFields,
    schema: z.object({
      csrf_token: csrfToken,
      username,
      email,
      password: z.string().min(6, "Password must be at least 6 characters."),
      image_url: imageUrl(images.imageUrl),
    }),
  } satisfies FormDefinition<SignupField, z.ZodTypeAny>;
}

export const loginFields = [
  csrfField,
  { name: "username", label: "Username", type: "text" },
  { name: "password", label: "Password", type: "password" },
] as const satisfies readonly FieldSpec[];

export type LoginField = (typeof loginFields)[number]["name"];

export const loginDefinition = {
  fields: loginFields,
  schema: z.object({
    csrf_token: csrfToken,
    username,
    password: z.string().min(1, "Password is required."),
  }),
} satisfies FormDefinition<LoginField, z.ZodTypeAny>;
