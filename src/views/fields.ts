import { Form, FormField } from "../forms/form";
import { SafeHtml, escape, html, raw } from "./html";

export type InputOverrides = { value?: string; placeholder?: string };

/** ` key="value"` for each entry, values escaped, in insertion order */
export function attrs(pairs: Record<string, string>): SafeHtml {
  return raw(
    Object.entries(pairs)
      .map(([key, value]) => ` ${key}="${escape(value)}"`)
      .join("")
  );
}

export function fieldErrors(errors: readonly string[]): SafeHtml {
  return html`${errors.map(
    (e) => html`<span class="text-danger">${e}</span>`
  )}`;
}

export function formErrors(form: Form): SafeHtml {
  return html`${form.errors.map(
    (e) => html`<div class="alert alert-danger">${e}</div>`
  )}`;
}

/** Password inputs never echo what was submitted */
export function fieldInput(
  field: FormField,
  { value = field.data, placeholder = field.label }: InputOverrides = {}
): SafeHtml {
  const { name, type } = field;
  const control = { placeholder, class: "form-control" };
  switch (type) {
    case "hidden":
      return html`<input${attrs({ type, id: name, name, value })}>`;
    case "textarea": {
      const open = attrs({ id: name, name, ...control });
      return html`<textarea${open}>${value}</textarea>`;
    }
    case "password":
      return html`<input${attrs({ type, id: name, name, ...control })}>`;
    default:
      return html`<input${attrs({ type, id: name, name, value, ...control })}>`;
  }
}

/** Errors first, then the input */
export function fieldGroup(
  field: FormField,
  overrides?: InputOverrides
): SafeHtml {
  return html`<div class="form-group">${[
    fieldErrors(field.errors),
    fieldInput(field, overrides),
  ]}</div>`;
}

export function hiddenFields(form: Form): SafeHtml {
  return html`${form.fields
    .filter((f) => f.type === "hidden")
    .map((f) => fieldInput(f))}`;
}

/** Every visible field not named in `except`, in form order */
export function fieldGroups(
  form: Form,
  except: readonly string[] = []
): SafeHtml {
  return html`${form.fields
    .filter((f) => f.type !== "hidden" && !except.includes(f.name))
    .map((f) => fieldGroup(f))}`;
}
