/**
 * Markup that has already been escaped, or is trusted as-is.
 */
export class SafeHtml {
  constructor(readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

export type HtmlValue =
  | string
  | number
  | SafeHtml
  | null
  | undefined
  | false
  | readonly HtmlValue[];

export function escape(value: string | number): string {
  return String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

function flatten(value: HtmlValue): string {
  if (value === null || value === undefined || value === false) return "";
  if (value instanceof SafeHtml) return value.content;
  if (Array.isArray(value)) return value.map(flatten).join("");
  if (typeof value === "string" || typeof value === "number")
    return escape(value);
  return "";
}

/**
 * Tagged template that escapes every interpolation not wrapped in raw().
 *
 * @example
 * html`<p>${"<b>"}</p>`.content === "<p>&lt;b&gt;</p>"
 */
export function html(
  strings: TemplateStringsArray,
  ...values: HtmlValue[]
): SafeHtml {
  let out = strings[0];
  values.forEach((value, i) => {
    out += flatten(value) + strings[i + 1];
  });
  return new SafeHtml(out);
}
