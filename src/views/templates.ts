import fs from "fs-extra";
import path from "path";
import { SafeHtml, escape } from "./html";

export type TemplateContext = Record<string, string | SafeHtml>;

/**
 * Replaces `{{ key }}` placeholders. Strings are escaped, SafeHtml is inserted
 * verbatim, and keys missing from the context are left as they are.
 */
export function renderTemplate(
  template: string,
  context: TemplateContext
): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(context, key)) return match;
    const value = context[key];
    return value instanceof SafeHtml ? value.content : escape(value);
  });
}

/** Reads `<dir>/<name>.html` once and serves it from memory afterwards */
export class TemplateLoader {
  private readonly cache = new Map<string, string>();

  constructor(private readonly dir: string) {}

  async load(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;
    const text = await this.read(name);
    this.cache.set(name, text);
    return text;
  }

  private async read(name: string): Promise<string> {
    const file = path.join(this.dir, `${name}.html`);
    if (!(await fs.pathExists(file))) {
      throw new Error(`Template not found: ${file}`);
    }
    return fs.readFile(file, "utf-8");
  }
}
