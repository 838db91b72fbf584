import { z } from "zod";

export type FieldType =
  | "text"
  | "email"
  | "url"
  | "password"
  | "textarea"
  | "hidden";

export type FieldSpec<N extends string = string> = {
  name: N;
  label: string;
  type: FieldType;
};

export type FormField<N extends string = string> = FieldSpec<N> & {
  data: string;
  errors: string[];
};

export type FormDefinition<N extends string, S extends z.ZodTypeAny> = {
  fields: readonly FieldSpec<N>[];
  schema: S;
};

export type Validated<N extends string, T> =
  | { ok: true; form: Form<N>; values: T }
  | { ok: false; form: Form<N> };

/**
 * Field descriptors keyed by name, iterated in declaration order.
 * Errors not tied to a field go to `errors`.
 */
export class Form<N extends string = string> {
  readonly errors: string[] = [];
  private readonly byName = new Map<N, FormField<N>>();

  constructor(
    specs: readonly FieldSpec<N>[],
    data: Partial<Record<N, string>> = {}
  ) {
    for (const spec of specs) {
      this.byName.set(spec.name, {
        ...spec,
        data: data[spec.name] ?? "",
        errors: [],
      });
    }
  }

  get fields(): FormField<N>[] {
    return [...this.byName.values()];
  }

  get valid(): boolean {
    return (
      this.errors.length === 0 &&
      this.fields.every((f) => f.errors.length === 0)
    );
  }

  has(name: string): name is N {
    return this.fields.some((f) => f.name === name);
  }

  field(name: N): FormField<N> {
    const field = this.byName.get(name);
    if (!field) throw new Error(`Unknown form field: ${name}`);
    return field;
  }

  addError(name: N | undefined, message: string): void {
    if (name === undefined) this.errors.push(message);
    else this.field(name).errors.push(message);
  }
}

/** Declared fields only; anything missing or not a string reads as "" */
export function readFormBody<N extends string>(
  specs: readonly FieldSpec<N>[],
  body: unknown
): Partial<Record<N, string>> {
  const source = new Map<string, unknown>(
    typeof body === "object" && body !== null ? Object.entries(body) : []
  );
  const data: Partial<Record<N, string>> = {};
  for (const { name } of specs) {
    const value = source.get(name);
    data[name] = typeof value === "string" ? value : "";
  }
  return data;
}

export function validateForm<N extends string, S extends z.ZodTypeAny>(
  definition: FormDefinition<N, S>,
  body: unknown
): Validated<N, z.infer<S>> {
  const data = readFormBody(definition.fields, body);
  const form = new Form(definition.fields, data);
  const result = definition.schema.safeParse(data);
  if (result.success) return { ok: true, form, values: result.data };

  for (const issue of result.error.issues) {
    const [head] = issue.path;
    const field = typeof head === "string" && form.has(head) ? head : undefined;
    form.addError(field, issue.message);
  }
  return { ok: false, form };
}
