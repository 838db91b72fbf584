import { Form, readFormBody, validateForm } from "../src/forms/form";
import { loginDefinition, profileEditDefinition } from "../src/forms/userForms";
import { images } from "./helpers";

const specs = [
  { name: "username", label: "Username", type: "text" },
  { name: "email", label: "E-mail", type: "email" },
] as const;

const profileBody = (overrides: Record<string, unknown> = {}) => ({
  csrf_token: "tok",
  username: "bob",
  email: "bob@example.com",
  image_url: "",
  header_image_url: "",
  bio: "",
  location: "",
  password: "secret1",
  ...overrides,
});

describe("readFormBody", () => {
  it("keeps declared string fields and blanks everything else", () => {
    const body = { username: "bob", email: 5, extra: "x" };
    expect(readFormBody(specs, body)).toEqual({
      username: "bob",
      email: "",
    });
  });

  it("treats a missing body as empty", () => {
    expect(readFormBody(specs, undefined)).toEqual({ username: "", email: "" });
  });
});

describe("Form", () => {
  it("iterates fields in declaration order with their data", () => {
    const form = new Form(specs, { email: "a@b.co" });
    expect(form.fields.map((f) => [f.name, f.data])).toEqual([
      ["username", ""],
      ["email", "a@b.co"],
    ]);
    expect(form.valid).toBe(true);
  });

  it("collects field and form-level errors", () => {
    const form = new Form(specs);
    form.addError("email", "Bad.");
    form.addError(undefined, "Nope.");
    expect(form.field("email").errors).toEqual(["Bad."]);
    expect(form.errors).toEqual(["Nope."]);
    expect(form.valid).toBe(false);
  });

  it("throws on an unknown field name", () => {
    const form = new Form<string>(specs);
    expect(() => form.field("bio")).toThrow("Unknown form field: bio");
  });
});

describe("profile edit validation", () => {
  const definition = profileEditDefinition(images);

  it("returns trimmed values for a valid submission", () => {
    const result = validateForm(
      definition,
      profileBody({ username: "  bob  ", bio: " hi " })
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.values.username).toBe("bob");
    expect(result.values.bio).toBe("hi");
    expect(result.form.field("username").data).toBe("  bob  ");
  });

  it("attaches each error to its field and keeps the submitted data", () => {
    const result = validateForm(
      definition,
      profileBody({ username: "   ", email: "nope", password: "123" })
    );
    expect(result.ok).toBe(false);
    const { form } = result;
    expect(form.field("username").errors).toEqual(["Username is required."]);
    expect(form.field("email").errors).toEqual(["Invalid email address."]);
    expect(form.field("email").data).toBe("nope");
    expect(form.field("password").errors).toEqual([
      "Password must be at least 6 characters.",
    ]);
    expect(form.field("bio").errors).toEqual([]);
  });

  it("reports both checks for an empty email", () => {
    const { form } = validateForm(definition, profileBody({ email: "" }));
    expect(form.field("email").errors).toEqual([
      "Email is required.",
      "Invalid email address.",
    ]);
  });

  it.each([
    ["", true],
    ["/static/images/default-pic.svg", true],
    ["https://img.example.com/me.png", true],
    ["http://newimage.com/image.jpg", true],
    ["javascript:alert(1)", false],
    ["/static/images/default-header.svg", false],
    ["not a url", false],
  ])("image_url %p accepted: %p", (value, accepted) => {
    const result = validateForm(definition, profileBody({ image_url: value }));
    expect(result.ok).toBe(accepted);
    if (!accepted) {
      expect(result.form.field("image_url").errors).toEqual([
        "Must be a valid http(s) URL.",
      ]);
    }
  });

  it("accepts the header placeholder only in the header field", () => {
    const result = validateForm(
      definition,
      profileBody({ header_image_url: images.headerImageUrl })
    );
    expect(result.ok).toBe(true);
  });
});

describe("login validation", () => {
  it("requires a password", () => {
    const result = validateForm(loginDefinition, {
      username: "bob",
      password: "",
    });
    expect(result.ok).toBe(false);
    expect(result.form.field("password").errors).toEqual([
      "Password is required.",
    ]);
  });
});
