export const DEFAULT_LOGIN_ACTION = "/api/login";
export const DEFAULT_USERNAME_FIELD = "us";
export const DEFAULT_PASSWORD_FIELD = "pw";

const LOGIN_MARKER = "login";
const LOGIN_MARKER_WINDOW = 1000;

export const LOGIN_FAILURE_PHRASES: ReadonlyArray<string> = [
  "login failed",
  "invalid username",
  "invalid password",
  "authentication failed",
  "incorrect credentials"
];

export type LoginFieldRole = "username" | "password" | "hidden";

export interface LoginField {
  name: string;
  role: LoginFieldRole;
  value: string;
}

export interface LoginFormDescriptor {
  action?: string;
  fields: LoginField[];
}

const FORM_PATTERN = /<form\b([^>]*)>([\s\S]*?)(?:<\/form\s*>|$)/i;
const INPUT_PATTERN = /<input\b([^>]*)>/gi;
const ATTRIBUTE_PATTERN = /([^\s"'=<>`/]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'"
};

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === "#") {
      const code = entity[1].toLowerCase() === "x" ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1].toLowerCase();
    if (attributes.has(name)) {
      continue;
    }
    attributes.set(name, decodeEntities(match[2] ?? match[3] ?? match[4] ?? ""));
  }
  return attributes;
}

/**
 * Scans the first `<form>` of a login page. The first named text input is
 * the username field and the first named password input the password field;
 * every named hidden input is carried over with its value. Missing username
 * or password inputs fall back to the `us` / `pw` names.
 */
export function parseLoginForm(html: string): LoginFormDescriptor | undefined {
  const form = FORM_PATTERN.exec(html);
  if (!form) {
    return undefined;
  }
  const formAttributes = parseAttributes(form[1]);
  const action = formAttributes.get("action")?.trim();

  let usernameField: string | undefined;
  let passwordField: string | undefined;
  const hidden: LoginField[] = [];

  for (const input of form[2].matchAll(INPUT_PATTERN)) {
    const attributes = parseAttributes(input[1]);
    const name = attributes.get("name");
    if (!name) {
      continue;
    }
    const type = (attributes.get("type") || "text").toLowerCase();
    if (type === "text" && usernameField === undefined) {
      usernameField = name;
    } else if (type === "password" && passwordField === undefined) {
      passwordField = name;
    } else if (type === "hidden") {
      hidden.push({ name, role: "hidden", value: attributes.get("value") ?? "" });
    }
  }

  return {
    action: action || undefined,
    fields: [
      { name: usernameField ?? DEFAULT_USERNAME_FIELD, role: "username", value: "" },
      { name: passwordField ?? DEFAULT_PASSWORD_FIELD, role: "password", value: "" },
      ...hidden
    ]
  };
}

export function buildLoginBody(
  form: LoginFormDescriptor,
  username: string,
  password: string
): URLSearchParams {
  const body = new URLSearchParams();
  for (const field of form.fields) {
    if (field.role === "username") {
      body.set(field.name, username);
    } else if (field.role === "password") {
      body.set(field.name, password);
    } else {
      body.set(field.name, field.value);
    }
  }
  return body;
}

/** Resolves the form action against the device origin; the default action applies when none is given. */
export function resolveLoginAction(form: LoginFormDescriptor, origin: string): string {
  return new URL(form.action || DEFAULT_LOGIN_ACTION, `${origin}/`).toString();
}

/** Path and query of `url`; the host is left out so device names never match. */
function locationOf(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.pathname}${parsed.search}`;
  } catch {
    return url;
  }
}

export function isLoginPage(url: string, status: number, body: string): boolean {
  if (locationOf(url).toLowerCase().includes(LOGIN_MARKER)) {
    return true;
  }
  return status === 200 && body.slice(0, LOGIN_MARKER_WINDOW).toLowerCase().includes(LOGIN_MARKER);
}

export function hasLoginFailure(body: string): boolean {
  const lowered = body.toLowerCase();
  return LOGIN_FAILURE_PHRASES.some((phrase) => lowered.includes(phrase));
}
