import { z } from "zod";
import { ReadLoopError } from "./errors.js";
import type { RequestTemplate } from "./types.js";

export const DEFAULT_SESSION_COOKIES = ["wr_skey"];

// fetch computes these itself; replaying captured values breaks requests.
const TRANSPORT_HEADERS = new Set(["content-length", "host", "accept-encoding"]);

export interface ParseOptions {
  sessionCookies?: readonly string[];
}

const JsonTemplateSchema = z.object({
  method: z.string().trim().min(1).optional(),
  url: z.string(),
  headers: z.record(z.string()).default({}),
  cookies: z.record(z.string()).default({}),
  body: z.string().optional(),
});

const malformed = (message: string) => new ReadLoopError("MalformedTemplate", message);

const ANSI_C_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "?": "?",
  a: "\x07",
  b: "\b",
  e: "\x1b",
  f: "\f",
  v: "\v",
};

/**
 * Split a shell command line into words. Handles single quotes, double quotes
 * (with backslash escapes), `$'…'` strings and backslash-newline continuations.
 */
export function tokenizeShell(input: string): string[] {
  const text = input.replace(/\r\n/g, "\n");
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let i = 0;

  const flush = () => {
    if (inToken) tokens.push(current);
    current = "";
    inToken = false;
  };

  while (i < text.length) {
    const char = text[i];

    if (char === "\\") {
      const next = text[i + 1];
      if (next === "\n") {
        i += 2;
        continue;
      }
      if (next === undefined) {
        i += 1;
        continue;
      }
      current += next;
      inToken = true;
      i += 2;
      continue;
    }

    if (char === "'") {
      const end = text.indexOf("'", i + 1);
      if (end === -1) throw malformed("Unterminated single quote in captured request");
      current += text.slice(i + 1, end);
      inToken = true;
      i = end + 1;
      continue;
    }

    if (char === "$" && text[i + 1] === "'") {
      i += 2;
      let closed = false;
      while (i < text.length) {
        const c = text[i];
        if (c === "'") {
          closed = true;
          i += 1;
          break;
        }
        if (c === "\\") {
          const esc = text[i + 1] ?? "";
          if (esc === "x") {
            const hex = text.slice(i + 2, i + 4).match(/^[0-9a-fA-F]{1,2}/)?.[0] ?? "";
            current += String.fromCharCode(parseInt(hex || "0", 16));
            i += 2 + hex.length;
            continue;
          }
          if (esc === "u") {
            const hex = text.slice(i + 2, i + 6).match(/^[0-9a-fA-F]{1,4}/)?.[0] ?? "";
            current += String.fromCharCode(parseInt(hex || "0", 16));
            i += 2 + hex.length;
            continue;
          }
          current += ANSI_C_ESCAPES[esc] ?? `\\${esc}`;
          i += 2;
          continue;
        }
        current += c;
        i += 1;
      }
      if (!closed) throw malformed("Unterminated $'…' string in captured request");
      inToken = true;
      continue;
    }

    if (char === '"') {
      i += 1;
      let closed = false;
      while (i < text.length) {
        const c = text[i];
        if (c === '"') {
          closed = true;
          i += 1;
          break;
        }
        if (c === "\\" && ['"', "\\", "$", "`", "\n"].includes(text[i + 1] ?? "")) {
          if (text[i + 1] !== "\n") current += text[i + 1];
          i += 2;
          continue;
        }
        current += c;
        i += 1;
      }
      if (!closed) throw malformed("Unterminated double quote in captured request");
      inToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      flush();
      i += 1;
      continue;
    }

    current += char;
    inToken = true;
    i += 1;
  }

  flush();
  return tokens;
}

export function parseCookieString(value: string): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const part of value.split(";")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const name = part.slice(0, eq).trim();
    if (name) cookies[name] = part.slice(eq + 1).trim();
  }
  return cookies;
}

interface RawRequest {
  method?: string;
  url?: string;
  headers: Record<string, string>;
  cookies: Record<string, string>;
  body?: string;
}

const VALUE_OPTIONS = new Set([
  "-X", "--request",
  "-H", "--header",
  "-b", "--cookie",
  "-d", "--data", "--data-raw", "--data-binary", "--data-ascii", "--data-urlencode",
  "--json",
  "-A", "--user-agent",
  "-e", "--referer",
  "--url",
  // taken so their argument is not mistaken for the URL
  "-o", "--output", "-u", "--user", "-x", "--proxy", "-m", "--max-time",
  "--connect-timeout", "-w", "--write-out",
]);

function applyHeader(raw: RawRequest, line: string) {
  const colon = line.indexOf(":");
  if (colon <= 0) return;
  const name = line.slice(0, colon).trim().toLowerCase();
  const value = line.slice(colon + 1).trim();
  if (name === "cookie") {
    Object.assign(raw.cookies, parseCookieString(value));
    return;
  }
  raw.headers[name] = value;
}

function appendBody(raw: RawRequest, data: string) {
  raw.body = raw.body === undefined ? data : `${raw.body}&${data}`;
}

function parseCurl(tokens: string[]): RawRequest {
  const raw: RawRequest = { headers: {}, cookies: {} };

  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];

    // curl accepts an attached value for short options, e.g. -XPOST
    if (/^-[XHbdAe].+/.test(token) && !token.startsWith("--")) {
      tokens.splice(i + 1, 0, token.slice(2));
      tokens[i] = token.slice(0, 2);
    }
    const option = tokens[i];

    if (!option.startsWith("-")) {
      raw.url ??= option;
      continue;
    }
    if (!VALUE_OPTIONS.has(option)) {
      continue;
    }

    const value = tokens[i + 1];
    if (value === undefined) {
      throw malformed(`Option ${option} is missing its value`);
    }
    i++;

    switch (option) {
      case "-X":
      case "--request":
        raw.method = value.toUpperCase();
        break;
      case "-H":
      case "--header":
        applyHeader(raw, value);
        break;
      case "-b":
      case "--cookie":
        Object.assign(raw.cookies, parseCookieString(value));
        break;
      case "--json":
        appendBody(raw, value);
        raw.headers["content-type"] ??= "application/json";
        raw.headers["accept"] ??= "application/json";
        break;
      case "-A":
      case "--user-agent":
        raw.headers["user-agent"] = value;
        break;
      case "-e":
      case "--referer":
        raw.headers["referer"] = value;
        break;
      case "--url":
        raw.url = value;
        break;
      default:
        if (option === "-d" || option.startsWith("--data")) {
          appendBody(raw, value);
        }
    }
  }

  return raw;
}

function parseJsonTemplate(text: string): RawRequest {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ReadLoopError("MalformedTemplate", "Captured request is not valid JSON", {
      cause: error,
    });
  }
  const parsed = JsonTemplateSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "template"}: ${issue.message}`);
    throw malformed(`Invalid JSON template: ${issues.join("; ")}`);
  }

  const raw: RawRequest = {
    method: parsed.data.method?.toUpperCase(),
    url: parsed.data.url,
    headers: {},
    cookies: { ...parsed.data.cookies },
    body: parsed.data.body,
  };
  for (const [name, headerValue] of Object.entries(parsed.data.headers)) {
    applyHeader(raw, `${name}: ${headerValue}`);
  }
  return raw;
}

function assertHttpUrl(url: string | undefined): string {
  if (!url) {
    throw malformed("Captured request has no URL");
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ReadLoopError("MalformedTemplate", `Captured request URL is invalid: ${url}`, {
      cause: error,
    });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw malformed(`Captured request URL must be http(s): ${url}`);
  }
  return parsed.toString();
}

/**
 * Turn a captured request (a browser "copy as cURL" command, or a JSON
 * description) into an immutable template for replay.
 */
export function parseTemplate(rawCaptured: string, options: ParseOptions = {}): RequestTemplate {
  const text = rawCaptured.trim();
  let raw: RawRequest;

  if (text.startsWith("{")) {
    raw = parseJsonTemplate(text);
  } else {
    const tokens = tokenizeShell(text);
    if (tokens[0] !== "curl") {
      throw malformed("Captured request must be a curl command or a JSON template");
    }
    raw = parseCurl(tokens);
  }

  const url = assertHttpUrl(raw.url);
  const method = raw.method ?? (raw.body !== undefined ? "POST" : "GET");

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw.headers)) {
    if (!TRANSPORT_HEADERS.has(name)) headers[name] = value;
  }

  const sessionCookies = options.sessionCookies ?? DEFAULT_SESSION_COOKIES;
  const hasSessionCookie = sessionCookies.some((name) => Boolean(raw.cookies[name]));
  if (!hasSessionCookie && !headers["authorization"]) {
    throw new ReadLoopError(
      "MissingCredential",
      `Captured request carries no session credential (expected cookie ${sessionCookies.join(" or ")} or an authorization header)`
    );
  }

  return Object.freeze({
    method,
    url,
    headers: Object.freeze(headers),
    cookies: Object.freeze({ ...raw.cookies }),
    ...(raw.body !== undefined ? { body: raw.body } : {}),
  });
}

export function withCookies(
  template: RequestTemplate,
  cookies: Record<string, string>
): RequestTemplate {
  return Object.freeze({
    ...template,
    cookies: Object.freeze({ ...template.cookies, ...cookies }),
  });
}

export function cookieHeader(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}
