import { z } from "zod";
import {
  buildHeaders,
  classifyStatus,
  isSessionExpiredBody,
  parseJson,
  sendRequest,
  type FetchLike,
} from "./client.js";
import { ReadLoopError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { DEFAULT_SESSION_COOKIES, withCookies } from "./template.js";
import type { RequestTemplate, ValidationOutcome } from "./types.js";

export const RENEWAL_PATH = "/web/login/renewal";

const RenewalResponseSchema = z.object({ succ: z.literal(1) }).passthrough();

export interface ValidateOptions {
  fetch?: FetchLike;
  timeoutMs: number;
  checkUrl?: string;
  sessionCookies?: readonly string[];
  logger?: Logger;
}

// A cookie pair at the start of a Set-Cookie value or after a separator.
// Attributes such as Path or Expires come through too; callers filter by name.
const COOKIE_PAIR = /(?:^|[\s,;])([^=;,\s]+)=([^;,\s]*)/g;

/**
 * Pull renewed session cookies out of a (possibly comma-joined) Set-Cookie
 * header. Only names listed in `names` are picked up, compared exactly.
 */
export function renewedCookies(setCookie: string | null, names: readonly string[]): Record<string, string> {
  const renewed: Record<string, string> = {};
  if (!setCookie) return renewed;
  for (const [, name, value] of setCookie.matchAll(COOKIE_PAIR)) {
    if (value && names.includes(name) && !(name in renewed)) {
      renewed[name] = value;
    }
  }
  return renewed;
}

export function renewalUrl(template: RequestTemplate, checkUrl?: string): string {
  return checkUrl ?? new URL(RENEWAL_PATH, template.url).toString();
}

/**
 * Preflight the captured session with the platform's cookie renewal call
 * before any read budget is spent.
 */
export async function validateSession(
  template: RequestTemplate,
  options: ValidateOptions
): Promise<ValidationOutcome> {
  const logger = options.logger ?? silentLogger;
  const names = options.sessionCookies ?? DEFAULT_SESSION_COOKIES;
  const url = renewalUrl(template, options.checkUrl);
  const readPath = new URL(template.url).pathname;

  let result: Awaited<ReturnType<typeof sendRequest>>;
  try {
    result = await sendRequest(
      options.fetch ?? fetch,
      url,
      {
        method: "POST",
        headers: { ...buildHeaders(template), "content-type": "application/json" },
        body: JSON.stringify({ rq: encodeURIComponent(readPath) }),
      },
      options.timeoutMs
    );
  } catch (error) {
    if (error instanceof ReadLoopError) {
      logger.warn(`session check unreachable: ${error.message}`);
      return { status: "Unreachable", reason: error.message };
    }
    throw error;
  }

  const kind = classifyStatus(result.status);
  if (kind === "transient") {
    return { status: "Unreachable", reason: `Session check answered HTTP ${result.status}` };
  }
  if (kind !== "ok") {
    return { status: "Expired", reason: `Session check rejected with HTTP ${result.status}` };
  }

  const body = parseJson(result.text);
  if (isSessionExpiredBody(body)) {
    return { status: "Expired", reason: "Session check reported an expired login" };
  }

  const renewed = renewedCookies(result.headers.get("set-cookie"), names);
  if (Object.keys(renewed).length > 0) {
    logger.info(`session renewed (${Object.keys(renewed).join(", ")})`);
    return { status: "Valid", template: withCookies(template, renewed) };
  }
  if (RenewalResponseSchema.safeParse(body).success) {
    return { status: "Valid", template };
  }

  return { status: "Expired", reason: "Session check did not renew the session" };
}
