import { z } from "zod";
import { ReadLoopError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { isReadPayload, signReadPayload, type ReadPayload } from "./signing.js";
import { cookieHeader } from "./template.js";
import type {
  Clock,
  RandomSource,
  ReadResponse,
  ReadTransport,
  RequestTemplate,
} from "./types.js";

// errCode values the platform returns once the login behind a cookie is gone.
export const SESSION_EXPIRED_CODES = [-2012, -2010];

export const ReadResponseSchema = z
  .object({
    succ: z.number(),
    synckey: z.union([z.number(), z.string()]).optional(),
    errCode: z.number().optional(),
    errMsg: z.string().optional(),
  })
  .passthrough();

const ErrorEnvelopeSchema = z.object({ errCode: z.number(), errMsg: z.string().optional() });

export type FetchLike = typeof fetch;

export interface ReadClientOptions {
  fetch?: FetchLike;
  timeoutMs: number;
  now?: Clock;
  random?: RandomSource;
  logger?: Logger;
}

export function buildHeaders(template: RequestTemplate): Record<string, string> {
  const headers: Record<string, string> = { ...template.headers };
  const cookie = cookieHeader(template.cookies);
  if (cookie) headers["cookie"] = cookie;
  return headers;
}

export function isSessionExpiredBody(body: unknown): boolean {
  const parsed = ErrorEnvelopeSchema.safeParse(body);
  return parsed.success && SESSION_EXPIRED_CODES.includes(parsed.data.errCode);
}

export function classifyStatus(status: number): "ok" | "session" | "transient" | "fatal" {
  if (status >= 200 && status < 300) return "ok";
  if (status === 401 || status === 403) return "session";
  if (status === 429 || status >= 500) return "transient";
  return "fatal";
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export async function sendRequest(
  fetchImpl: FetchLike,
  url: string,
  init: { method: string; headers: Record<string, string>; body?: string },
  timeoutMs: number
): Promise<{ status: number; text: string; headers: Headers }> {
  try {
    const response = await fetchImpl(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
    return { status: response.status, text: await response.text(), headers: response.headers };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReadLoopError("Transient", `Request to ${url} failed: ${reason}`, { cause: error });
  }
}

/**
 * Transport for the platform's read endpoint. Re-signs the captured payload
 * for every call and classifies each response into the run's error taxonomy.
 */
export function createReadClient(options: ReadClientOptions): ReadTransport {
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? Date.now;
  const random = options.random ?? Math.random;
  const logger = options.logger ?? silentLogger;

  let lastReadAtSeconds = Math.floor(now() / 1000) - 30;

  const prepareBody = (template: RequestTemplate): { body?: string; payload?: ReadPayload } => {
    if (template.body === undefined) return {};
    const parsed = parseJson(template.body);
    if (!isReadPayload(parsed)) return { body: template.body };
    const payload = signReadPayload(parsed, { nowMs: now(), lastReadAtSeconds, random });
    return { body: JSON.stringify(payload), payload };
  };

  const repairSynckey = async (template: RequestTemplate, payload: ReadPayload | undefined) => {
    if (!payload) return;
    const url = new URL("/web/book/chapterInfos", template.url).toString();
    try {
      const result = await sendRequest(
        fetchImpl,
        url,
        {
          method: "POST",
          headers: { ...buildHeaders(template), "content-type": "application/json" },
          body: JSON.stringify({ bookIds: [String(payload.b)] }),
        },
        options.timeoutMs
      );
      logger.debug(`synckey repair answered HTTP ${result.status}`);
    } catch (error) {
      logger.warn(`synckey repair failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  return {
    async read(template, index): Promise<ReadResponse> {
      const { body, payload } = prepareBody(template);
      const result = await sendRequest(
        fetchImpl,
        template.url,
        { method: template.method, headers: buildHeaders(template), body },
        options.timeoutMs
      );

      const status = result.status;
      const kind = classifyStatus(status);
      if (kind === "session") {
        throw new ReadLoopError("SessionExpired", `Read ${index} rejected with HTTP ${status}`, { httpStatus: status });
      }
      if (kind === "transient") {
        throw new ReadLoopError("Transient", `Read ${index} answered HTTP ${status}`, { httpStatus: status });
      }
      if (kind === "fatal") {
        throw new ReadLoopError("Fatal", `Read ${index} answered unexpected HTTP ${status}`, { httpStatus: status });
      }

      const json = parseJson(result.text);
      if (json === undefined) {
        throw new ReadLoopError("Fatal", `Read ${index} returned a body that is not JSON`, { httpStatus: status });
      }
      if (isSessionExpiredBody(json)) {
        throw new ReadLoopError("SessionExpired", `Read ${index} reported an expired session`, { httpStatus: status });
      }
      const parsed = ReadResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new ReadLoopError("Fatal", `Read ${index} returned an unexpected response shape`, { httpStatus: status });
      }
      if (parsed.data.succ !== 1) {
        throw new ReadLoopError("Transient", `Read ${index} was not accepted (succ=${parsed.data.succ})`, { httpStatus: status });
      }
      if (parsed.data.synckey === undefined) {
        await repairSynckey(template, payload);
        throw new ReadLoopError("Transient", `Read ${index} response is missing synckey`, { httpStatus: status });
      }

      lastReadAtSeconds = Math.floor(now() / 1000);
      return { httpStatus: status };
    },
  };
}
