import type { FetchLike } from "./client.js";
import type { ChannelName, Notifier, NotificationMessage } from "./notify/index.js";
import type { ReadTransport, RequestTemplate, Sleep } from "./types.js";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
}

export function createFakeFetch(
  handler: (request: RecordedRequest) => Response | Promise<Response>
) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url =
      typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const request: RecordedRequest = {
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    requests.push(request);
    return handler(request);
  };
  return { fetch: fetchImpl, requests };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export const READ_URL = "https://weread.qq.com/web/book/read";

export const TEMPLATE: RequestTemplate = Object.freeze({
  method: "POST",
  url: READ_URL,
  headers: Object.freeze({ "content-type": "application/json" }),
  cookies: Object.freeze({ wr_skey: "test-skey", wr_vid: "1001" }),
  body: JSON.stringify({ appId: "app-test", b: "book-1", c: "chapter-1" }),
});

export type Step = "ok" | Error;

/** Read transport whose outcome per (index, attempt) is decided by `script`. */
export function scriptedTransport(script: (index: number, attempt: number) => Step) {
  const calls: Array<{ index: number; attempt: number }> = [];
  const attempts = new Map<number, number>();
  const transport: ReadTransport = {
    async read(_template, index) {
      const attempt = (attempts.get(index) ?? 0) + 1;
      attempts.set(index, attempt);
      calls.push({ index, attempt });
      const step = script(index, attempt);
      if (step === "ok") return { httpStatus: 200 };
      throw step;
    },
  };
  return { transport, calls };
}

export function recordingSleep() {
  const sleeps: number[] = [];
  const sleep: Sleep = async (ms) => {
    sleeps.push(ms);
  };
  return { sleep, sleeps };
}

export class RecordingNotifier implements Notifier {
  readonly messages: NotificationMessage[] = [];
  private remainingFailures: number;

  constructor(
    readonly channel: ChannelName = "console",
    failures = 0
  ) {
    this.remainingFailures = failures;
  }

  async send(message: NotificationMessage): Promise<void> {
    if (this.remainingFailures > 0) {
      this.remainingFailures--;
      throw new Error(`${this.channel} unavailable`);
    }
    this.messages.push(message);
  }
}
