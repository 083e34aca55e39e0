import { describe, expect, test } from "vitest";
import type { AppConfig } from "./config.js";
import { ReadLoopError } from "./errors.js";
import { NotifierDispatcher } from "./notify/index.js";
import { exitCodeFor, runPipeline } from "./run.js";
import {
  createFakeFetch,
  jsonResponse,
  READ_URL,
  RecordingNotifier,
  scriptedTransport,
  type Step,
} from "./test-helpers.js";
import type { RunSummary } from "./types.js";

const NOW = Date.parse("2026-01-01T00:00:00.000Z");
const RENEWAL_URL = "https://weread.qq.com/web/login/renewal";

const CAPTURED = [
  `curl '${READ_URL}'`,
  "-H 'content-type: application/json'",
  "-b 'wr_skey=test-skey; wr_vid=1001'",
  `--data-raw '{"appId":"app-test","b":"book-1","c":"chapter-1"}'`,
].join(" ");

function appConfig(overrides: Partial<AppConfig> = {}, readCount = 3): AppConfig {
  return {
    capturedRequest: CAPTURED,
    run: { readCount, minDelaySeconds: 25, maxDelaySeconds: 35, maxRetriesPerCall: 2, retryBackoffBase: 1 },
    requestTimeoutMs: 1_000,
    sessionCookies: ["wr_skey"],
    notify: { channels: ["console"] },
    logLevel: "info",
    testNotify: false,
    ...overrides,
  };
}

function setup(options: {
  config?: AppConfig;
  renewal?: () => Response;
  script?: (index: number, attempt: number) => Step;
  notifierFailures?: number;
}) {
  const notifier = new RecordingNotifier("console", options.notifierFailures ?? 0);
  const dispatcher = new NotifierDispatcher([notifier], { sleep: async () => {} });
  const fake = createFakeFetch(options.renewal ?? (() => jsonResponse({ succ: 1 })));
  const scripted = scriptedTransport(options.script ?? (() => "ok"));
  const run = () =>
    runPipeline({
      config: options.config ?? appConfig(),
      dispatcher,
      fetch: fake.fetch,
      transport: scripted.transport,
      sleep: async () => {},
      random: () => 0,
      now: () => NOW,
    });
  return { run, notifier, requests: fake.requests, calls: scripted.calls };
}

describe("runPipeline", () => {
  test("runs every read and reports success", async () => {
    const { run, notifier, calls } = setup({});

    const { summary, exitCode, delivery } = await run();

    expect(summary).toMatchObject({ outcome: "Completed", totalAttempted: 3, totalSucceeded: 3, totalFailed: 0 });
    expect(exitCode).toBe(0);
    expect(delivery.status).toBe("Delivered");
    expect(calls).toHaveLength(3);
    expect(notifier.messages.map((message) => message.title)).toEqual(["Read run completed"]);
  });

  test("an expired session makes no reads but still notifies", async () => {
    const { run, notifier, calls } = setup({ renewal: () => jsonResponse({}, 401) });

    const { summary, exitCode } = await run();

    expect(calls).toHaveLength(0);
    expect(summary).toMatchObject({
      outcome: "Aborted",
      abortReason: "SessionExpired",
      totalAttempted: 0,
      firstError: { kind: "SessionExpired", message: "Session check rejected with HTTP 401" },
    });
    expect(exitCode).toBe(1);
    expect(notifier.messages.map((message) => message.title)).toEqual(["Read run aborted (SessionExpired)"]);
  });

  test("a fatal read stops the run", async () => {
    const { run } = setup({
      config: appConfig({}, 10),
      script: (index) => (index === 4 ? new ReadLoopError("Fatal", "unexpected body") : "ok"),
    });

    const { summary, exitCode } = await run();

    expect(summary).toMatchObject({
      outcome: "Aborted",
      abortReason: "Fatal",
      totalAttempted: 4,
      totalSucceeded: 3,
      totalFailed: 1,
      lastError: { kind: "Fatal", message: "unexpected body", index: 4 },
    });
    expect(exitCode).toBe(1);
  });

  test("a read that keeps timing out is counted and the run completes", async () => {
    const script = (index: number): Step =>
      index === 3 ? new ReadLoopError("Transient", "Read 3 timed out") : "ok";
    const { run } = setup({ config: appConfig({}, 5), script });

    const { summary, exitCode } = await run();

    expect(summary).toMatchObject({ outcome: "Completed", totalAttempted: 5, totalSucceeded: 4, totalFailed: 1 });
    expect(exitCode).toBe(0);

    const strict = setup({ config: appConfig({ maxFailedReads: 0 }, 5), script });
    expect((await strict.run()).exitCode).toBe(1);
  });

  test("a malformed capture is reported without any request", async () => {
    const { run, notifier, requests, calls } = setup({
      config: appConfig({ capturedRequest: "wget https://weread.qq.com" }),
    });

    const { summary, exitCode } = await run();

    expect(summary).toMatchObject({
      outcome: "Aborted",
      abortReason: "MalformedTemplate",
      totalAttempted: 0,
      firstError: { kind: "MalformedTemplate" },
    });
    expect(exitCode).toBe(1);
    expect(requests).toHaveLength(0);
    expect(calls).toHaveLength(0);
    expect(notifier.messages).toHaveLength(1);
  });

  test("a capture without credentials aborts as MissingCredential", async () => {
    const { run } = setup({
      config: appConfig({ capturedRequest: `curl '${READ_URL}' -b 'wr_vid=1001'` }),
    });

    const { summary } = await run();

    expect(summary.abortReason).toBe("MissingCredential");
  });

  test("session cookie names with pattern characters still run and notify", async () => {
    const { run, notifier, calls } = setup({
      config: appConfig({ sessionCookies: ["wr_skey", "a++"] }),
      renewal: () => jsonResponse({ succ: 1 }, 200, { "set-cookie": "a++=renewed; Path=/" }),
    });

    const { summary, exitCode } = await run();

    expect(summary.outcome).toBe("Completed");
    expect(exitCode).toBe(0);
    expect(calls).toHaveLength(3);
    expect(notifier.messages).toHaveLength(1);
  });

  test("reads anyway when the session check is unreachable", async () => {
    const { run, calls } = setup({
      renewal: () => {
        throw new TypeError("fetch failed");
      },
    });

    const { summary } = await run();

    expect(summary.outcome).toBe("Completed");
    expect(calls).toHaveLength(3);
  });

  test("a failed notification does not change the exit code", async () => {
    const { run } = setup({ notifierFailures: 10 });

    const { exitCode, delivery } = await run();

    expect(exitCode).toBe(0);
    expect(delivery.status).toBe("Failed");
    expect(delivery.reports[0].attempts).toBe(3);
  });

  test("reads through the HTTP client with renewed cookies", async () => {
    const notifier = new RecordingNotifier();
    const fake = createFakeFetch((request) =>
      request.url === RENEWAL_URL
        ? jsonResponse({ succ: 1 }, 200, { "set-cookie": "wr_skey=renewed-skey; Path=/" })
        : jsonResponse({ succ: 1, synckey: 7 })
    );

    const { summary } = await runPipeline({
      config: appConfig({}, 2),
      dispatcher: new NotifierDispatcher([notifier]),
      fetch: fake.fetch,
      sleep: async () => {},
      random: () => 0,
      now: () => NOW,
    });

    expect(summary.totalSucceeded).toBe(2);
    expect(fake.requests.map((request) => request.url)).toEqual([RENEWAL_URL, READ_URL, READ_URL]);
    expect(fake.requests[1].headers.get("cookie")).toBe("wr_skey=renewed-skey; wr_vid=1001");
  });
});

describe("exitCodeFor", () => {
  const summary: RunSummary = {
    outcome: "Completed",
    totalAttempted: 4,
    totalSucceeded: 2,
    totalFailed: 2,
    successRate: 50,
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:00.000Z",
    durationSeconds: 0,
  };

  test("succeeds for a completed run within the failure tolerance", () => {
    expect(exitCodeFor(summary)).toBe(0);
    expect(exitCodeFor(summary, 2)).toBe(0);
    expect(exitCodeFor(summary, 1)).toBe(1);
    expect(exitCodeFor({ ...summary, outcome: "Aborted" })).toBe(1);
  });
});
