import { describe, expect, test } from "vitest";
import { createLogger } from "../log.js";
import { createFakeFetch, jsonResponse } from "../test-helpers.js";
import { ConsoleNotifier, createNotifiers, WebhookNotifier } from "./channels.js";

const MESSAGE = { title: "Read run completed", text: "Attempted: 1" };

describe("ConsoleNotifier", () => {
  test("logs the title and text", async () => {
    const lines: string[] = [];
    const logger = createLogger({
      sink: { log: (line: string) => lines.push(line), warn: () => {}, error: () => {} },
    });

    await new ConsoleNotifier(logger).send(MESSAGE);

    expect(lines).toEqual(["[read-loop] Read run completed\nAttempted: 1"]);
  });
});

describe("WebhookNotifier", () => {
  test("posts the message as JSON", async () => {
    const fake = createFakeFetch(() => new Response(null, { status: 204 }));
    const notifier = new WebhookNotifier({ url: "https://hooks.example.com/run", fetch: fake.fetch });

    await notifier.send(MESSAGE);

    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0].url).toBe("https://hooks.example.com/run");
    expect(fake.requests[0].method).toBe("POST");
    expect(fake.requests[0].headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(fake.requests[0].body ?? "")).toEqual(MESSAGE);
  });

  test("releases the response body", async () => {
    const response = new Response("accepted", { status: 200 });
    const fake = createFakeFetch(() => response);
    const notifier = new WebhookNotifier({ url: "https://hooks.example.com/run", fetch: fake.fetch });

    await notifier.send(MESSAGE);

    expect(response.bodyUsed).toBe(true);
  });

  test("rejects a non-2xx answer", async () => {
    const fake = createFakeFetch(() => jsonResponse({ error: "nope" }, 500));
    const notifier = new WebhookNotifier({ url: "https://hooks.example.com/run", fetch: fake.fetch });

    await expect(notifier.send(MESSAGE)).rejects.toMatchObject({
      kind: "NotificationFailed",
      httpStatus: 500,
    });
  });
});

describe("createNotifiers", () => {
  test("builds one notifier per usable channel", () => {
    const logger = createLogger();
    expect(
      createNotifiers(["console", "webhook"], { webhookUrl: "https://hooks.example.com/run", logger }).map(
        (notifier) => notifier.channel
      )
    ).toEqual(["console", "webhook"]);
    expect(createNotifiers(["webhook"], { logger })).toEqual([]);
  });
});
