import { describe, expect, test } from "vitest";
import { classifyStatus, createReadClient } from "./client.js";
import { createFakeFetch, jsonResponse, READ_URL, TEMPLATE } from "./test-helpers.js";

const NOW = 1_767_225_600_000;

function clientFor(handler: Parameters<typeof createFakeFetch>[0]) {
  const fake = createFakeFetch(handler);
  const client = createReadClient({ fetch: fake.fetch, timeoutMs: 1_000, now: () => NOW, random: () => 0 });
  return { client, requests: fake.requests };
}

describe("classifyStatus", () => {
  test("maps statuses to outcomes", () => {
    expect(classifyStatus(204)).toBe("ok");
    expect(classifyStatus(401)).toBe("session");
    expect(classifyStatus(403)).toBe("session");
    expect(classifyStatus(429)).toBe("transient");
    expect(classifyStatus(502)).toBe("transient");
    expect(classifyStatus(404)).toBe("fatal");
    expect(classifyStatus(302)).toBe("fatal");
  });
});

describe("createReadClient", () => {
  test("sends the signed payload with the template's cookies", async () => {
    const { client, requests } = clientFor(() => jsonResponse({ succ: 1, synckey: 42 }));

    await expect(client.read(TEMPLATE, 1)).resolves.toEqual({ httpStatus: 200 });

    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request.url).toBe(READ_URL);
    expect(request.method).toBe("POST");
    expect(request.headers.get("cookie")).toBe("wr_skey=test-skey; wr_vid=1001");
    expect(request.headers.get("content-type")).toBe("application/json");
    expect(JSON.parse(request.body ?? "")).toMatchObject({
      appId: "app-test",
      b: "book-1",
      c: "chapter-1",
      ct: 1_767_225_600,
      ts: 1_767_225_600_000,
      rt: 30,
      rn: 0,
    });
  });

  test("passes bodies that are not read payloads through unchanged", async () => {
    const { client, requests } = clientFor(() => jsonResponse({ succ: 1, synckey: "k" }));

    await client.read({ ...TEMPLATE, body: "a=1" }, 1);

    expect(requests[0].body).toBe("a=1");
  });

  test("rejects an auth failure as an expired session", async () => {
    const { client } = clientFor(() => jsonResponse({}, 401));
    await expect(client.read(TEMPLATE, 2)).rejects.toMatchObject({ kind: "SessionExpired", httpStatus: 401 });
  });

  test("rejects server errors as transient", async () => {
    const { client } = clientFor(() => jsonResponse({}, 503));
    await expect(client.read(TEMPLATE, 2)).rejects.toMatchObject({
      kind: "Transient",
      httpStatus: 503,
      message: "Read 2 answered HTTP 503",
    });
  });

  test("rejects other client errors as fatal", async () => {
    const { client } = clientFor(() => jsonResponse({}, 404));
    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({ kind: "Fatal", httpStatus: 404 });
  });

  test("rejects a body that is not JSON as fatal", async () => {
    const { client } = clientFor(() => new Response("<html>login</html>", { status: 200 }));
    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({ kind: "Fatal" });
  });

  test("recognizes the platform's expired-login error codes", async () => {
    const { client } = clientFor(() => jsonResponse({ errCode: -2012, errMsg: "login timeout" }));
    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({ kind: "SessionExpired" });
  });

  test("rejects an unexpected response shape as fatal", async () => {
    const { client } = clientFor(() => jsonResponse({ foo: 1 }));
    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({
      kind: "Fatal",
      message: "Read 1 returned an unexpected response shape",
    });
  });

  test("treats an unaccepted read as transient", async () => {
    const { client } = clientFor(() => jsonResponse({ succ: 0 }));
    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({
      kind: "Transient",
      message: "Read 1 was not accepted (succ=0)",
    });
  });

  test("repairs a missing synckey and retries later", async () => {
    const { client, requests } = clientFor((request) =>
      request.url === READ_URL ? jsonResponse({ succ: 1 }) : jsonResponse({ data: [] })
    );

    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({ kind: "Transient" });

    expect(requests).toHaveLength(2);
    expect(requests[1].url).toBe("https://weread.qq.com/web/book/chapterInfos");
    expect(requests[1].method).toBe("POST");
    expect(requests[1].body).toBe('{"bookIds":["book-1"]}');
    expect(requests[1].headers.get("cookie")).toBe("wr_skey=test-skey; wr_vid=1001");
  });

  test("wraps network failures as transient", async () => {
    const { client } = clientFor(() => {
      throw new TypeError("fetch failed");
    });
    await expect(client.read(TEMPLATE, 1)).rejects.toMatchObject({
      kind: "Transient",
      message: `Request to ${READ_URL} failed: fetch failed`,
    });
  });
});
