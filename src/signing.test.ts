import { createHash } from "node:crypto";
import { describe, expect, test } from "vitest";
import {
  encodePayload,
  isReadPayload,
  rollingHash,
  signature,
  signReadPayload,
} from "./signing.js";

describe("encodePayload", () => {
  test("sorts keys and percent-encodes strictly", () => {
    expect(encodePayload({ b: "x y", a: 1, c: "it's!" })).toBe("a=1&b=x%20y&c=it%27s%21");
  });
});

describe("rollingHash", () => {
  test("starts from the seed for empty input", () => {
    expect(rollingHash("")).toBe("2a0a2a0a");
  });

  test("folds character pairs into the accumulators", () => {
    expect(rollingHash("ab")).toBe("2a0a2b88");
  });
});

describe("signature", () => {
  test("is a sha256 hex digest over timestamp, random number and salt", () => {
    const value = signature(1000, 5);
    expect(value).toMatch(/^[0-9a-f]{64}$/);
    expect(value).toBe(
      createHash("sha256").update("100053c5c8717f3daf09iop3423zafeqoi").digest("hex")
    );
  });
});

describe("isReadPayload", () => {
  test("requires a flat object with app, book and chapter", () => {
    expect(isReadPayload({ appId: "a", b: "b", c: "c", pr: 3 })).toBe(true);
    expect(isReadPayload({ appId: "a", b: "b" })).toBe(false);
    expect(isReadPayload({ appId: "a", b: "b", c: { nested: true } })).toBe(false);
    expect(isReadPayload(["appId", "b", "c"])).toBe(false);
    expect(isReadPayload(null)).toBe(false);
  });
});

describe("signReadPayload", () => {
  test("stamps fresh timing fields and signatures", () => {
    const signed = signReadPayload(
      { appId: "app", b: "bk", c: "ch", s: "stale" },
      { nowMs: 1_700_000_000_500, lastReadAtSeconds: 1_699_999_970, random: () => 0.5 }
    );

    const expectedBase = {
      appId: "app",
      b: "bk",
      c: "ch",
      ct: 1_700_000_000,
      ts: 1_700_000_000_500,
      rt: 30,
      rn: 500,
      sg: signature(1_700_000_000_500, 500),
    };
    expect(signed).toEqual({ ...expectedBase, s: rollingHash(encodePayload(expectedBase)) });
    expect(signed.s).not.toBe("stale");
  });
});
