import { createHash } from "node:crypto";
import type { RandomSource } from "./types.js";

// Fixed salt the reading platform's web client mixes into the `sg` field.
const SIGNATURE_SALT = "3c5c8717f3daf09iop3423zafeqoi";

export type ReadPayload = Record<string, string | number>;

export interface SignContext {
  nowMs: number;
  lastReadAtSeconds: number;
  random: RandomSource;
}

/** Percent-encode like a strict RFC 3986 encoder: only unreserved chars survive. */
function encodeValue(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function encodePayload(payload: ReadPayload): string {
  return Object.keys(payload)
    .sort()
    .map((key) => `${key}=${encodeValue(String(payload[key]))}`)
    .join("&");
}

/**
 * Rolling hash the platform expects in `s`. Walks the string from the end
 * two characters at a time, folding each into one of two 31-bit accumulators.
 */
export function rollingHash(input: string): string {
  let high = 0x15051505;
  let low = high;
  const length = input.length;

  for (let i = length - 1; i > 0; i -= 2) {
    high = 0x7fffffff & (high ^ (input.charCodeAt(i) << (length - i) % 30));
    low = 0x7fffffff & (low ^ (input.charCodeAt(i - 1) << i % 30));
  }

  return (high + low).toString(16).toLowerCase();
}

export function signature(timestampMs: number, randomNumber: number): string {
  return createHash("sha256")
    .update(`${timestampMs}${randomNumber}${SIGNATURE_SALT}`)
    .digest("hex");
}

const randomInt = (random: RandomSource, max: number) =>
  Math.floor(random() * (max + 1));

/** Payloads of the platform's read endpoint carry an app id plus book and chapter. */
export function isReadPayload(value: unknown): value is ReadPayload {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const entries = Object.entries(value);
  const flat = entries.every(
    ([, field]) => typeof field === "string" || typeof field === "number"
  );
  return flat && "appId" in value && "b" in value && "c" in value;
}

export function signReadPayload(base: ReadPayload, context: SignContext): ReadPayload {
  const { s: _previous, ...payload } = base;
  const ct = Math.floor(context.nowMs / 1000);
  const ts = ct * 1000 + randomInt(context.random, 1000);
  const rn = randomInt(context.random, 1000);

  const signed: ReadPayload = {
    ...payload,
    ct,
    ts,
    rt: ct - context.lastReadAtSeconds,
    rn,
    sg: signature(ts, rn),
  };

  return { ...signed, s: rollingHash(encodePayload(signed)) };
}
