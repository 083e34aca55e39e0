import type { RandomSource, RunConfig, Sleep } from "./types.js";

/**
 * Delay before a read call, drawn uniformly from the configured bounds.
 * The first call of a run is never delayed; callers skip this for index 1.
 */
export function readDelayMs(
  config: Pick<RunConfig, "minDelaySeconds" | "maxDelaySeconds">,
  random: RandomSource
): number {
  const span = config.maxDelaySeconds - config.minDelaySeconds;
  return Math.round((config.minDelaySeconds + random() * span) * 1000);
}

/** Wait after failed attempt `attempt` (1-based): base * 2^(attempt - 1) seconds. */
export function backoffDelayMs(baseSeconds: number, attempt: number): number {
  return Math.round(baseSeconds * 2 ** (attempt - 1) * 1000);
}

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
