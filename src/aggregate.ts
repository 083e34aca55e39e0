import type { AbortReason, CallResult, RunError, RunSummary } from "./types.js";

export interface Termination {
  state: "Completed" | "Aborted";
  abortReason?: AbortReason;
  /** An error no call result carries, e.g. a preflight rejection. */
  error?: RunError;
}

function callError(result: CallResult): RunError {
  return {
    kind: result.errorKind ?? "Fatal",
    message: result.errorMessage ?? "Read failed",
    index: result.index,
    ...(result.httpStatus !== undefined ? { httpStatus: result.httpStatus } : {}),
  };
}

const sameError = (a: RunError, b: RunError) =>
  a.kind === b.kind && a.message === b.message && a.index === b.index;

export function aggregate(
  results: readonly CallResult[],
  startedAt: Date,
  finishedAt: Date,
  termination: Termination = { state: "Completed" }
): RunSummary {
  const totalSucceeded = results.filter((result) => result.succeeded).length;
  const totalAttempted = results.length;
  const totalFailed = totalAttempted - totalSucceeded;

  const errors = results.filter((result) => !result.succeeded).map(callError);
  const extra = termination.error;
  if (extra && !errors.some((error) => sameError(error, extra))) {
    errors.push(extra);
  }

  const successRate =
    totalAttempted === 0 ? 0 : Math.round((totalSucceeded / totalAttempted) * 1000) / 10;

  return {
    outcome: termination.state,
    ...(termination.abortReason ? { abortReason: termination.abortReason } : {}),
    totalAttempted,
    totalSucceeded,
    totalFailed,
    successRate,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationSeconds: Math.max(0, finishedAt.getTime() - startedAt.getTime()) / 1000,
    ...(errors.length > 0 ? { firstError: errors[0], lastError: errors[errors.length - 1] } : {}),
  };
}
