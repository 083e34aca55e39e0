import type { RunError, RunSummary } from "../types.js";

export interface NotificationMessage {
  title: string;
  text: string;
  summary?: RunSummary;
}

function describeError(error: RunError): string {
  const where = error.index !== undefined ? ` at read ${error.index}` : "";
  const status = error.httpStatus !== undefined ? ` (HTTP ${error.httpStatus})` : "";
  return `${error.kind}${where}${status}: ${error.message}`;
}

export function formatSummary(summary: RunSummary): NotificationMessage {
  const title =
    summary.outcome === "Completed"
      ? "Read run completed"
      : `Read run aborted (${summary.abortReason ?? "unknown"})`;

  const lines = [
    `Attempted: ${summary.totalAttempted}`,
    `Succeeded: ${summary.totalSucceeded}`,
    `Failed: ${summary.totalFailed}`,
    `Success rate: ${summary.successRate}%`,
    `Duration: ${summary.durationSeconds.toFixed(1)}s`,
  ];
  if (summary.firstError) {
    lines.push(`First error: ${describeError(summary.firstError)}`);
  }
  if (summary.lastError && summary.lastError !== summary.firstError) {
    lines.push(`Last error: ${describeError(summary.lastError)}`);
  }

  return { title, text: lines.join("\n"), summary };
}

export const TEST_MESSAGE: NotificationMessage = {
  title: "read-loop notification test",
  text: "This is a test message confirming the notification channel works.",
};
