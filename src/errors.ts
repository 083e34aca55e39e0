import type { ErrorKind, RunError } from "./types.js";

export class ReadLoopError extends Error {
  readonly kind: ErrorKind;
  readonly httpStatus?: number;

  constructor(
    kind: ErrorKind,
    message: string,
    options: { httpStatus?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ReadLoopError";
    this.kind = kind;
    this.httpStatus = options.httpStatus;
  }

  toRunError(index?: number): RunError {
    return {
      kind: this.kind,
      message: this.message,
      ...(index !== undefined ? { index } : {}),
      ...(this.httpStatus !== undefined ? { httpStatus: this.httpStatus } : {}),
    };
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// fetch rejects with a TypeError ("fetch failed") on connection problems and
// with a DOMException named TimeoutError/AbortError when the signal fires.
function isNetworkFailure(error: unknown): boolean {
  if (error instanceof TypeError && error.message === "fetch failed") {
    return true;
  }
  if (error instanceof Error) {
    return error.name === "TimeoutError" || error.name === "AbortError";
  }
  return false;
}

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof ReadLoopError) {
    return error.kind;
  }
  if (isNetworkFailure(error)) {
    return "Transient";
  }
  return "Fatal";
}

export function toReadLoopError(error: unknown): ReadLoopError {
  if (error instanceof ReadLoopError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ReadLoopError(classifyError(error), message, { cause: error });
}
