export type ErrorKind =
  | "MalformedTemplate"
  | "MissingCredential"
  | "SessionExpired"
  | "Transient"
  | "Fatal"
  | "NotificationFailed";

export type EngineState = "Idle" | "Running" | "Completed" | "Aborted";

export type AbortReason =
  | "MalformedTemplate"
  | "MissingCredential"
  | "SessionExpired"
  | "Fatal"
  | "DeadlineExceeded";

export interface RequestTemplate {
  readonly method: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cookies: Readonly<Record<string, string>>;
  readonly body?: string;
}

export interface RunConfig {
  readCount: number;
  minDelaySeconds: number;
  maxDelaySeconds: number;
  maxRetriesPerCall: number;
  retryBackoffBase: number;
}

export interface CallResult {
  index: number;
  succeeded: boolean;
  attempts: number;
  latencyMs: number;
  httpStatus?: number;
  errorKind?: ErrorKind;
  errorMessage?: string;
}

export interface RunError {
  kind: ErrorKind;
  message: string;
  index?: number;
  httpStatus?: number;
}

export interface RunSummary {
  outcome: "Completed" | "Aborted";
  abortReason?: AbortReason;
  totalAttempted: number;
  totalSucceeded: number;
  totalFailed: number;
  successRate: number;
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
  firstError?: RunError;
  lastError?: RunError;
}

export type ValidationOutcome =
  | { status: "Valid"; template: RequestTemplate }
  | { status: "Expired"; reason: string }
  | { status: "Unreachable"; reason: string };

export interface ReadResponse {
  httpStatus: number;
}

export interface ReadTransport {
  read(template: RequestTemplate, index: number): Promise<ReadResponse>;
}

export interface EngineResult {
  state: "Completed" | "Aborted";
  results: CallResult[];
  abortReason?: AbortReason;
  abortError?: RunError;
}

export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;
export type Clock = () => number;
