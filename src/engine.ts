import { classifyError, ReadLoopError, toReadLoopError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { createEngineActor, snapshotState } from "./machine.js";
import { backoffDelayMs, readDelayMs, sleep as realSleep } from "./pacing.js";
import type {
  AbortReason,
  CallResult,
  Clock,
  EngineResult,
  EngineState,
  RandomSource,
  ReadTransport,
  RequestTemplate,
  RunConfig,
  RunError,
  Sleep,
} from "./types.js";

export interface ReadEngineOptions {
  transport: ReadTransport;
  config: RunConfig;
  sleep?: Sleep;
  random?: RandomSource;
  now?: Clock;
  /** Epoch ms after which no new iteration starts. */
  deadlineAt?: number;
  logger?: Logger;
}

function abortReasonFor(error: ReadLoopError): AbortReason {
  switch (error.kind) {
    case "SessionExpired":
    case "MalformedTemplate":
    case "MissingCredential":
      return error.kind;
    default:
      return "Fatal";
  }
}

/**
 * Replays the read call `readCount` times, one at a time, with randomized
 * pacing and per-call retry. One engine instance runs at most once.
 */
export class ReadEngine {
  private readonly actor = createEngineActor();
  private readonly transport: ReadTransport;
  private readonly config: RunConfig;
  private readonly sleep: Sleep;
  private readonly random: RandomSource;
  private readonly now: Clock;
  private readonly deadlineAt?: number;
  private readonly logger: Logger;
  private readonly results: CallResult[] = [];

  constructor(options: ReadEngineOptions) {
    this.transport = options.transport;
    this.config = options.config;
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.deadlineAt = options.deadlineAt;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): EngineState {
    return snapshotState(this.actor.getSnapshot());
  }

  /** Terminate an engine that has not started, without making any call. */
  abort(error: ReadLoopError): EngineResult {
    if (this.state !== "Idle") {
      throw new Error(`Cannot abort engine in state ${this.state}`);
    }
    this.actor.send({ type: "ABORT", reason: abortReasonFor(error), error: error.toRunError() });
    return this.result();
  }

  async run(template: RequestTemplate): Promise<EngineResult> {
    if (this.state !== "Idle") {
      throw new Error(`Engine already ran (state ${this.state}); create a new engine for a new run`);
    }
    this.actor.send({ type: "START" });
    const { readCount } = this.config;
    this.logger.info(`starting ${readCount} reads`);

    for (let index = 1; index <= readCount; index++) {
      if (this.deadlinePassed()) {
        return this.stopAtDeadline(index);
      }

      if (index > 1) {
        const delay = readDelayMs(this.config, this.random);
        this.logger.debug(`waiting ${delay}ms before read ${index}`);
        await this.sleep(delay);
        if (this.deadlinePassed()) {
          return this.stopAtDeadline(index);
        }
      }

      const { result, error } = await this.iterate(template, index);
      this.results.push(result);
      this.actor.send({ type: "ITERATION_DONE" });

      if (result.succeeded) {
        this.logger.info(`read ${index}/${readCount} ok`);
        continue;
      }
      if (error && error.kind !== "Transient") {
        this.logger.error(`read ${index}/${readCount} failed fatally (${error.kind}): ${error.message}`);
        this.actor.send({
          type: "ABORT",
          reason: abortReasonFor(error),
          error: error.toRunError(index),
        });
        return this.result();
      }
      this.logger.warn(`read ${index}/${readCount} failed after ${result.attempts} attempts: ${result.errorMessage}`);
    }

    this.actor.send({ type: "FINISH" });
    this.logger.info(`completed ${this.results.length} reads`);
    return this.result();
  }

  private deadlinePassed(): boolean {
    return this.deadlineAt !== undefined && this.now() >= this.deadlineAt;
  }

  private stopAtDeadline(index: number): EngineResult {
    this.logger.warn(`deadline reached before read ${index}, stopping`);
    this.actor.send({ type: "ABORT", reason: "DeadlineExceeded" });
    return this.result();
  }

  private async iterate(
    template: RequestTemplate,
    index: number
  ): Promise<{ result: CallResult; error?: ReadLoopError }> {
    const maxAttempts = this.config.maxRetriesPerCall + 1;

    for (let attempt = 1; ; attempt++) {
      const startedAt = this.now();
      try {
        const response = await this.transport.read(template, index);
        return {
          result: {
            index,
            succeeded: true,
            attempts: attempt,
            latencyMs: this.now() - startedAt,
            httpStatus: response.httpStatus,
          },
        };
      } catch (caught) {
        const latencyMs = this.now() - startedAt;
        const error = toReadLoopError(caught);
        const kind = classifyError(error);

        if (kind === "Transient" && attempt < maxAttempts) {
          const delay = backoffDelayMs(this.config.retryBackoffBase, attempt);
          this.logger.debug(`read ${index} attempt ${attempt} failed (${error.message}), retrying in ${delay}ms`);
          await this.sleep(delay);
          continue;
        }

        return {
          result: {
            index,
            succeeded: false,
            attempts: attempt,
            latencyMs,
            errorKind: kind,
            errorMessage: error.message,
            ...(error.httpStatus !== undefined ? { httpStatus: error.httpStatus } : {}),
          },
          error,
        };
      }
    }
  }

  private result(): EngineResult {
    const snapshot = this.actor.getSnapshot();
    const state = snapshotState(snapshot);
    if (state !== "Completed" && state !== "Aborted") {
      throw new Error(`Engine has not terminated (state ${state})`);
    }
    if (snapshot.context.completedIterations !== this.results.length) {
      throw new Error(
        `Engine recorded ${snapshot.context.completedIterations} iterations but holds ${this.results.length} results`
      );
    }
    const abortError: RunError | null = snapshot.context.abortError;
    return {
      state,
      results: [...this.results],
      ...(snapshot.context.abortReason ? { abortReason: snapshot.context.abortReason } : {}),
      ...(abortError ? { abortError } : {}),
    };
  }
}
