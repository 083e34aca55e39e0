import { aggregate, type Termination } from "./aggregate.js";
import { createReadClient, type FetchLike } from "./client.js";
import type { AppConfig } from "./config.js";
import { ReadEngine } from "./engine.js";
import { ReadLoopError, toReadLoopError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import type { DeliveryOutcome, NotifierDispatcher } from "./notify/index.js";
import { sleep as realSleep } from "./pacing.js";
import { validateSession } from "./session.js";
import { parseTemplate } from "./template.js";
import type {
  Clock,
  EngineResult,
  RandomSource,
  ReadTransport,
  RequestTemplate,
  RunSummary,
  Sleep,
  ValidationOutcome,
} from "./types.js";

export interface PipelineDeps {
  config: AppConfig;
  dispatcher: NotifierDispatcher;
  fetch?: FetchLike;
  /** Replaces the HTTP read client, e.g. in tests. */
  transport?: ReadTransport;
  sleep?: Sleep;
  random?: RandomSource;
  now?: Clock;
  logger?: Logger;
}

export interface PipelineResult {
  summary: RunSummary;
  delivery: DeliveryOutcome;
  exitCode: 0 | 1;
}

export function exitCodeFor(summary: RunSummary, maxFailedReads?: number): 0 | 1 {
  if (summary.outcome !== "Completed") return 1;
  if (maxFailedReads !== undefined && summary.totalFailed > maxFailedReads) return 1;
  return 0;
}

function terminationOf(result: EngineResult): Termination {
  return {
    state: result.state,
    ...(result.abortReason ? { abortReason: result.abortReason } : {}),
    ...(result.abortError ? { error: result.abortError } : {}),
  };
}

export async function runPipeline(deps: PipelineDeps): Promise<PipelineResult> {
  const { config, dispatcher } = deps;
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? Date.now;
  const startedAt = new Date(now());

  const finish = async (summary: RunSummary): Promise<PipelineResult> => {
    logger.info(
      `run ${summary.outcome.toLowerCase()}: ${summary.totalSucceeded}/${summary.totalAttempted} reads succeeded`
    );
    const delivery = await dispatcher.send(config.notify.channels, summary);
    if (delivery.status === "Failed") {
      logger.warn("summary notification was not delivered to every channel");
    }
    return { summary, delivery, exitCode: exitCodeFor(summary, config.maxFailedReads) };
  };

  let template: RequestTemplate;
  try {
    template = parseTemplate(config.capturedRequest, { sessionCookies: config.sessionCookies });
  } catch (error) {
    if (!(error instanceof ReadLoopError)) throw error;
    logger.error(`${error.kind}: ${error.message}`);
    const reason = error.kind === "MissingCredential" ? "MissingCredential" : "MalformedTemplate";
    return finish(
      aggregate([], startedAt, new Date(now()), {
        state: "Aborted",
        abortReason: reason,
        error: error.toRunError(),
      })
    );
  }
  logger.debug(`template ${template.method} ${template.url}`);

  const engine = new ReadEngine({
    transport:
      deps.transport ??
      createReadClient({
        fetch: deps.fetch,
        timeoutMs: config.requestTimeoutMs,
        now,
        random: deps.random,
        logger: logger.child("client"),
      }),
    config: config.run,
    sleep: deps.sleep ?? realSleep,
    random: deps.random,
    now,
    ...(config.deadlineMinutes !== undefined
      ? { deadlineAt: startedAt.getTime() + config.deadlineMinutes * 60_000 }
      : {}),
    logger: logger.child("engine"),
  });

  let validation: ValidationOutcome;
  try {
    validation = await validateSession(template, {
      fetch: deps.fetch,
      timeoutMs: config.requestTimeoutMs,
      checkUrl: config.sessionCheckUrl,
      sessionCookies: config.sessionCookies,
      logger: logger.child("session"),
    });
  } catch (error) {
    const failure = toReadLoopError(error);
    logger.error(`session check failed: ${failure.message}`);
    const result = engine.abort(new ReadLoopError("Fatal", failure.message, { cause: error }));
    return finish(aggregate(result.results, startedAt, new Date(now()), terminationOf(result)));
  }

  let result: EngineResult;
  if (validation.status === "Expired") {
    logger.error(`SessionExpired: ${validation.reason}`);
    result = engine.abort(new ReadLoopError("SessionExpired", validation.reason));
  } else if (validation.status === "Unreachable") {
    logger.warn(`session check inconclusive, reading anyway: ${validation.reason}`);
    result = await engine.run(template);
  } else {
    result = await engine.run(validation.template);
  }

  return finish(aggregate(result.results, startedAt, new Date(now()), terminationOf(result)));
}
