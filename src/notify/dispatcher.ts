import { silentLogger, type Logger } from "../log.js";
import { backoffDelayMs, sleep as realSleep } from "../pacing.js";
import type { RunSummary, Sleep } from "../types.js";
import { formatSummary, TEST_MESSAGE, type NotificationMessage } from "./format.js";

export type ChannelName = "console" | "webhook";

export interface Notifier {
  readonly channel: ChannelName;
  /** Resolves once the channel accepted the message; rejects otherwise. */
  send(message: NotificationMessage): Promise<void>;
}

export interface DeliveryReport {
  channel: ChannelName;
  status: "Delivered" | "Failed";
  attempts: number;
  error?: string;
}

export interface DeliveryOutcome {
  status: "Delivered" | "Failed";
  reports: DeliveryReport[];
}

export interface DispatcherOptions {
  retries?: number;
  backoffSeconds?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Delivers run summaries to the configured channels. Delivery problems are
 * reported and logged, never thrown: a failed notification is not a failed run.
 */
export class NotifierDispatcher {
  private readonly notifiers: Map<ChannelName, Notifier>;
  private readonly retries: number;
  private readonly backoffSeconds: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(notifiers: Notifier[], options: DispatcherOptions = {}) {
    this.notifiers = new Map(notifiers.map((notifier) => [notifier.channel, notifier]));
    this.retries = options.retries ?? 2;
    this.backoffSeconds = options.backoffSeconds ?? 1;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.logger ?? silentLogger;
  }

  async send(selection: readonly ChannelName[], summary: RunSummary): Promise<DeliveryOutcome> {
    return this.deliver(selection, formatSummary(summary));
  }

  async test(selection: readonly ChannelName[]): Promise<DeliveryOutcome> {
    return this.deliver(selection, TEST_MESSAGE);
  }

  private async deliver(
    selection: readonly ChannelName[],
    message: NotificationMessage
  ): Promise<DeliveryOutcome> {
    const reports: DeliveryReport[] = [];
    for (const channel of selection) {
      reports.push(await this.deliverTo(channel, message));
    }
    const failed = reports.some((report) => report.status === "Failed");
    return { status: failed ? "Failed" : "Delivered", reports };
  }

  private async deliverTo(channel: ChannelName, message: NotificationMessage): Promise<DeliveryReport> {
    const notifier = this.notifiers.get(channel);
    if (!notifier) {
      this.logger.error(`NotificationFailed: channel ${channel} is not configured`);
      return { channel, status: "Failed", attempts: 0, error: "channel not configured" };
    }

    const maxAttempts = this.retries + 1;
    let lastError = "";
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await notifier.send(message);
        this.logger.info(`notification delivered via ${channel}`);
        return { channel, status: "Delivered", attempts: attempt };
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        this.logger.warn(`notification via ${channel} failed (attempt ${attempt}/${maxAttempts}): ${lastError}`);
        if (attempt < maxAttempts) {
          await this.sleep(backoffDelayMs(this.backoffSeconds, attempt));
        }
      }
    }

    this.logger.error(`NotificationFailed: ${channel} gave up after ${maxAttempts} attempts`);
    return { channel, status: "Failed", attempts: maxAttempts, error: lastError };
  }
}
