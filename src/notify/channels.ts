import type { FetchLike } from "../client.js";
import { ReadLoopError } from "../errors.js";
import type { Logger } from "../log.js";
import type { ChannelName, Notifier } from "./dispatcher.js";
import type { NotificationMessage } from "./format.js";

export class ConsoleNotifier implements Notifier {
  readonly channel = "console" as const;

  constructor(private readonly logger: Logger) {}

  async send(message: NotificationMessage): Promise<void> {
    this.logger.info(`${message.title}\n${message.text}`);
  }
}

export interface WebhookNotifierOptions {
  url: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/** Posts `{ title, text, summary }` as JSON; any 2xx answer counts as delivered. */
export class WebhookNotifier implements Notifier {
  readonly channel = "webhook" as const;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: WebhookNotifierOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(message: NotificationMessage): Promise<void> {
    const response = await this.fetchImpl(this.options.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(message),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
    });
    // the body is never read; release the connection
    await response.body?.cancel();
    if (!response.ok) {
      throw new ReadLoopError("NotificationFailed", `Webhook answered HTTP ${response.status}`, {
        httpStatus: response.status,
      });
    }
  }
}

export interface NotifierFactoryOptions {
  webhookUrl?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger: Logger;
}

export function createNotifiers(
  channels: readonly ChannelName[],
  options: NotifierFactoryOptions
): Notifier[] {
  return channels.flatMap((channel): Notifier[] => {
    switch (channel) {
      case "console":
        return [new ConsoleNotifier(options.logger.child("notify"))];
      case "webhook":
        return options.webhookUrl
          ? [new WebhookNotifier({ url: options.webhookUrl, fetch: options.fetch, timeoutMs: options.timeoutMs })]
          : [];
    }
  });
}
