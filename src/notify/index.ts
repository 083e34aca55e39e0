export { ConsoleNotifier, WebhookNotifier, createNotifiers } from "./channels.js";
export type { NotifierFactoryOptions, WebhookNotifierOptions } from "./channels.js";
export { NotifierDispatcher } from "./dispatcher.js";
export type {
  ChannelName,
  DeliveryOutcome,
  DeliveryReport,
  DispatcherOptions,
  Notifier,
} from "./dispatcher.js";
export { formatSummary, TEST_MESSAGE } from "./format.js";
export type { NotificationMessage } from "./format.js";
