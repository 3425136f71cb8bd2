export { NotificationService } from './NotificationService.js';
export { TelegramClient } from './TelegramClient.js';
export {
  NO_NEW_STATUSES_MESSAGE,
  formatStatusChangeMessage,
  formatFailureMessage,
} from './formatter.js';
export type {
  TelegramClientConfig,
  TelegramTransport,
  Notifier,
  DeliveryResult,
  DeliveryFailureKind,
} from './types.js';
