export { AlertCoordinator } from './coordinator';
export type { AlertCoordinatorOptions } from './coordinator';
export { AlertState } from './alert-state';
export { sessionDedup, candleDedup, getDedupPolicy } from './dedup';
export { formatAlertMessage, truncateMessage } from './message';
export {
  createChannels, TelegramChannel, DiscordChannel, EmailChannel,
  createSmtpTransport, NotificationError,
} from './channels';
export type { NotificationChannel, FetchFn, MailTransport, MailOptions, SmtpSettings } from './channels';
export type { AlertBatch, AlertContext, ChannelDelivery, DedupPolicy } from './types';
