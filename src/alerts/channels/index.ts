import type { AlertsConfig } from '../../utils/config';
import { createLogger } from '../../utils/logger';
import { DiscordChannel } from './discord';
import { EmailChannel, MailTransport, createSmtpTransport } from './email';
import { TelegramChannel } from './telegram';
import type { FetchFn, NotificationChannel } from './types';

const log = createLogger('channels');

export interface ChannelDeps {
  fetchImpl?: FetchFn;
  mailTransport?: MailTransport;
}

/** Build every channel whose credentials are present in config. */
export function createChannels(cfg: AlertsConfig, deps: ChannelDeps = {}): NotificationChannel[] {
  const channels: NotificationChannel[] = [];

  if (cfg.telegramBotToken && cfg.telegramChatId) {
    channels.push(new TelegramChannel({
      botToken: cfg.telegramBotToken,
      chatId: cfg.telegramChatId,
      fetchImpl: deps.fetchImpl,
    }));
  } else if (cfg.telegramBotToken || cfg.telegramChatId) {
    log.warn('Telegram needs both TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID; channel disabled');
  }

  if (cfg.discordWebhookUrl) {
    channels.push(new DiscordChannel({ webhookUrl: cfg.discordWebhookUrl, fetchImpl: deps.fetchImpl }));
  }

  const email = cfg.email;
  if ((email.host || deps.mailTransport) && email.to.length > 0) {
    channels.push(new EmailChannel({
      transport: deps.mailTransport ?? createSmtpTransport(email),
      from: email.from,
      to: [...email.to],
      subject: email.subject,
    }));
  } else if (email.host) {
    log.warn('SMTP_HOST set but ALERT_EMAILS is empty; email channel disabled');
  }

  log.info('Notification channels ready', { channels: channels.map(c => c.name) });
  return channels;
}

export { TelegramChannel } from './telegram';
export { DiscordChannel } from './discord';
export { EmailChannel, createSmtpTransport } from './email';
export type { MailTransport, MailOptions, SmtpSettings } from './email';
export { NotificationError } from './types';
export type { NotificationChannel, FetchFn } from './types';
