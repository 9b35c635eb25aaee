import { truncateMessage } from '../message';
import { postJson, PostOptions } from './http';
import { NotificationChannel, NotificationError } from './types';

const TELEGRAM_API = 'https://api.telegram.org';
const MAX_MESSAGE_LENGTH = 4096;

export interface TelegramChannelOptions extends PostOptions {
  botToken: string;
  chatId: string;
  apiBase?: string;
}

function hasOkFlag(value: unknown): value is { ok: boolean; description?: unknown } {
  return typeof value === 'object' && value !== null && 'ok' in value && typeof value.ok === 'boolean';
}

export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(private readonly opts: TelegramChannelOptions) {}

  async notify(text: string): Promise<void> {
    const base = this.opts.apiBase ?? TELEGRAM_API;
    const res = await postJson(this.name, `${base}/bot${this.opts.botToken}/sendMessage`, {
      chat_id: this.opts.chatId,
      text: truncateMessage(text, MAX_MESSAGE_LENGTH),
      disable_web_page_preview: true,
    }, this.opts);

    // Telegram answers 200 with { ok: false } for some rejected messages
    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw new NotificationError(this.name, 'response was not JSON', res.status);
    }
    if (hasOkFlag(payload) && !payload.ok) {
      const description = typeof payload.description === 'string' ? payload.description : 'rejected';
      throw new NotificationError(this.name, description, res.status);
    }
  }
}
