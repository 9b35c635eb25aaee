import { truncateMessage } from '../message';
import { postJson, PostOptions } from './http';
import type { NotificationChannel } from './types';

const MAX_CONTENT_LENGTH = 2000;

export interface DiscordChannelOptions extends PostOptions {
  webhookUrl: string;
}

export class DiscordChannel implements NotificationChannel {
  readonly name = 'discord';

  constructor(private readonly opts: DiscordChannelOptions) {}

  async notify(text: string): Promise<void> {
    await postJson(this.name, this.opts.webhookUrl, {
      content: truncateMessage(text, MAX_CONTENT_LENGTH),
    }, this.opts);
  }
}
