export interface NotificationChannel {
  readonly name: string;
  /** Resolves once delivered; rejects with NotificationError otherwise */
  notify(text: string): Promise<void>;
}

export class NotificationError extends Error {
  readonly channel: string;
  readonly status?: number;

  constructor(channel: string, message: string, status?: number) {
    super(`${channel}: ${message}`);
    this.name = 'NotificationError';
    this.channel = channel;
    this.status = status;
  }
}

export type FetchFn = typeof fetch;
