import { createTransport } from 'nodemailer';
import { NotificationChannel, NotificationError } from './types';

export interface MailOptions {
  from: string;
  to: string[];
  subject: string;
  text: string;
}

/** The part of a nodemailer Transporter this channel uses */
export interface MailTransport {
  sendMail(mail: MailOptions): Promise<{ rejected?: unknown[] }>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
}

export interface EmailChannelOptions {
  transport: MailTransport;
  from: string;
  to: string[];
  subject: string;
}

export function createSmtpTransport(smtp: SmtpSettings): MailTransport {
  return createTransport({
    host: smtp.host,
    port: smtp.port,
    // Port 587 upgrades with STARTTLS; 465 is TLS from the start
    secure: smtp.secure,
    auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined,
  });
}

export class EmailChannel implements NotificationChannel {
  readonly name = 'email';

  constructor(private readonly opts: EmailChannelOptions) {}

  async notify(text: string): Promise<void> {
    if (this.opts.to.length === 0) {
      throw new NotificationError(this.name, 'no recipients configured');
    }

    let info: { rejected?: unknown[] };
    try {
      info = await this.opts.transport.sendMail({
        from: this.opts.from,
        to: this.opts.to,
        subject: this.opts.subject,
        text,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new NotificationError(this.name, `send failed: ${reason}`);
    }

    const rejected = info.rejected ?? [];
    if (rejected.length > 0 && rejected.length >= this.opts.to.length) {
      throw new NotificationError(this.name, `all ${rejected.length} recipient(s) rejected`);
    }
  }
}
