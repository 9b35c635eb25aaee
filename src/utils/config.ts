import dotenv from 'dotenv';
import path from 'path';
import { createLogger } from './logger';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const log = createLogger('config');

export type Timeframe = '15m' | '1h' | '1d';
export type TickerSource = 'nifty50' | 'nifty500' | 'forex' | 'file';
export type DedupPolicyName = 'session' | 'candle';

const TIMEFRAMES: readonly Timeframe[] = ['15m', '1h', '1d'];
const TICKER_SOURCES: readonly TickerSource[] = ['nifty50', 'nifty500', 'forex', 'file'];
const DEDUP_POLICIES: readonly DedupPolicyName[] = ['session', 'candle'];

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function integer(key: string, fallback: number, min: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = Number(raw);
  if (!Number.isInteger(val) || val < min) {
    log.warn('Invalid numeric env var, using default', { key, value: raw, fallback });
    return fallback;
  }
  return val;
}

function flag(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (!raw) return fallback;
  return raw.trim().toLowerCase() === 'true';
}

function oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[key];
  if (!raw) return fallback;
  const match = allowed.find(a => a === raw.trim());
  if (match === undefined) {
    log.warn('Unsupported env value, using default', { key, value: raw, allowed, fallback });
    return fallback;
  }
  return match;
}

function list(key: string): string[] {
  return optional(key, '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/** A minimum above the window length could never be met; cap it there. */
export function clampMinWindow(minWindow: number, windowLength: number): number {
  if (minWindow <= windowLength) return minWindow;
  log.warn('SCAN_MIN_WINDOW exceeds SCAN_WINDOW_LENGTH, clamping', { minWindow, windowLength });
  return windowLength;
}

const windowLength = integer('SCAN_WINDOW_LENGTH', 15, 1);

export const config = {
  scan: {
    timeframe: oneOf('SCAN_TIMEFRAME', TIMEFRAMES, '1d'),
    windowLength,
    minWindow: clampMinWindow(integer('SCAN_MIN_WINDOW', 3, 1), windowLength),
    intervalMs: integer('SCAN_INTERVAL_MS', 60_000, 1_000),
    concurrency: integer('SCAN_CONCURRENCY', 8, 1),
  },
  tickers: {
    source: oneOf('TICKER_SOURCE', TICKER_SOURCES, 'nifty50'),
    file: optional('TICKER_FILE', ''),
  },
  triggers: {
    file: optional('TRIGGERS_FILE', path.resolve(__dirname, '../../config/triggers.json')),
    name: optional('TRIGGER_NAME', ''),
    formula: optional('TRIGGER_FORMULA', ''),
  },
  alerts: {
    enabled: flag('ALERTS_ENABLED', false),
    dedupPolicy: oneOf('DEDUP_POLICY', DEDUP_POLICIES, 'session'),
    telegramBotToken: optional('TELEGRAM_BOT_TOKEN', ''),
    telegramChatId: optional('TELEGRAM_CHAT_ID', ''),
    discordWebhookUrl: optional('DISCORD_WEBHOOK_URL', ''),
    email: {
      host: optional('SMTP_HOST', ''),
      port: integer('SMTP_PORT', 587, 1),
      secure: flag('SMTP_SECURE', false),
      user: optional('SMTP_USER', ''),
      password: optional('SMTP_PASSWORD', ''),
      from: optional('ALERT_EMAIL_FROM', optional('SMTP_USER', '')),
      to: list('ALERT_EMAILS'),
      subject: optional('ALERT_EMAIL_SUBJECT', 'Screener Alert'),
    },
  },
} as const;

export type AppConfig = typeof config;
export type AlertsConfig = AppConfig['alerts'];
