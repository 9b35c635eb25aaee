import fs from 'fs';
import path from 'path';
import type { TickerSource } from '../utils/config';
import { createLogger } from '../utils/logger';

const log = createLogger('tickers');

export const TICKER_DIR = path.resolve(__dirname, '../../config/tickers');

const BUILTIN_FILES: Record<Exclude<TickerSource, 'file'>, string> = {
  nifty50: 'nifty50.txt',
  nifty500: 'nifty500.txt',
  forex: 'forex.txt',
};

const SYMBOL_PATTERN = /^[A-Z0-9^][A-Z0-9.\-=^&]{0,19}$/;

/** Comma and/or newline separated symbols, upper-cased, first occurrence wins */
export function parseTickers(content: string): string[] {
  const seen = new Set<string>();
  for (const raw of content.split(/[,\r\n]+/)) {
    const symbol = raw.trim().toUpperCase();
    if (!symbol) continue;
    if (!SYMBOL_PATTERN.test(symbol)) {
      log.warn('Ignoring invalid ticker', { symbol });
      continue;
    }
    seen.add(symbol);
  }
  return Array.from(seen);
}

export function loadTickers(source: TickerSource, file = '', dir = TICKER_DIR): string[] {
  const filePath = source === 'file' ? file : path.join(dir, BUILTIN_FILES[source]);
  if (!filePath) {
    throw new Error('TICKER_SOURCE=file requires TICKER_FILE');
  }
  if (!fs.existsSync(filePath)) {
    throw new Error(`Ticker file not found: ${filePath}`);
  }

  const tickers = parseTickers(fs.readFileSync(filePath, 'utf-8'));
  log.info('Tickers loaded', { source, count: tickers.length });
  return tickers;
}
