import { createLogger } from '../utils/logger';
import type { Timeframe } from '../utils/config';
import type { Candle, CandleWindow, FetchWindowsResult } from './types';

const log = createLogger('yahoo');

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

// Lookback per timeframe: enough bars to fill a window after dropping gaps
const TIMEFRAME_QUERY: Record<Timeframe, { interval: string; range: string }> = {
  '15m': { interval: '15m', range: '5d' },
  '1h': { interval: '60m', range: '1mo' },
  '1d': { interval: '1d', range: '1mo' },
};

export class MarketDataError extends Error {
  readonly symbol: string;
  readonly status?: number;

  constructor(symbol: string, message: string, status?: number) {
    super(`${symbol}: ${message}`);
    this.name = 'MarketDataError';
    this.symbol = symbol;
    this.status = status;
  }
}

export interface FetchOptions {
  fetchImpl?: typeof fetch;
  baseUrl?: string;
  maxRetries?: number;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function series(quote: Record<string, unknown>, key: string): unknown[] {
  const col = quote[key];
  return Array.isArray(col) ? col : [];
}

function finiteAt(col: unknown[], i: number): number | null {
  const v = col[i];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

/**
 * Turn a v8 chart payload into ascending candles. Rows with any missing
 * OHLCV value are dropped.
 */
export function parseChartResponse(symbol: string, payload: unknown): Candle[] {
  const chart = isRecord(payload) ? payload.chart : undefined;
  if (!isRecord(chart)) throw new MarketDataError(symbol, 'malformed chart payload');

  if (isRecord(chart.error)) {
    const description = typeof chart.error.description === 'string' ? chart.error.description : 'unknown error';
    throw new MarketDataError(symbol, description);
  }

  const result: unknown = Array.isArray(chart.result) ? chart.result[0] : undefined;
  if (!isRecord(result)) throw new MarketDataError(symbol, 'no chart result');

  const timestamps: unknown[] = Array.isArray(result.timestamp) ? result.timestamp : [];
  const indicators: Record<string, unknown> = isRecord(result.indicators) ? result.indicators : {};
  const quotes: unknown[] = Array.isArray(indicators.quote) ? indicators.quote : [];
  const first = quotes[0];
  const quote: Record<string, unknown> = isRecord(first) ? first : {};

  const open = series(quote, 'open');
  const high = series(quote, 'high');
  const low = series(quote, 'low');
  const close = series(quote, 'close');
  const volume = series(quote, 'volume');

  const candles: Candle[] = [];
  for (let i = 0; i < timestamps.length; i++) {
    const ts = finiteAt(timestamps, i);
    const o = finiteAt(open, i);
    const h = finiteAt(high, i);
    const l = finiteAt(low, i);
    const c = finiteAt(close, i);
    const v = finiteAt(volume, i);
    if (ts === null || o === null || h === null || l === null || c === null || v === null) continue;
    candles.push({ timestamp: ts * 1000, open: o, high: h, low: l, close: c, volume: v });
  }

  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

export async function fetchCandles(symbol: string, timeframe: Timeframe, opts: FetchOptions = {}): Promise<Candle[]> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const maxRetries = opts.maxRetries ?? 2;
  const timeoutMs = opts.timeoutMs ?? 15_000;
  const { interval, range } = TIMEFRAME_QUERY[timeframe];
  const params = new URLSearchParams({ interval, range, includePrePost: 'false' });
  const url = `${opts.baseUrl ?? CHART_URL}/${encodeURIComponent(symbol)}?${params}`;

  for (let attempt = 0; ; attempt++) {
    const res = await fetchImpl(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (res.status === 429 && attempt < maxRetries) {
      const backoffMs = Math.min(2 ** attempt * 1000, 10_000);
      log.warn('Rate limited, backing off', { symbol, backoffMs, attempt: attempt + 1 });
      await new Promise(r => setTimeout(r, backoffMs));
      continue;
    }
    if (!res.ok) throw new MarketDataError(symbol, `HTTP ${res.status}`, res.status);
    const payload: unknown = await res.json();
    return parseChartResponse(symbol, payload);
  }
}

export interface FetchWindowsOptions extends FetchOptions {
  timeframe: Timeframe;
  windowLength: number;
  concurrency?: number;
}

/**
 * Fetch trailing windows for every symbol. A symbol whose request fails or
 * yields no rows is listed in `failed` and has no window.
 */
export async function fetchWindows(symbols: readonly string[], opts: FetchWindowsOptions): Promise<FetchWindowsResult> {
  const concurrency = Math.max(1, opts.concurrency ?? 8);
  const windows = new Map<string, CandleWindow>();
  const failed: string[] = [];

  for (let i = 0; i < symbols.length; i += concurrency) {
    const batch = symbols.slice(i, i + concurrency);
    const settled = await Promise.allSettled(batch.map(s => fetchCandles(s, opts.timeframe, opts)));

    settled.forEach((outcome, j) => {
      const symbol = batch[j];
      if (outcome.status === 'rejected') {
        log.warn('Market data fetch failed', { symbol, error: outcome.reason });
        failed.push(symbol);
        return;
      }
      if (outcome.value.length === 0) {
        log.debug('No candles returned', { symbol });
        failed.push(symbol);
        return;
      }
      windows.set(symbol, outcome.value.slice(-opts.windowLength));
    });
  }

  return { windows, failed };
}
