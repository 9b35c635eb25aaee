import type { Candle } from '../src/market/types';

export const DAY_MS = 86_400_000;
export const START = Date.UTC(2024, 0, 1);

/**
 * One candle per day from closes: open = close - 1, high = close + 1,
 * low = close - 2, volume = 1000 + 100 * i.
 */
export function windowFromCloses(closes: number[], start = START): Candle[] {
  return closes.map((close, i) => ({
    timestamp: start + i * DAY_MS,
    open: close - 1,
    high: close + 1,
    low: close - 2,
    close,
    volume: 1000 + 100 * i,
  }));
}

/** `length` identical filler candles followed by one candle with the given open/close */
export function windowEndingWith(open: number, close: number, length = 3, start = START): Candle[] {
  const filler = Array.from({ length: length - 1 }, (_, i) => ({
    timestamp: start + i * DAY_MS,
    open: 10,
    high: 11,
    low: 9,
    close: 10,
    volume: 1000,
  }));
  return [
    ...filler,
    {
      timestamp: start + (length - 1) * DAY_MS,
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) - 1,
      close,
      volume: 1000,
    },
  ];
}
