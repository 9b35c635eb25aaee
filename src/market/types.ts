export interface Candle {
  timestamp: number; // unix ms, bucket open
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Trailing, time-ascending slice of a symbol's candles. Never mutated by readers. */
export type CandleWindow = readonly Candle[];

export interface FetchWindowsResult {
  windows: Map<string, CandleWindow>;
  failed: string[];
}
