export { fetchCandles, fetchWindows, parseChartResponse, MarketDataError } from './yahoo';
export type { FetchOptions, FetchWindowsOptions } from './yahoo';
export type { Candle, CandleWindow, FetchWindowsResult } from './types';
