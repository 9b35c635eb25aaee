import type { AlertBatch } from '../alerts/types';

export interface TriggerResult {
  symbol: string;
  triggered: boolean;
  lastClose: number;
  candleTime: number; // unix ms of the most recent candle
}

export interface ScanReport {
  formula: string;
  startedAt: number;
  durationMs: number;
  /** Triggered first, then alphabetical */
  results: TriggerResult[];
  triggeredCount: number;
  totalCount: number;
  /** Symbols that produced no window this cycle */
  skipped: string[];
  /** Null when alerts are disabled */
  alerts: AlertBatch | null;
}
