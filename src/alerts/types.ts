import type { TriggerResult } from '../scanner/types';
import type { AlertState } from './alert-state';

export interface ChannelDelivery {
  channel: string;
  ok: boolean;
  error?: string;
}

export interface AlertBatch {
  /** Newly alert-worthy symbols, sorted */
  symbols: string[];
  /** Null when nothing was sent */
  message: string | null;
  deliveries: ChannelDelivery[];
}

/** What the coordinator needs from the long-lived scanner session */
export interface AlertContext {
  readonly formulaText: string;
  readonly alertState: AlertState;
}

export interface DedupPolicy {
  readonly name: 'session' | 'candle';
  isEligible(result: TriggerResult, state: AlertState): boolean;
}
