import { createLogger } from '../utils/logger';
import type { TriggerResult } from '../scanner/types';
import type { NotificationChannel } from './channels/types';
import { sessionDedup } from './dedup';
import { formatAlertMessage } from './message';
import type { AlertBatch, AlertContext, ChannelDelivery, DedupPolicy } from './types';

const log = createLogger('alerts');

export interface AlertCoordinatorOptions {
  channels: NotificationChannel[];
  policy?: DedupPolicy;
}

/**
 * Turns one cycle's trigger results into at most one consolidated alert and
 * keeps the per-symbol notified markers in the session's AlertState.
 *
 * Per symbol: quiescent -> (triggered, eligible) notified -> (still triggered)
 * suppressed -> (not triggered) quiescent. Symbols missing from a cycle keep
 * their marker.
 */
export class AlertCoordinator {
  private readonly channels: NotificationChannel[];
  readonly policy: DedupPolicy;

  constructor(opts: AlertCoordinatorOptions) {
    this.channels = opts.channels;
    this.policy = opts.policy ?? sessionDedup;
  }

  get channelNames(): string[] {
    return this.channels.map(c => c.name);
  }

  async processCycle(session: AlertContext, results: readonly TriggerResult[]): Promise<AlertBatch> {
    const state = session.alertState;

    const eligible = new Map<string, TriggerResult>();
    for (const result of results) {
      if (result.triggered && this.policy.isEligible(result, state)) {
        eligible.set(result.symbol, result);
      }
    }
    const symbols = Array.from(eligible.keys()).sort();

    let message: string | null = null;
    let deliveries: ChannelDelivery[] = [];
    if (symbols.length > 0) {
      message = formatAlertMessage(session.formulaText, symbols);
      deliveries = await this.dispatch(message);
      log.info('Alert dispatched', {
        symbols,
        delivered: deliveries.filter(d => d.ok).map(d => d.channel),
        failed: deliveries.filter(d => !d.ok).map(d => d.channel),
      });
    }

    // At-most-once per event: a failed send is not retried next cycle
    for (const result of eligible.values()) {
      state.markNotified(result.symbol, result.candleTime);
    }
    for (const result of results) {
      if (!result.triggered && state.clear(result.symbol)) {
        log.debug('Trigger cleared', { symbol: result.symbol });
      }
    }

    return { symbols, message, deliveries };
  }

  private async dispatch(message: string): Promise<ChannelDelivery[]> {
    if (this.channels.length === 0) {
      log.warn('Alert produced but no notification channels are configured');
      return [];
    }

    const settled = await Promise.allSettled(this.channels.map(async channel => channel.notify(message)));

    return settled.map((outcome, i) => {
      const channel = this.channels[i].name;
      if (outcome.status === 'fulfilled') return { channel, ok: true };

      const error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      log.error('Notification failed', { channel, error });
      return { channel, ok: false, error };
    });
  }
}
