import type { DedupPolicyName } from '../utils/config';
import type { DedupPolicy } from './types';

/** Once notified, stay quiet until the symbol stops triggering. */
export const sessionDedup: DedupPolicy = {
  name: 'session',
  isEligible: (result, state) => !state.has(result.symbol),
};

/** One alert per new candle while the symbol keeps triggering. */
export const candleDedup: DedupPolicy = {
  name: 'candle',
  isEligible: (result, state) => {
    const last = state.candleTimeOf(result.symbol);
    return last === undefined || result.candleTime > last;
  },
};

export function getDedupPolicy(name: DedupPolicyName): DedupPolicy {
  return name === 'candle' ? candleDedup : sessionDedup;
}
