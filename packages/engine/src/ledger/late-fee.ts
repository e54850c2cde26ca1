import { percentOfCents } from '../math/money.js';
import type { LateFeePolicy } from './types.js';

export function assessLateFee(cycleInterestCents: number, policy: LateFeePolicy): number {
  switch (policy.kind) {
    case 'fixed':
      return policy.amountCents;
    case 'percent_of_cycle_interest':
      return percentOfCents(cycleInterestCents, policy.percent);
  }
}
