import { RATE_SCALE } from '../lib/amount.js';
import type { PoolState, RateParams } from './types.js';

/** total_borrowed / total_liquidity scaled by RATE_SCALE; 0 for an empty pool. */
export function utilization(state: Pick<PoolState, 'total_liquidity' | 'total_borrowed'>): bigint {
  if (state.total_liquidity === 0n) return 0n;
  return (state.total_borrowed * RATE_SCALE) / state.total_liquidity;
}

/**
 * Two-slope curve: below the optimal utilization the rate climbs gently by slope1,
 * above it steeply by slope2. Clamped to [0, max_rate]. Pure; every caller that
 * passes the same state gets the same rate.
 */
export function borrowRate(state: Pick<PoolState, 'total_liquidity' | 'total_borrowed'>, p: RateParams): bigint {
  const u = utilization(state);
  const o = BigInt(p.optimal_utilization);
  const base = BigInt(p.base_interest_rate);
  const slope1 = BigInt(p.slope1);
  const slope2 = BigInt(p.slope2);
  let rate: bigint;
  if (u <= o) {
    rate = base + (u * slope1) / o;
  } else {
    rate = base + slope1 + ((u - o) * slope2) / (RATE_SCALE - o);
  }
  return clampRate(rate, p.max_rate);
}

export function clampRate(rate: bigint, maxRate: number): bigint {
  const max = BigInt(maxRate);
  if (rate < 0n) return 0n;
  return rate > max ? max : rate;
}
