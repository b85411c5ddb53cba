import { DEFAULT_PARAMS, makeParams } from '../../config/index.js';
import { ledger } from '../../lib/amount.js';
import { borrowRate, clampRate, utilization } from '../rate.js';

const state = (liquidity: bigint, borrowed: bigint) => ({
  total_liquidity: ledger(liquidity),
  total_borrowed: ledger(borrowed),
});

describe('utilization', () => {
  test('is zero for an empty pool', () => {
    expect(utilization(state(0n, 0n))).toBe(0n);
  });

  test('is borrowed over liquidity at 1e9', () => {
    expect(utilization(state(1000n, 250n))).toBe(250_000_000n);
  });
});

describe('two-slope rate curve', () => {
  test('idle pool pays the base rate', () => {
    expect(borrowRate(state(1000n, 0n), DEFAULT_PARAMS)).toBe(100_000_000n);
  });

  test('climbs by slope1 up to the optimal point', () => {
    expect(borrowRate(state(1000n, 500n), DEFAULT_PARAMS)).toBe(125_000_000n);
    expect(borrowRate(state(1000n, 800n), DEFAULT_PARAMS)).toBe(140_000_000n);
  });

  test('climbs by slope2 past it', () => {
    expect(borrowRate(state(1000n, 900n), DEFAULT_PARAMS)).toBe(515_000_000n);
    expect(borrowRate(state(1000n, 1000n), DEFAULT_PARAMS)).toBe(890_000_000n);
  });

  test('is clamped to max_rate', () => {
    const p = makeParams({ max_rate: 200_000_000 });
    expect(borrowRate(state(1000n, 1000n), p)).toBe(200_000_000n);
    expect(clampRate(-5n, 10)).toBe(0n);
    expect(clampRate(11n, 10)).toBe(10n);
  });

  test('same state gives the same rate', () => {
    const s = state(12_345n, 6_789n);
    expect(borrowRate(s, DEFAULT_PARAMS)).toBe(borrowRate({ ...s }, DEFAULT_PARAMS));
  });
});
