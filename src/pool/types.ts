import type { Account } from '../core/principals.js';
import type { LedgerAmount } from '../lib/amount.js';

/** All amounts at ledger scale. */
export type PoolState = {
  total_liquidity: LedgerAmount;
  total_borrowed: LedgerAmount;
  reserve: LedgerAmount;
  /** Sum of depositor principals; the base the yield index is spread over. */
  total_principal: LedgerAmount;
  /** Cumulative yield per unit of principal, scaled by YIELD_INDEX_SCALE. */
  yield_index: bigint;
};

export type Deposit = {
  account: Account;
  principal: LedgerAmount;
  accrued_yield: LedgerAmount;
  /** Capital pledged by active vouches; cannot be withdrawn. */
  earmarked: LedgerAmount;
  index_snapshot: bigint;
};

export type RateParams = {
  base_interest_rate: number;
  optimal_utilization: number;
  slope1: number;
  slope2: number;
  max_rate: number;
};

export type RepaymentSplit = {
  principal: LedgerAmount;
  interest: LedgerAmount;
  to_reserve: LedgerAmount;
  to_depositors: LedgerAmount;
};
