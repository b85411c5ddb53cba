import type { Account } from '../core/principals.js';
import type { LedgerAmount } from '../lib/amount.js';

export type VouchStatus = 'active' | 'fulfilled' | 'defaulted';

export type Vouch = {
  loan_id: number;
  borrower: Account;
  voucher: Account;
  stars_staked: number;
  capital_percent: number;
  /** capital_percent of the voucher's deposit at vouch time, ledger scale; earmarked, not moved. */
  staked_capital: LedgerAmount;
  status: VouchStatus;
  created_at: number;
  resolved_at: number | null;
};

export type Resolution = {
  loan_id: number;
  success: boolean;
  resolved: number;
  stars_returned: number;
  stars_burned: number;
  capital_slashed: LedgerAmount;
};
