import type { Account } from '../core/principals.js';

export type ReputationRecord = {
  account: Account;
  /** Stars held, staked ones included. */
  stars: number;
  staked_stars: number;
  banned: boolean;
  first_seen: number; // ms since epoch
  updated_at: number;
};

export type VouchStat = {
  loan_id: number;
  borrower: Account;
  successful: boolean;
  created_at: number;
};

export type LoanStat = {
  loan_id: number;
  amount: bigint;
  repaid: boolean;
  created_at: number;
};

export type AccrualResult =
  | { accrued: true; stars: number }
  | { accrued: false; stars: number; reason: 'cooldown' | 'banned' };
