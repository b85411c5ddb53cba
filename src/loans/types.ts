import type { Account } from '../core/principals.js';
import type { LedgerAmount, TransferAmount } from '../lib/amount.js';

export type LoanStatus = 'pending' | 'active' | 'repaid' | 'defaulted';

export type Loan = {
  id: number;
  borrower: Account;
  principal: LedgerAmount;
  interest_rate: bigint; // RATE_SCALE, fixed at creation
  repayment_amount: LedgerAmount; // fixed at creation
  tier: number;
  term_start: number | null; // ms since epoch, set on activation
  term_duration: number; // ms
  status: LoanStatus;
  created_at: number;
  closed_at: number | null;
  vouchers: Account[];
};

export type TierRequirement = {
  tier: number; // 1-based
  min_stars: number;
  min_vouchers: number;
};

export type RepaymentQuote = {
  ledger: LedgerAmount;
  transfer: TransferAmount;
};
