import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ParameterSet } from '../config/index.js';
import { Account, Clock, LOAN_MANAGER_ID, isReservedAccount, systemClock } from '../core/principals.js';
import { bigintText, intCol, parseRows } from '../core/rows.js';
import { LedgerAmount, TransferAmount, ledger, toTransfer } from '../lib/amount.js';
import { withScope } from '../log.js';
import { LiquidityPool } from '../pool/liquidityPool.js';
import { ReputationLedger } from '../reputation/ledger.js';
import { ProtocolError, wrapFailure } from '../util/errors.js';
import { normalizeError } from '../utils/errors.js';
import { VouchRegistry } from '../vouch/registry.js';
import { adjustRateByStars, isOverdue, repaymentAmount, requirementsFor, starsToSlash } from './calculator.js';
import type { Loan, LoanStatus, RepaymentQuote, TierRequirement } from './types.js';

const log = withScope('loans');

const loanRow = z.object({
  id: intCol,
  borrower: z.string(),
  principal: bigintText.transform((v) => ledger(v)),
  interest_rate: intCol.transform((v) => BigInt(v)),
  repayment_amount: bigintText.transform((v) => ledger(v)),
  tier: intCol,
  term_start: intCol.nullable(),
  term_duration: intCol,
  status: z.enum(['pending', 'active', 'repaid', 'defaulted']),
  created_at: intCol,
  closed_at: intCol.nullable(),
});

type LoanRow = z.output<typeof loanRow>;

/**
 * Drives the loan life-cycle across the other ledgers:
 * pending -> active -> repaid | defaulted. Every entry point runs in one transaction,
 * so a failure in any module rolls back the whole call.
 */
export class LoanOrchestrator {
  readonly id: string = LOAN_MANAGER_ID;
  private busy = false;

  constructor(
    private readonly db: Database.Database,
    private readonly params: ParameterSet,
    private readonly reputation: ReputationLedger,
    private readonly pool: LiquidityPool,
    private readonly vouches: VouchRegistry,
    private readonly clock: Clock = systemClock,
  ) {}

  // ---- entry points ----

  /** `amount` is ledger scale. Creates a pending loan with its rate and repayment fixed. */
  requestLoan(borrower: Account, amount: LedgerAmount, termDuration: number = this.params.loan_term_default_ms): Loan {
    return this.guarded('request_loan', () => {
      if (amount === 0n) throw new ProtocolError('ZeroAmount', { op: 'request_loan' });
      if (!Number.isSafeInteger(termDuration) || termDuration <= 0) {
        throw new ProtocolError('InvalidValue', { op: 'request_loan', termDuration });
      }
      if (isReservedAccount(borrower)) throw new ProtocolError('InvalidValue', { op: 'request_loan', borrower, reason: 'reserved account' });

      const req = requirementsFor(amount, this.params);
      const rec = this.reputation.touch(this.id, borrower);
      if (rec.banned || rec.stars < req.min_stars) {
        throw new ProtocolError('InsufficientReputation', { borrower, stars: rec.stars, required: req.min_stars, tier: req.tier, banned: rec.banned });
      }

      const rate = adjustRateByStars(this.pool.getCurrentRate(), rec.stars, this.params);
      const repayment = repaymentAmount(amount, rate);
      const now = this.clock();
      const info = this.db.prepare(`
        INSERT INTO loans(borrower, principal, interest_rate, repayment_amount, tier, term_duration, status, created_at)
        VALUES (?, ?, ?, ?, ?, ?, 'pending', ?)
      `).run(borrower, amount.toString(), rate, repayment.toString(), req.tier, termDuration, now);
      const id = Number(info.lastInsertRowid);
      log.info('loan_requested', { id, borrower, amount, rate, repayment, tier: req.tier });
      return this.requireLoan(id);
    });
  }

  /**
   * Records a vouch on a pending loan. When the loan's active vouch count reaches its
   * tier's minimum, the principal is disbursed and the loan activates in the same call.
   */
  vouchForLoan(voucher: Account, loanId: number, stars: number, capitalPercent: number): Loan {
    return this.guarded('vouch_for_loan', () => {
      const loan = this.requireLoan(loanId);
      if (loan.status !== 'pending') throw new ProtocolError('LoanNotPending', { loanId, status: loan.status });

      this.vouches.vouchForLoan(this.id, loanId, loan.borrower, voucher, stars, capitalPercent);

      const req = requirementsFor(loan.principal, this.params);
      const count = this.vouches.countActiveVouches(loanId);
      if (count < req.min_vouchers) {
        log.debug('loan_awaiting_vouchers', { loanId, count, required: req.min_vouchers });
        return this.requireLoan(loanId);
      }

      wrapFailure('DisbursementFailed', { loanId, amount: loan.principal.toString() }, () =>
        this.pool.disburse(this.id, loan.principal, loan.borrower));
      const now = this.clock();
      this.transition(loanId, 'pending', 'active', { term_start: now });
      log.info('loan_activated', { loanId, borrower: loan.borrower, principal: loan.principal, vouchers: count });
      return this.requireLoan(loanId);
    });
  }

  /**
   * `value` is transfer scale and must equal the stored repayment exactly. Only the
   * borrower may repay.
   */
  repayLoan(borrower: Account, loanId: number, value: TransferAmount): Loan {
    return this.guarded('repay_loan', () => {
      const loan = this.requireLoan(loanId);
      if (loan.status !== 'active') throw new ProtocolError('LoanNotActive', { loanId, status: loan.status });
      if (borrower !== loan.borrower) throw new ProtocolError('Unauthorized', { module: 'loans', caller: borrower, loanId });
      const expected = toTransfer(loan.repayment_amount);
      if (value !== expected) {
        throw new ProtocolError('InvalidRepaymentAmount', { loanId, expected: expected.toString(), got: value.toString() });
      }

      const split = wrapFailure('RepaymentFailed', { loanId }, () =>
        this.pool.receiveRepayment(this.id, borrower, value, loan.principal));
      this.transition(loanId, 'active', 'repaid', { closed_at: this.clock() });
      wrapFailure('ResolveFailed', { loanId }, () => this.vouches.resolveLoan(this.id, loanId, borrower, true));
      this.reputation.recordLoanOutcome(this.id, borrower, loanId, loan.principal, true);

      if (this.params.repay_reward_stars > 0) {
        const reward = this.reputation.addStars(this.id, borrower, this.params.repay_reward_stars);
        if (!reward.accrued) log.debug('repay_reward_skipped', { loanId, borrower, reason: reward.reason });
      }
      log.info('loan_repaid', { loanId, borrower, interest: split.interest, to_reserve: split.to_reserve });
      return this.requireLoan(loanId);
    });
  }

  /** Permissionless. Defaults an overdue active loan: borrower stars slashed, vouches settled as failed. */
  checkDefault(loanId: number): Loan {
    return this.guarded('check_default', () => {
      const loan = this.requireLoan(loanId);
      if (loan.status !== 'active') throw new ProtocolError('LoanNotActive', { loanId, status: loan.status });
      const now = this.clock();
      if (!isOverdue(loan, now, this.params)) throw new ProtocolError('LoanNotOverdue', { loanId, now, term_start: loan.term_start });

      this.transition(loanId, 'active', 'defaulted', { closed_at: now });
      const penalty = starsToSlash(loan.principal, this.params);
      const slashed = wrapFailure('SlashFailed', { loanId }, () => this.reputation.slashStars(this.id, loan.borrower, penalty));
      const res = wrapFailure('ResolveFailed', { loanId }, () => this.vouches.resolveLoan(this.id, loanId, loan.borrower, false));
      this.reputation.recordLoanOutcome(this.id, loan.borrower, loanId, loan.principal, false);
      log.warn('loan_defaulted', { loanId, borrower: loan.borrower, stars_slashed: slashed, capital_slashed: res.capital_slashed });
      return this.requireLoan(loanId);
    });
  }

  // ---- queries ----

  getLoan(loanId: number): Loan | null {
    const row = this.db.prepare('SELECT * FROM loans WHERE id = ?').get(loanId);
    return row === undefined ? null : this.withVouchers(loanRow.parse(row));
  }

  getRepaymentAmount(loanId: number): RepaymentQuote {
    const loan = this.requireLoan(loanId);
    return { ledger: loan.repayment_amount, transfer: toTransfer(loan.repayment_amount) };
  }

  getLoansByBorrower(borrower: Account): Loan[] {
    const rows = parseRows(loanRow, this.db.prepare('SELECT * FROM loans WHERE borrower = ? ORDER BY id ASC').all(borrower));
    return rows.map((r) => this.withVouchers(r));
  }

  getAllPendingLoans(): number[] {
    return this.idsWithStatus('pending');
  }

  getAllActiveLoans(): number[] {
    return this.idsWithStatus('active');
  }

  getRequirements(amount: LedgerAmount): TierRequirement {
    return requirementsFor(amount, this.params);
  }

  /** Rate a new loan by `borrower` would be fixed at right now. */
  quoteRate(borrower: Account): bigint {
    return adjustRateByStars(this.pool.getCurrentRate(), this.reputation.getStars(borrower), this.params);
  }

  // ---- internals ----

  private guarded<T>(op: string, fn: () => T): T {
    if (this.busy) throw new ProtocolError('ReentrantCall', { op });
    this.busy = true;
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      log.debug('entry_rejected', { op, error: normalizeError(err) });
      throw err;
    } finally {
      this.busy = false;
    }
  }

  private requireLoan(loanId: number): Loan {
    const loan = this.getLoan(loanId);
    if (!loan) throw new ProtocolError('LoanNotFound', { loanId });
    return loan;
  }

  private withVouchers(row: LoanRow): Loan {
    return { ...row, vouchers: this.vouches.getVouchersForLoan(row.id) };
  }

  private idsWithStatus(status: LoanStatus): number[] {
    const ids = this.db.prepare('SELECT id FROM loans WHERE status = ? ORDER BY id ASC').pluck().all(status);
    return ids.map((v) => intCol.parse(v));
  }

  /** Forward-only status change; the WHERE clause refuses anything but the expected source state. */
  private transition(loanId: number, from: LoanStatus, to: LoanStatus, fields: { term_start?: number; closed_at?: number }): void {
    const info = this.db.prepare(`
      UPDATE loans SET status = ?, term_start = COALESCE(?, term_start), closed_at = COALESCE(?, closed_at)
      WHERE id = ? AND status = ?
    `).run(to, fields.term_start ?? null, fields.closed_at ?? null, loanId, from);
    if (info.changes !== 1) {
      throw new ProtocolError(from === 'pending' ? 'LoanNotPending' : 'LoanNotActive', { loanId, expected: from });
    }
  }
}
