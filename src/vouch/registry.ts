import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ParameterSet } from '../config/index.js';
import { Account, Clock, LOAN_MANAGER_ID, VOUCH_REGISTRY_ID, systemClock } from '../core/principals.js';
import { bigintText, intCol, parseRows } from '../core/rows.js';
import { LedgerAmount, RATE_SCALE, ZERO_LEDGER, addLedger, ledger, mulDivLedger, subLedger } from '../lib/amount.js';
import { withScope } from '../log.js';
import { LiquidityPool } from '../pool/liquidityPool.js';
import { ReputationLedger } from '../reputation/ledger.js';
import { ProtocolError, isProtocolError } from '../util/errors.js';
import type { Resolution, Vouch } from './types.js';

const log = withScope('vouch');

const vouchRow = z.object({
  loan_id: intCol,
  borrower: z.string(),
  voucher: z.string(),
  stars_staked: intCol,
  capital_percent: intCol,
  staked_capital: bigintText.transform((v) => ledger(v)),
  status: z.enum(['active', 'fulfilled', 'defaulted']),
  created_at: intCol,
  resolved_at: intCol.nullable(),
});

function assertPositiveInt(v: number, what: string): void {
  if (!Number.isSafeInteger(v) || v < 0) throw new ProtocolError('InvalidValue', { what, value: v });
  if (v === 0) throw new ProtocolError('ZeroAmount', { what });
}

/**
 * Guarantees vouchers give for individual loans. A vouch stakes the voucher's
 * stars and earmarks a share of their pool deposit; both are settled together
 * when the loan is repaid or defaults.
 */
export class VouchRegistry {
  constructor(
    private readonly db: Database.Database,
    private readonly params: ParameterSet,
    private readonly reputation: ReputationLedger,
    private readonly pool: LiquidityPool,
    private readonly clock: Clock = systemClock,
    private readonly orchestratorId: string = LOAN_MANAGER_ID,
  ) {}

  // ---- queries ----

  getVouch(loanId: number, voucher: Account): Vouch | null {
    const row = this.db.prepare('SELECT * FROM vouches WHERE loan_id = ? AND voucher = ?').get(loanId, voucher);
    return row === undefined ? null : vouchRow.parse(row);
  }

  getVouchesForLoan(loanId: number): Vouch[] {
    return parseRows(vouchRow, this.db.prepare('SELECT * FROM vouches WHERE loan_id = ? ORDER BY created_at ASC, voucher ASC').all(loanId));
  }

  getVouchersForLoan(loanId: number): Account[] {
    return this.getVouchesForLoan(loanId).map((v) => v.voucher);
  }

  countActiveVouches(loanId: number): number {
    const n = this.db.prepare("SELECT COUNT(*) FROM vouches WHERE loan_id = ? AND status = 'active'").pluck().get(loanId);
    return z.number().int().parse(n);
  }

  getVouchesByVoucher(voucher: Account): Vouch[] {
    return parseRows(vouchRow, this.db.prepare('SELECT * FROM vouches WHERE voucher = ? ORDER BY loan_id ASC').all(voucher));
  }

  /** Capital the voucher has pledged across all active vouches, ledger scale. */
  getActiveExposure(voucher: Account): LedgerAmount {
    const rows = this.db.prepare("SELECT staked_capital FROM vouches WHERE voucher = ? AND status = 'active'").pluck().all(voucher);
    return rows.reduce<LedgerAmount>((sum, v) => addLedger(sum, ledger(bigintText.parse(v))), ZERO_LEDGER);
  }

  /** Largest total exposure a single voucher may hold: exposure_cap of total liquidity. */
  getExposureLimit(): LedgerAmount {
    return mulDivLedger(this.pool.getTotalLiquidity(), BigInt(this.params.exposure_cap), RATE_SCALE);
  }

  // ---- orchestrator entry points ----

  vouchForLoan(
    loanManager: string,
    loanId: number,
    borrower: Account,
    voucher: Account,
    stars: number,
    capitalPercent: number,
  ): Vouch {
    this.ensureOrchestrator(loanManager);
    assertPositiveInt(stars, 'stars');
    assertPositiveInt(capitalPercent, 'capital_percent');

    return this.db.transaction(() => {
      if (this.getVouch(loanId, voucher)) throw new ProtocolError('DuplicateVouch', { loanId, voucher });

      if (!this.reputation.canVouch(voucher)) {
        throw new ProtocolError('NotEnoughStars', { voucher, stars: this.reputation.getStars(voucher), min: this.params.min_stars_to_vouch });
      }
      const freeStars = this.reputation.getAvailableStars(voucher);
      if (stars > freeStars) throw new ProtocolError('NotEnoughStars', { voucher, available: freeStars, requested: stars });

      const deposit = this.pool.getDeposit(voucher);
      const balance = addLedger(deposit.principal, deposit.accrued_yield);
      const capital = mulDivLedger(balance, BigInt(capitalPercent), 100n);
      const unpledged = balance > deposit.earmarked ? subLedger(balance, deposit.earmarked) : ZERO_LEDGER;
      if (capital === 0n || capital > unpledged) {
        throw new ProtocolError('NotEnoughCapital', { voucher, capital, available: unpledged });
      }

      const exposure = this.getActiveExposure(voucher);
      const limit = this.getExposureLimit();
      if (addLedger(exposure, capital) > limit) {
        throw new ProtocolError('ExposureCapExceeded', { voucher, exposure, capital, limit });
      }

      try {
        this.reputation.stakeStars(VOUCH_REGISTRY_ID, voucher, stars);
      } catch (err) {
        if (isProtocolError(err, 'InsufficientStars')) throw new ProtocolError('NotEnoughStars', { voucher }, { cause: err });
        throw err;
      }
      try {
        this.pool.earmark(VOUCH_REGISTRY_ID, voucher, capital);
      } catch (err) {
        if (isProtocolError(err, 'UnavailableFunds')) throw new ProtocolError('NotEnoughCapital', { voucher }, { cause: err });
        throw err;
      }

      const now = this.clock();
      this.db.prepare(`
        INSERT INTO vouches(loan_id, voucher, borrower, stars_staked, capital_percent, staked_capital, status, created_at)
        VALUES (?, ?, ?, ?, ?, ?, 'active', ?)
      `).run(loanId, voucher, borrower, stars, capitalPercent, capital.toString(), now);
      log.info('vouch_created', { loanId, borrower, voucher, stars, capitalPercent, capital });

      const created: Vouch = {
        loan_id: loanId,
        borrower,
        voucher,
        stars_staked: stars,
        capital_percent: capitalPercent,
        staked_capital: capital,
        status: 'active',
        created_at: now,
        resolved_at: null,
      };
      return created;
    })();
  }

  /**
   * Settles every active vouch on the loan. Success returns stars plus the boost and
   * releases the earmark; failure burns the stars and slashes the earmarked capital.
   */
  resolveLoan(loanManager: string, loanId: number, borrower: Account, success: boolean): Resolution {
    this.ensureOrchestrator(loanManager);
    return this.db.transaction(() => {
      const all = this.getVouchesForLoan(loanId).filter((v) => v.borrower === borrower);
      if (all.length === 0) throw new ProtocolError('RelationshipNotFound', { loanId, borrower });
      const active = all.filter((v) => v.status === 'active');
      if (active.length === 0) throw new ProtocolError('AlreadyResolved', { loanId });

      const now = this.clock();
      const status = success ? 'fulfilled' : 'defaulted';
      const out: Resolution = { loan_id: loanId, success, resolved: 0, stars_returned: 0, stars_burned: 0, capital_slashed: ZERO_LEDGER };
      for (const v of active) {
        this.reputation.unstakeStars(VOUCH_REGISTRY_ID, v.voucher, v.stars_staked, success, { loanId, borrower });
        if (success) {
          this.pool.releaseEarmark(VOUCH_REGISTRY_ID, v.voucher, v.staked_capital);
          out.stars_returned += v.stars_staked + this.params.boost;
        } else {
          const slashed = this.pool.slashStake(VOUCH_REGISTRY_ID, v.voucher, v.staked_capital);
          out.capital_slashed = addLedger(out.capital_slashed, slashed.removed);
          out.stars_burned += v.stars_staked;
        }
        this.db.prepare('UPDATE vouches SET status = ?, resolved_at = ? WHERE loan_id = ? AND voucher = ?')
          .run(status, now, loanId, v.voucher);
        out.resolved += 1;
        log.info('vouch_resolved', { loanId, borrower, voucher: v.voucher, success });
      }
      return out;
    })();
  }

  private ensureOrchestrator(caller: string): void {
    if (caller !== this.orchestratorId) throw new ProtocolError('Unauthorized', { module: 'vouch', caller });
  }
}
