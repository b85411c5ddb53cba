import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ParameterSet } from '../config/index.js';
import { Account, Clock, LOAN_MANAGER_ID, POOL_ACCOUNT, VOUCH_REGISTRY_ID, systemClock } from '../core/principals.js';
import { bigintText } from '../core/rows.js';
import { Wallet } from '../economy/wallet.js';
import {
  LedgerAmount,
  TransferAmount,
  ZERO_LEDGER,
  addLedger,
  ledger,
  mulDivLedger,
  subLedger,
  toLedger,
  toTransfer,
  transferRemainder,
} from '../lib/amount.js';
import { withScope } from '../log.js';
import { ProtocolError, wrapFailure } from '../util/errors.js';
import { borrowRate, utilization } from './rate.js';
import type { Deposit, PoolState, RepaymentSplit } from './types.js';

const log = withScope('pool');

export const YIELD_INDEX_SCALE = 10n ** 18n;

const stateRow = z.object({
  total_liquidity: bigintText,
  total_borrowed: bigintText,
  reserve: bigintText,
  total_principal: bigintText,
  yield_index: bigintText,
});

const depositRow = z.object({
  account: z.string(),
  principal: bigintText,
  accrued_yield: bigintText,
  earmarked: bigintText,
  index_snapshot: bigintText,
});

function minLedger(a: LedgerAmount, b: LedgerAmount): LedgerAmount {
  return a < b ? a : b;
}

/**
 * Pooled depositor capital, the loans drawn from it, and the rate curve.
 * Every amount argument documents its scale; ledger-scale values are stored,
 * transfer-scale values are what moves through the wallet.
 */
export class LiquidityPool {
  constructor(
    private readonly db: Database.Database,
    private readonly params: ParameterSet,
    private readonly wallet: Wallet,
    private readonly clock: Clock = systemClock,
  ) {}

  // ---- queries ----

  getState(): PoolState {
    const r = stateRow.parse(this.db.prepare('SELECT * FROM pool_state WHERE id = 1').get());
    return {
      total_liquidity: ledger(r.total_liquidity),
      total_borrowed: ledger(r.total_borrowed),
      reserve: ledger(r.reserve),
      total_principal: ledger(r.total_principal),
      yield_index: r.yield_index,
    };
  }

  getTotalLiquidity(): LedgerAmount {
    return this.getState().total_liquidity;
  }

  getUtilization(): bigint {
    return utilization(this.getState());
  }

  getCurrentRate(): bigint {
    return borrowRate(this.getState(), this.params);
  }

  /** The deposit as it would read after accrual, without writing anything. */
  getDeposit(account: Account): Deposit {
    return this.withPendingYield(this.loadDeposit(account), this.getState().yield_index);
  }

  /** Principal plus accrued yield, ledger scale. */
  getUserDeposit(account: Account): LedgerAmount {
    const d = this.getDeposit(account);
    return addLedger(d.principal, d.accrued_yield);
  }

  /** What a withdrawal could take right now, ledger scale. */
  getWithdrawable(account: Account): LedgerAmount {
    const d = this.getDeposit(account);
    const own = addLedger(d.principal, d.accrued_yield);
    const unpledged = own > d.earmarked ? subLedger(own, d.earmarked) : ZERO_LEDGER;
    const s = this.getState();
    return minLedger(unpledged, subLedger(s.total_liquidity, s.total_borrowed));
  }

  // ---- depositor entry points ----

  /**
   * `value` is transfer scale. Only the part representable at ledger scale is taken
   * from the wallet; the truncated remainder stays with the depositor.
   */
  deposit(account: Account, value: TransferAmount): { credited: LedgerAmount; charged: TransferAmount } {
    const credited = toLedger(value);
    if (credited === 0n) throw new ProtocolError('ZeroAmount', { op: 'deposit', value });
    const charged = toTransfer(credited);
    return this.db.transaction(() => {
      wrapFailure('TransactionFailed', { op: 'deposit', account }, () =>
        this.wallet.transfer(account, POOL_ACCOUNT, charged, 'pool:deposit'));
      const state = this.getState();
      const d = this.accrue(account, state.yield_index);
      this.saveDeposit({ ...d, principal: addLedger(d.principal, credited) });
      this.saveState({
        ...state,
        total_liquidity: addLedger(state.total_liquidity, credited),
        total_principal: addLedger(state.total_principal, credited),
      });
      log.info('deposit', { account, credited, charged, dropped: transferRemainder(value) });
      return { credited, charged };
    })();
  }

  /** `amount` is ledger scale; the payout returned is transfer scale. Yield is drawn before principal. */
  withdraw(account: Account, amount: LedgerAmount): TransferAmount {
    if (amount === 0n) throw new ProtocolError('ZeroAmount', { op: 'withdraw' });
    return this.db.transaction(() => {
      const state = this.getState();
      const d = this.accrue(account, state.yield_index);
      const own = addLedger(d.principal, d.accrued_yield);
      if (amount > own) throw new ProtocolError('UnavailableFunds', { account, requested: amount, balance: own });
      if (amount > own - d.earmarked) {
        throw new ProtocolError('UnavailableFunds', { account, requested: amount, earmarked: d.earmarked, reason: 'earmarked' });
      }
      const free = subLedger(state.total_liquidity, state.total_borrowed);
      if (amount > free) throw new ProtocolError('UnavailableFunds', { account, requested: amount, free, reason: 'liquidity' });

      const fromYield = minLedger(amount, d.accrued_yield);
      const fromPrincipal = subLedger(amount, fromYield);
      this.saveDeposit({
        ...d,
        accrued_yield: subLedger(d.accrued_yield, fromYield),
        principal: subLedger(d.principal, fromPrincipal),
      });
      this.saveState({
        ...state,
        total_liquidity: subLedger(state.total_liquidity, amount),
        total_principal: subLedger(state.total_principal, fromPrincipal),
      });
      const payout = toTransfer(amount);
      wrapFailure('TransactionFailed', { op: 'withdraw', account }, () =>
        this.wallet.transfer(POOL_ACCOUNT, account, payout, 'pool:withdraw'));
      log.info('withdraw', { account, amount, payout });
      return payout;
    })();
  }

  /** Explicit accrual. Calling it again with nothing in between changes nothing. */
  accrueYield(account: Account): LedgerAmount {
    return this.db.transaction(() => this.accrue(account, this.getState().yield_index).accrued_yield)();
  }

  // ---- loan manager entry points ----

  /** `amount` is ledger scale. */
  disburse(caller: string, amount: LedgerAmount, to: Account): TransferAmount {
    this.ensureCaller(caller, LOAN_MANAGER_ID);
    if (amount === 0n) throw new ProtocolError('ZeroAmount', { op: 'disburse' });
    return this.db.transaction(() => {
      const state = this.getState();
      const free = subLedger(state.total_liquidity, state.total_borrowed);
      if (amount > free) throw new ProtocolError('UnavailableFunds', { requested: amount, free });
      this.saveState({ ...state, total_borrowed: addLedger(state.total_borrowed, amount) });
      const paid = toTransfer(amount);
      wrapFailure('TransactionFailed', { op: 'disburse', to }, () =>
        this.wallet.transfer(POOL_ACCOUNT, to, paid, 'pool:disburse'));
      log.info('disburse', { to, amount, paid });
      return paid;
    })();
  }

  /**
   * Takes `value` (transfer scale) from `payer`. The `principal` part (ledger scale)
   * retires borrowed capital; the rest is interest, split between the reserve
   * (reserve_factor percent) and depositor yield.
   */
  receiveRepayment(caller: string, payer: Account, value: TransferAmount, principal: LedgerAmount): RepaymentSplit {
    this.ensureCaller(caller, LOAN_MANAGER_ID);
    if (value === 0n) throw new ProtocolError('ZeroAmount', { op: 'receive_repayment' });
    if (transferRemainder(value) !== 0n) throw new ProtocolError('InvalidValue', { op: 'receive_repayment', value, reason: 'below ledger precision' });
    const received = toLedger(value);
    if (received < principal) throw new ProtocolError('InvalidValue', { op: 'receive_repayment', received, principal });

    return this.db.transaction(() => {
      wrapFailure('TransactionFailed', { op: 'receive_repayment', payer }, () =>
        this.wallet.transfer(payer, POOL_ACCOUNT, value, 'pool:repayment'));
      const state = this.getState();
      const interest = subLedger(received, principal);
      const toReserve = mulDivLedger(interest, BigInt(this.params.reserve_factor), 100n);
      const toDepositors = subLedger(interest, toReserve);

      let reserve = addLedger(state.reserve, toReserve);
      let totalLiquidity = state.total_liquidity;
      let yieldIndex = state.yield_index;
      if (toDepositors > 0n) {
        if (state.total_principal === 0n) {
          reserve = addLedger(reserve, toDepositors);
        } else {
          yieldIndex += (toDepositors * YIELD_INDEX_SCALE) / state.total_principal;
          totalLiquidity = addLedger(totalLiquidity, toDepositors);
        }
      }
      this.saveState({
        ...state,
        total_borrowed: subLedger(state.total_borrowed, minLedger(principal, state.total_borrowed)),
        total_liquidity: totalLiquidity,
        reserve,
        yield_index: yieldIndex,
      });
      const split: RepaymentSplit = { principal, interest, to_reserve: toReserve, to_depositors: toDepositors };
      log.info('repayment_received', { payer, value, ...split });
      return split;
    })();
  }

  // ---- vouch registry entry points ----

  /** Pledges `amount` (ledger scale) of the account's deposit without moving it. */
  earmark(caller: string, account: Account, amount: LedgerAmount): Deposit {
    this.ensureCaller(caller, VOUCH_REGISTRY_ID);
    return this.db.transaction(() => {
      const d = this.accrue(account, this.getState().yield_index);
      const own = addLedger(d.principal, d.accrued_yield);
      if (addLedger(d.earmarked, amount) > own) {
        throw new ProtocolError('UnavailableFunds', { account, requested: amount, balance: own, earmarked: d.earmarked });
      }
      const next = { ...d, earmarked: addLedger(d.earmarked, amount) };
      this.saveDeposit(next);
      return next;
    })();
  }

  releaseEarmark(caller: string, account: Account, amount: LedgerAmount): Deposit {
    this.ensureCaller(caller, VOUCH_REGISTRY_ID);
    return this.db.transaction(() => {
      const d = this.loadDeposit(account);
      const next = { ...d, earmarked: subLedger(d.earmarked, minLedger(amount, d.earmarked)) };
      this.saveDeposit(next);
      return next;
    })();
  }

  /**
   * Removes up to `amount` (ledger scale) of the account's deposit, principal first and
   * then accrued yield, and releases the matching earmark. Slashed capital first retires
   * outstanding borrowed capital; any excess goes to the reserve.
   */
  slashStake(caller: string, account: Account, amount: LedgerAmount): { removed: LedgerAmount; recovered: LedgerAmount; to_reserve: LedgerAmount } {
    this.ensureCaller(caller, VOUCH_REGISTRY_ID);
    return this.db.transaction(() => {
      const state = this.getState();
      const d = this.accrue(account, state.yield_index);
      const fromPrincipal = minLedger(amount, d.principal);
      const fromYield = minLedger(subLedger(amount, fromPrincipal), d.accrued_yield);
      const removed = addLedger(fromPrincipal, fromYield);
      this.saveDeposit({
        ...d,
        principal: subLedger(d.principal, fromPrincipal),
        accrued_yield: subLedger(d.accrued_yield, fromYield),
        earmarked: subLedger(d.earmarked, minLedger(amount, d.earmarked)),
      });
      const recovered = minLedger(removed, state.total_borrowed);
      const toReserve = subLedger(removed, recovered);
      this.saveState({
        ...state,
        total_liquidity: subLedger(state.total_liquidity, removed),
        total_principal: subLedger(state.total_principal, fromPrincipal),
        total_borrowed: subLedger(state.total_borrowed, recovered),
        reserve: addLedger(state.reserve, toReserve),
      });
      log.info('stake_slashed', { account, requested: amount, removed, from_yield: fromYield, recovered, to_reserve: toReserve });
      return { removed, recovered, to_reserve: toReserve };
    })();
  }

  // ---- internals ----

  private ensureCaller(caller: string, expected: string): void {
    if (caller !== expected) throw new ProtocolError('Unauthorized', { module: 'pool', caller });
  }

  private loadDeposit(account: Account): Deposit {
    const row = this.db.prepare('SELECT * FROM pool_deposits WHERE account = ?').get(account);
    if (row === undefined) {
      return { account, principal: ZERO_LEDGER, accrued_yield: ZERO_LEDGER, earmarked: ZERO_LEDGER, index_snapshot: this.getState().yield_index };
    }
    const r = depositRow.parse(row);
    return {
      account: r.account,
      principal: ledger(r.principal),
      accrued_yield: ledger(r.accrued_yield),
      earmarked: ledger(r.earmarked),
      index_snapshot: r.index_snapshot,
    };
  }

  private withPendingYield(d: Deposit, index: bigint): Deposit {
    if (d.index_snapshot === index) return d;
    const pending = ledger((d.principal * (index - d.index_snapshot)) / YIELD_INDEX_SCALE);
    return { ...d, accrued_yield: addLedger(d.accrued_yield, pending), index_snapshot: index };
  }

  /** Brings the stored deposit up to `index`; writes only when something changed. */
  private accrue(account: Account, index: bigint): Deposit {
    const stored = this.loadDeposit(account);
    const next = this.withPendingYield(stored, index);
    if (next !== stored) this.saveDeposit(next);
    return next;
  }

  private saveDeposit(d: Deposit): void {
    this.db.prepare(`
      INSERT INTO pool_deposits(account, principal, accrued_yield, earmarked, index_snapshot, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(account) DO UPDATE SET principal = excluded.principal, accrued_yield = excluded.accrued_yield,
        earmarked = excluded.earmarked, index_snapshot = excluded.index_snapshot, updated_at = excluded.updated_at
    `).run(d.account, d.principal.toString(), d.accrued_yield.toString(), d.earmarked.toString(), d.index_snapshot.toString(), this.clock());
  }

  private saveState(s: PoolState): void {
    if (s.total_borrowed > s.total_liquidity) {
      throw new ProtocolError('UnavailableFunds', { reason: 'borrowed exceeds liquidity', total_borrowed: s.total_borrowed, total_liquidity: s.total_liquidity });
    }
    this.db.prepare(`
      UPDATE pool_state SET total_liquidity = ?, total_borrowed = ?, reserve = ?, total_principal = ?, yield_index = ?, updated_at = ?
      WHERE id = 1
    `).run(s.total_liquidity.toString(), s.total_borrowed.toString(), s.reserve.toString(), s.total_principal.toString(), s.yield_index.toString(), this.clock());
  }
}
