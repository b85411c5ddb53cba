import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ParameterSet } from '../config/index.js';
import { Account, Clock, LOAN_MANAGER_ID, VOUCH_REGISTRY_ID, systemClock } from '../core/principals.js';
import { bigintText, boolCol, intCol, parseRows } from '../core/rows.js';
import { withScope } from '../log.js';
import { ProtocolError } from '../util/errors.js';
import { AccrualResult, LoanStat, ReputationRecord, VouchStat } from './types.js';

const log = withScope('reputation');

const recordRow = z.object({
  account: z.string(),
  stars: intCol,
  staked_stars: intCol,
  banned: boolCol,
  first_seen: intCol,
  updated_at: intCol,
});

const vouchStatRow = z.object({ loan_id: intCol, borrower: z.string(), successful: boolCol, created_at: intCol });
const loanStatRow = z.object({ loan_id: intCol, amount: bigintText, repaid: boolCol, created_at: intCol });

function assertStarCount(amount: number, op: string): void {
  if (!Number.isSafeInteger(amount) || amount < 0) throw new ProtocolError('InvalidValue', { op, amount });
  if (amount === 0) throw new ProtocolError('ZeroAmount', { op });
}

/**
 * Per-account star balances and ban state. Stars are staked by vouchers, burned on
 * failed vouches, slashed from defaulting borrowers and earned back over time.
 * Invariants: staked_stars <= stars, and banned exactly when stars == 0.
 */
export class ReputationLedger {
  private readonly authorized: ReadonlySet<string>;

  constructor(
    private readonly db: Database.Database,
    private readonly params: ParameterSet,
    private readonly clock: Clock = systemClock,
    authorized: Iterable<string> = [VOUCH_REGISTRY_ID, LOAN_MANAGER_ID],
  ) {
    this.authorized = new Set(authorized);
  }

  // ---- queries ----

  getRecord(account: Account): ReputationRecord | null {
    const row = this.db.prepare('SELECT * FROM reputation_records WHERE account = ?').get(account);
    return row === undefined ? null : recordRow.parse(row);
  }

  getStars(account: Account): number {
    return this.getRecord(account)?.stars ?? 0;
  }

  getAvailableStars(account: Account): number {
    const rec = this.getRecord(account);
    return rec ? rec.stars - rec.staked_stars : 0;
  }

  canVouch(account: Account): boolean {
    const rec = this.getRecord(account);
    if (!rec || rec.banned) return false;
    return rec.stars >= this.params.min_stars_to_vouch;
  }

  getVouchHistory(account: Account): VouchStat[] {
    const rows = this.db.prepare('SELECT loan_id, borrower, successful, created_at FROM reputation_vouch_history WHERE account = ? ORDER BY id ASC').all(account);
    return parseRows(vouchStatRow, rows);
  }

  getLoanHistory(account: Account): LoanStat[] {
    const rows = this.db.prepare('SELECT loan_id, amount, repaid, created_at FROM reputation_loan_history WHERE account = ? ORDER BY id ASC').all(account);
    return parseRows(loanStatRow, rows);
  }

  // ---- guarded mutations ----

  /** Creates the record with the starting grant on first interaction. */
  touch(caller: string, account: Account): ReputationRecord {
    this.ensureAuthorized(caller);
    return this.db.transaction(() => this.ensureRecord(account))();
  }

  stakeStars(caller: string, account: Account, amount: number): ReputationRecord {
    this.ensureAuthorized(caller);
    assertStarCount(amount, 'stake');
    return this.db.transaction(() => {
      const rec = this.ensureRecord(account);
      const free = rec.stars - rec.staked_stars;
      if (amount > free) throw new ProtocolError('InsufficientStars', { account, available: free, requested: amount });
      const next = { ...rec, staked_stars: rec.staked_stars + amount };
      this.save(next);
      log.info('stars_staked', { account, amount, staked: next.staked_stars });
      return next;
    })();
  }

  /**
   * Releases a stake. Success returns it to free stars plus the configured boost;
   * failure burns it. `context` adds the settlement to the vouch history.
   */
  unstakeStars(
    caller: string,
    account: Account,
    amount: number,
    success: boolean,
    context?: { loanId: number; borrower: Account },
  ): ReputationRecord {
    this.ensureAuthorized(caller);
    assertStarCount(amount, 'unstake');
    return this.db.transaction(() => {
      const rec = this.ensureRecord(account);
      if (amount > rec.staked_stars) {
        throw new ProtocolError('InsufficientStakedStars', { account, staked: rec.staked_stars, requested: amount });
      }
      const stars = success ? rec.stars + this.params.boost : rec.stars - amount;
      const next = { ...rec, stars, staked_stars: rec.staked_stars - amount, banned: stars === 0 };
      this.save(next);
      if (context) {
        this.db.prepare('INSERT INTO reputation_vouch_history(account, loan_id, borrower, successful, created_at) VALUES (?, ?, ?, ?, ?)')
          .run(account, context.loanId, context.borrower, success ? 1 : 0, this.clock());
      }
      log.info('stars_unstaked', { account, amount, success, stars: next.stars });
      return next;
    })();
  }

  /** Removes up to `amount` free stars, floored at zero. Returns how many were removed. */
  slashStars(caller: string, account: Account, amount: number): number {
    this.ensureAuthorized(caller);
    assertStarCount(amount, 'slash');
    return this.db.transaction(() => {
      const rec = this.ensureRecord(account);
      const free = rec.stars - rec.staked_stars;
      const removed = Math.min(amount, free);
      const stars = rec.stars - removed;
      this.save({ ...rec, stars, banned: stars === 0 });
      log.info('stars_slashed', { account, requested: amount, removed, stars, banned: stars === 0 });
      return removed;
    })();
  }

  /** Accrual is refused inside the cooldown window and for banned accounts. */
  addStars(caller: string, account: Account, amount: number): AccrualResult {
    this.ensureAuthorized(caller);
    assertStarCount(amount, 'add');
    return this.db.transaction((): AccrualResult => {
      const rec = this.ensureRecord(account);
      if (rec.banned) return { accrued: false, stars: rec.stars, reason: 'banned' };
      if (this.clock() - rec.first_seen < this.params.cooldown_period_ms) {
        return { accrued: false, stars: rec.stars, reason: 'cooldown' };
      }
      const stars = rec.stars + amount;
      this.save({ ...rec, stars });
      log.info('stars_added', { account, amount, stars });
      return { accrued: true, stars };
    })();
  }

  recordLoanOutcome(caller: string, account: Account, loanId: number, amount: bigint, repaid: boolean): void {
    this.ensureAuthorized(caller);
    this.db.prepare('INSERT INTO reputation_loan_history(account, loan_id, amount, repaid, created_at) VALUES (?, ?, ?, ?, ?)')
      .run(account, loanId, amount.toString(), repaid ? 1 : 0, this.clock());
  }

  // ---- admin hooks ----

  adminSetStars(admin: string, account: Account, stars: number): ReputationRecord {
    this.ensureAdmin(admin);
    if (!Number.isSafeInteger(stars) || stars < 0) throw new ProtocolError('InvalidValue', { op: 'admin_set_stars', stars });
    return this.db.transaction(() => {
      const rec = this.ensureRecord(account);
      if (stars < rec.staked_stars) {
        throw new ProtocolError('InvalidValue', { op: 'admin_set_stars', stars, staked: rec.staked_stars });
      }
      const next = { ...rec, stars, banned: stars === 0 };
      this.save(next);
      log.info('admin_set_stars', { admin, account, from: rec.stars, to: stars });
      return next;
    })();
  }

  /** Unlike addStars this ignores the cooldown and lifts a ban. */
  adminAddStars(admin: string, account: Account, amount: number): ReputationRecord {
    this.ensureAdmin(admin);
    assertStarCount(amount, 'admin_add_stars');
    return this.db.transaction(() => {
      const rec = this.ensureRecord(account);
      const next = { ...rec, stars: rec.stars + amount, banned: false };
      this.save(next);
      log.info('admin_add_stars', { admin, account, amount, stars: next.stars });
      return next;
    })();
  }

  /** Rehabilitates a banned account with the starting grant. No-op if not banned. */
  adminUnban(admin: string, account: Account): ReputationRecord {
    this.ensureAdmin(admin);
    return this.db.transaction(() => {
      const rec = this.ensureRecord(account);
      if (!rec.banned) return rec;
      if (this.params.starting_stars === 0) {
        throw new ProtocolError('InvalidValue', { op: 'admin_unban', reason: 'starting_stars is 0' });
      }
      const next = { ...rec, stars: this.params.starting_stars, banned: false };
      this.save(next);
      log.info('admin_unban', { admin, account, stars: next.stars });
      return next;
    })();
  }

  // ---- internals ----

  private ensureAuthorized(caller: string): void {
    if (!this.authorized.has(caller)) throw new ProtocolError('Unauthorized', { module: 'reputation', caller });
  }

  private ensureAdmin(caller: string): void {
    if (caller !== this.params.admin_account) throw new ProtocolError('NotAdmin', { caller });
  }

  private ensureRecord(account: Account): ReputationRecord {
    const existing = this.getRecord(account);
    if (existing) return existing;
    const now = this.clock();
    const stars = this.params.starting_stars;
    const rec: ReputationRecord = { account, stars, staked_stars: 0, banned: stars === 0, first_seen: now, updated_at: now };
    this.db.prepare('INSERT INTO reputation_records(account, stars, staked_stars, banned, first_seen, updated_at) VALUES (?, ?, ?, ?, ?, ?)')
      .run(account, rec.stars, rec.staked_stars, rec.banned ? 1 : 0, rec.first_seen, rec.updated_at);
    log.debug('reputation_created', { account, stars });
    return rec;
  }

  private save(rec: ReputationRecord): void {
    const now = this.clock();
    this.db.prepare('UPDATE reputation_records SET stars = ?, staked_stars = ?, banned = ?, updated_at = ? WHERE account = ?')
      .run(rec.stars, rec.staked_stars, rec.banned ? 1 : 0, now, rec.account);
  }
}
