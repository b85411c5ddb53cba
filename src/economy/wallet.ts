import type Database from 'better-sqlite3';
import { z } from 'zod';
import { Account, Clock, systemClock } from '../core/principals.js';
import { bigintText, intCol, parseRows } from '../core/rows.js';
import { TransferAmount, ZERO_TRANSFER, addTransfer, subTransfer, transfer } from '../lib/amount.js';
import { withScope } from '../log.js';
import { ProtocolError } from '../util/errors.js';

const log = withScope('wallet');

export type WalletTransaction = {
  id: number;
  account: Account;
  delta: bigint;
  reason: string | null;
  created_at: number;
};

const txRow = z.object({
  id: intCol,
  account: z.string(),
  delta: z.union([z.string(), z.number()]).transform((v) => BigInt(v)),
  reason: z.string().nullable(),
  created_at: intCol,
});

const balanceRow = z.object({ balance: bigintText }).optional();

/**
 * Value at transfer scale, per account. Every movement in or out of the lending
 * ledgers is a wallet transfer, journaled in `transactions`.
 */
export class Wallet {
  constructor(private readonly db: Database.Database, private readonly clock: Clock = systemClock) {}

  getBalance(account: Account): TransferAmount {
    const row = balanceRow.parse(this.db.prepare('SELECT balance FROM balances WHERE account = ?').get(account));
    return row ? transfer(row.balance) : ZERO_TRANSFER;
  }

  /** Value entering the system from outside. */
  fund(account: Account, amount: TransferAmount, reason = 'fund'): TransferAmount {
    if (amount === 0n) throw new ProtocolError('ZeroAmount', { op: 'fund' });
    return this.db.transaction(() => {
      const next = addTransfer(this.getBalance(account), amount);
      this.write(account, next, amount, reason);
      log.info('wallet_funded', { account, amount, reason });
      return next;
    })();
  }

  transfer(from: Account, to: Account, amount: TransferAmount, reason: string): { from: TransferAmount; to: TransferAmount } {
    if (amount === 0n) throw new ProtocolError('ZeroAmount', { op: 'transfer' });
    return this.db.transaction(() => {
      const fromBal = this.getBalance(from);
      if (fromBal < amount) {
        throw new ProtocolError('InsufficientBalance', { account: from, balance: fromBal, needed: amount });
      }
      const newFrom = subTransfer(fromBal, amount);
      this.write(from, newFrom, -amount, `${reason}:out`);
      // Read after the debit so from === to nets to zero.
      const newTo = addTransfer(this.getBalance(to), amount);
      this.write(to, newTo, amount, `${reason}:in`);
      return { from: from === to ? newTo : newFrom, to: newTo };
    })();
  }

  listTransactions(account: Account): WalletTransaction[] {
    const rows = this.db.prepare('SELECT id, account, delta, reason, created_at FROM transactions WHERE account = ? ORDER BY id ASC').all(account);
    return parseRows(txRow, rows);
  }

  private write(account: Account, balance: TransferAmount, delta: bigint, reason: string): void {
    const now = this.clock();
    this.db.prepare(
      'INSERT INTO balances(account, balance, updated_at) VALUES(?, ?, ?) ON CONFLICT(account) DO UPDATE SET balance = excluded.balance, updated_at = excluded.updated_at',
    ).run(account, balance.toString(), now);
    this.db.prepare('INSERT INTO transactions(account, delta, reason, created_at) VALUES (?, ?, ?, ?)').run(account, delta.toString(), reason, now);
  }
}
