import type Database from 'better-sqlite3';
import { openDb } from '../../db/connection.js';
import { transfer } from '../../lib/amount.js';
import { isProtocolError } from '../../util/errors.js';
import { Wallet } from '../wallet.js';

describe('wallet', () => {
  let db: Database.Database;
  let wallet: Wallet;

  beforeEach(() => {
    db = openDb(':memory:');
    wallet = new Wallet(db, () => 1_000);
  });

  afterEach(() => db.close());

  test('unknown accounts hold nothing', () => {
    expect(wallet.getBalance('nobody')).toBe(0n);
    expect(wallet.listTransactions('nobody')).toEqual([]);
  });

  test('fund credits and journals', () => {
    expect(wallet.fund('alice', transfer(500n))).toBe(500n);
    expect(wallet.getBalance('alice')).toBe(500n);
    expect(() => wallet.fund('alice', transfer(0n))).toThrow(/^ZeroAmount$/);
  });

  test('transfer moves value between accounts', () => {
    wallet.fund('alice', transfer(500n));
    expect(wallet.transfer('alice', 'bob', transfer(200n), 'pay')).toEqual({ from: 300n, to: 200n });
    const tx = wallet.listTransactions('alice');
    expect(tx.map((t) => t.delta)).toEqual([500n, -200n]);
    expect(tx.map((t) => t.reason)).toEqual(['fund', 'pay:out']);
    expect(wallet.listTransactions('bob')[0]).toMatchObject({ account: 'bob', delta: 200n, reason: 'pay:in', created_at: 1_000 });
  });

  test('insufficient balance leaves both sides untouched', () => {
    wallet.fund('alice', transfer(50n));
    let code: string | undefined;
    try {
      wallet.transfer('alice', 'bob', transfer(51n), 'pay');
    } catch (e) {
      if (isProtocolError(e)) code = e.code;
    }
    expect(code).toBe('InsufficientBalance');
    expect(wallet.getBalance('alice')).toBe(50n);
    expect(wallet.getBalance('bob')).toBe(0n);
  });

  test('a self transfer nets to zero', () => {
    wallet.fund('alice', transfer(300n));
    expect(wallet.transfer('alice', 'alice', transfer(100n), 'noop')).toEqual({ from: 300n, to: 300n });
    expect(wallet.getBalance('alice')).toBe(300n);
  });
});
