import { z } from 'zod';
import { openDb } from '../../src/db/connection.js';
import { migrateLedgerDb } from '../../src/db/migrate.js';
import { MIGRATIONS } from '../../src/db/migrations/index.js';

const column = z.object({ name: z.string(), type: z.string() });

describe('ledger migrations', () => {
  it('records every migration once', () => {
    const db = openDb(':memory:');
    const names = db.prepare('SELECT name FROM _migrations ORDER BY name').pluck().all();
    expect(names).toEqual(MIGRATIONS.map((m) => m.name));
    expect(migrateLedgerDb(db)).toEqual([]);
    db.close();
  });

  it('stores amounts as TEXT', () => {
    const db = openDb(':memory:');
    const typeOf = (table: string, col: string) =>
      z.array(column).parse(db.prepare(`PRAGMA table_info(${table})`).all()).find((c) => c.name === col)?.type;
    expect(typeOf('balances', 'balance')).toBe('TEXT');
    expect(typeOf('pool_deposits', 'principal')).toBe('TEXT');
    expect(typeOf('loans', 'repayment_amount')).toBe('TEXT');
    expect(typeOf('vouches', 'staked_capital')).toBe('TEXT');
    db.close();
  });

  it('refuses a record that breaks the ban invariant', () => {
    const db = openDb(':memory:');
    const insert = db.prepare('INSERT INTO reputation_records(account, stars, staked_stars, banned, first_seen, updated_at) VALUES (?, ?, ?, ?, 0, 0)');
    expect(() => insert.run('a', 0, 0, 0)).toThrow(/CHECK constraint failed/);
    expect(() => insert.run('b', 5, 6, 0)).toThrow(/CHECK constraint failed/);
    expect(insert.run('c', 5, 5, 0).changes).toBe(1);
    db.close();
  });

  it('refuses unknown loan and vouch statuses', () => {
    const db = openDb(':memory:');
    const loan = db.prepare("INSERT INTO loans(borrower, principal, interest_rate, repayment_amount, tier, term_duration, status, created_at) VALUES ('b', '1', 0, '1', 1, 1, ?, 0)");
    expect(() => loan.run('closed')).toThrow(/CHECK constraint failed/);
    expect(loan.run('pending').changes).toBe(1);
    const vouch = db.prepare("INSERT INTO vouches(loan_id, voucher, borrower, stars_staked, capital_percent, staked_capital, status, created_at) VALUES (1, ?, 'b', 1, 1, '1', ?, 0)");
    expect(() => vouch.run('v1', 'pending')).toThrow(/CHECK constraint failed/);
    expect(vouch.run('v2', 'active').changes).toBe(1);
    db.close();
  });

  it('seeds a single empty pool state row', () => {
    const db = openDb(':memory:');
    expect(db.prepare('SELECT total_liquidity, total_borrowed FROM pool_state').all()).toEqual([{ total_liquidity: '0', total_borrowed: '0' }]);
    db.close();
  });
});
