import { createProtocol, LoanOrchestrator, VouchRegistry } from '../../src/index.js';
import type { Resolution } from '../../src/index.js';
import { makeParams } from '../../src/config/index.js';
import { openDb } from '../../src/db/connection.js';
import { isProtocolError } from '../../src/util/errors.js';
import { DAY, T0, TestProtocol, rejection, seedDeposit, seedVoucher, setup, teardown, units, value } from './helpers.js';

class OfflineResolver extends VouchRegistry {
  override resolveLoan(): Resolution {
    throw new Error('resolver offline');
  }
}

describe('cross-module atomicity', () => {
  let p: TestProtocol;

  afterEach(() => teardown(p));

  test('a failed disbursement rolls back the vouch that triggered it', () => {
    // 100 units of liquidity cannot fund a 500 unit loan
    p = setup({ exposure_cap: 1_000_000_000 });
    seedVoucher(p, 'voucher', 100, 100);
    p.loans.requestLoan('borrower', units(500));

    const err = rejection(() => p.loans.vouchForLoan('voucher', 1, 10, 10));
    expect(err.code).toBe('DisbursementFailed');
    expect(isProtocolError(err.cause, 'UnavailableFunds')).toBe(true);

    expect(p.loans.getLoan(1)).toMatchObject({ status: 'pending', vouchers: [] });
    expect(p.vouches.getVouchesForLoan(1)).toEqual([]);
    expect(p.reputation.getRecord('voucher')).toMatchObject({ stars: 100, staked_stars: 0 });
    expect(p.pool.getDeposit('voucher').earmarked).toBe(0n);
    expect(p.pool.getState().total_borrowed).toBe(0n);
    expect(p.wallet.getBalance('borrower')).toBe(0n);
  });

  test('a repayment the borrower cannot cover leaves the loan active', () => {
    p = setup();
    seedDeposit(p, 'lender', 10_000);
    seedVoucher(p, 'voucher', 100, 1_000);
    p.loans.requestLoan('borrower', units(500));
    p.loans.vouchForLoan('voucher', 1, 10, 10);

    const err = rejection(() => p.loans.repayLoan('borrower', 1, p.loans.getRepaymentAmount(1).transfer));
    expect(err.code).toBe('RepaymentFailed');
    expect(isProtocolError(err.cause, 'TransactionFailed')).toBe(true);
    expect(p.loans.getLoan(1)?.status).toBe('active');
    expect(p.wallet.getBalance('borrower')).toBe(value(500));
    expect(p.pool.getState().total_borrowed).toBe(units(500));
  });

  describe('with a vouch registry that fails to resolve', () => {
    let loans: LoanOrchestrator;

    beforeEach(() => {
      p = setup();
      const resolver = new OfflineResolver(p.db, p.params, p.reputation, p.pool, p.time.now);
      loans = new LoanOrchestrator(p.db, p.params, p.reputation, p.pool, resolver, p.time.now);
      seedDeposit(p, 'lender', 10_000);
      seedVoucher(p, 'voucher', 100, 1_000);
      loans.requestLoan('borrower', units(500));
      loans.vouchForLoan('voucher', 1, 10, 10);
    });

    test('default settlement applies all or nothing', () => {
      p.time.advance(30 * DAY);
      const err = rejection(() => loans.checkDefault(1));
      expect(err.code).toBe('ResolveFailed');

      expect(loans.getLoan(1)?.status).toBe('active');
      expect(loans.getAllActiveLoans()).toEqual([1]);
      expect(p.reputation.getRecord('borrower')).toMatchObject({ stars: 7, banned: false });
      expect(p.reputation.getRecord('voucher')).toMatchObject({ stars: 100, staked_stars: 10 });
      expect(p.pool.getState()).toMatchObject({ total_borrowed: units(500), total_liquidity: units(11_000) });
      expect(p.reputation.getLoanHistory('borrower')).toEqual([]);
    });

    test('repayment applies all or nothing', () => {
      p.wallet.fund('borrower', value('46.5'));
      const err = rejection(() => loans.repayLoan('borrower', 1, loans.getRepaymentAmount(1).transfer));
      expect(err.code).toBe('ResolveFailed');
      expect(loans.getLoan(1)?.status).toBe('active');
      expect(p.wallet.getBalance('borrower')).toBe(value('546.5'));
      expect(p.pool.getState()).toMatchObject({ total_borrowed: units(500), reserve: 0n });
    });
  });
});

describe('re-entrancy', () => {
  test('a call that re-enters the orchestrator mid-operation is rejected', () => {
    let reenter: (() => void) | null = null;
    const clock = () => {
      const f = reenter;
      reenter = null;
      if (f) f();
      return T0;
    };
    const p = createProtocol({ db: openDb(':memory:'), params: makeParams(), clock });
    try {
      reenter = () => {
        p.loans.requestLoan('intruder', units(10));
      };
      expect(rejection(() => p.loans.requestLoan('borrower', units(500))).code).toBe('ReentrantCall');
      expect(p.loans.getLoansByBorrower('borrower')).toEqual([]);
      expect(p.loans.getLoansByBorrower('intruder')).toEqual([]);
      expect(p.reputation.getRecord('borrower')).toBeNull();

      // the guard is released afterwards
      expect(p.loans.requestLoan('borrower', units(500)).id).toBe(1);
    } finally {
      p.db.close();
    }
  });
});
