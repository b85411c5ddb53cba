import { DAY, T0, TestProtocol, rejection, seedDeposit, seedVoucher, setup, teardown, units, value } from './helpers.js';

// 10_000 units from a plain lender plus the voucher's 1_000: the voucher's
// 10% pledge (100 units) sits under the 5% exposure cap (550 units).
describe('lending life-cycle', () => {
  let p: TestProtocol;

  beforeEach(() => {
    p = setup();
    seedDeposit(p, 'lender', 10_000);
    seedVoucher(p, 'voucher', 100, 1_000);
  });

  afterEach(() => teardown(p));

  function requestAndVouch() {
    const loan = p.loans.requestLoan('borrower', units(500));
    return p.loans.vouchForLoan('voucher', loan.id, 10, 10);
  }

  test('A: a fresh account requests a tier-1 loan', () => {
    const loan = p.loans.requestLoan('borrower', units(500));
    expect(loan).toEqual({
      id: 1,
      borrower: 'borrower',
      principal: units(500),
      interest_rate: 93_000_000n,
      repayment_amount: 5_465_000_000_000n,
      tier: 1,
      term_start: null,
      term_duration: p.params.loan_term_default_ms,
      status: 'pending',
      created_at: T0,
      closed_at: null,
      vouchers: [],
    });
    expect(p.reputation.getStars('borrower')).toBe(7);
    expect(p.loans.getAllPendingLoans()).toEqual([1]);
    expect(p.loans.getAllActiveLoans()).toEqual([]);
    expect(p.pool.getState().total_borrowed).toBe(0n);
  });

  test('B: one vouch meets tier 1 and disburses', () => {
    const loan = requestAndVouch();
    expect(loan).toMatchObject({ status: 'active', term_start: T0, vouchers: ['voucher'] });
    expect(p.pool.getState().total_borrowed).toBe(units(500));
    expect(p.wallet.getBalance('borrower')).toBe(value(500));
    expect(p.reputation.getRecord('voucher')).toMatchObject({ stars: 100, staked_stars: 10 });
    expect(p.pool.getDeposit('voucher').earmarked).toBe(units(100));
    expect(p.loans.getAllPendingLoans()).toEqual([]);
    expect(p.loans.getAllActiveLoans()).toEqual([1]);
  });

  test('C: exact repayment settles the loan and the vouch', () => {
    requestAndVouch();
    p.wallet.fund('borrower', value('46.5'));
    const due = p.loans.getRepaymentAmount(1);
    expect(due).toEqual({ ledger: 5_465_000_000_000n, transfer: 546_500_000_000_000_000_000n });

    const loan = p.loans.repayLoan('borrower', 1, due.transfer);
    expect(loan).toMatchObject({ status: 'repaid', closed_at: T0 });
    // 100 - 10 staked + 10 returned + boost
    expect(p.reputation.getRecord('voucher')).toMatchObject({ stars: 102, staked_stars: 0 });
    expect(p.pool.getDeposit('voucher').earmarked).toBe(0n);
    expect(p.vouches.getVouch(1, 'voucher')?.status).toBe('fulfilled');
    expect(p.wallet.getBalance('borrower')).toBe(0n);

    // interest 46.5 units: 20% reserve, 80% to depositors
    expect(p.pool.getState()).toMatchObject({
      total_borrowed: 0n,
      reserve: 93_000_000_000n,
      total_liquidity: 110_372_000_000_000n,
    });
    expect(p.pool.getDeposit('lender').accrued_yield).toBe(338_181_818_181n);
    expect(p.reputation.getLoanHistory('borrower')).toEqual([{ loan_id: 1, amount: units(500), repaid: true, created_at: T0 }]);
    expect(p.reputation.getVouchHistory('voucher')).toEqual([{ loan_id: 1, borrower: 'borrower', successful: true, created_at: T0 }]);
    expect(p.loans.getAllActiveLoans()).toEqual([]);
  });

  test('C: repaying after the cooldown earns the borrower a star', () => {
    requestAndVouch();
    p.time.advance(2 * DAY);
    p.wallet.fund('borrower', value('46.5'));
    p.loans.repayLoan('borrower', 1, p.loans.getRepaymentAmount(1).transfer);
    expect(p.reputation.getStars('borrower')).toBe(8);
  });

  test('D: an expired loan defaults', () => {
    requestAndVouch();
    p.time.advance(p.params.loan_term_default_ms - 1);
    expect(rejection(() => p.loans.checkDefault(1)).code).toBe('LoanNotOverdue');

    p.time.advance(1);
    const loan = p.loans.checkDefault(1);
    expect(loan).toMatchObject({ status: 'defaulted', closed_at: T0 + p.params.loan_term_default_ms });

    // 500 stars owed, 7 held
    expect(p.reputation.getRecord('borrower')).toMatchObject({ stars: 0, banned: true });
    expect(p.reputation.getRecord('voucher')).toMatchObject({ stars: 90, staked_stars: 0 });
    expect(p.pool.getDeposit('voucher')).toMatchObject({ principal: units(900), earmarked: 0n });
    // the slashed pledge pays down the defaulted principal
    expect(p.pool.getState()).toMatchObject({
      total_liquidity: units(10_900),
      total_borrowed: units(400),
      reserve: 0n,
    });
    expect(p.vouches.getVouch(1, 'voucher')?.status).toBe('defaulted');
    expect(p.reputation.getLoanHistory('borrower')[0]).toMatchObject({ loan_id: 1, repaid: false });
    expect(p.reputation.getVouchHistory('voucher')[0]).toMatchObject({ loan_id: 1, successful: false });

    expect(rejection(() => p.loans.checkDefault(1)).code).toBe('LoanNotActive');
    expect(rejection(() => p.loans.repayLoan('borrower', 1, value(1))).code).toBe('LoanNotActive');
  });

  test('E: vouching on an active loan is refused and nothing is disbursed twice', () => {
    requestAndVouch();
    seedVoucher(p, 'second', 100, 1_000);
    expect(rejection(() => p.loans.vouchForLoan('second', 1, 10, 10)).code).toBe('LoanNotPending');
    expect(p.pool.getState().total_borrowed).toBe(units(500));
    expect(p.wallet.getBalance('borrower')).toBe(value(500));
    expect(p.reputation.getRecord('second')).toMatchObject({ staked_stars: 0 });
    expect(p.loans.getLoan(1)?.vouchers).toEqual(['voucher']);
  });
});
