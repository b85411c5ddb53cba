import { closeProtocol, createProtocol, Protocol } from '../../src/index.js';
import { makeParams } from '../../src/config/index.js';
import { openDb } from '../../src/db/connection.js';
import { LedgerAmount, TransferAmount, parseLedger, toTransfer } from '../../src/lib/amount.js';
import { isProtocolError } from '../../src/util/errors.js';

export const T0 = 1_700_000_000_000;
export const DAY = 86_400_000;

export type TestProtocol = Protocol & {
  time: { now: () => number; advance: (ms: number) => void };
};

/** Fresh in-memory protocol on a manual clock starting at T0. */
export function setup(overrides: Parameters<typeof makeParams>[0] = {}): TestProtocol {
  let now = T0;
  const p = createProtocol({ db: openDb(':memory:'), params: makeParams(overrides), clock: () => now });
  return {
    ...p,
    time: {
      now: () => now,
      advance: (ms) => {
        now += ms;
      },
    },
  };
}

export function teardown(p: Protocol): void {
  closeProtocol(p);
}

export const units = (v: string | number): LedgerAmount => parseLedger(String(v));
export const value = (v: string | number): TransferAmount => toTransfer(units(v));

export function seedDeposit(p: Protocol, account: string, amount: string | number): void {
  p.wallet.fund(account, value(amount));
  p.pool.deposit(account, value(amount));
}

export function seedVoucher(p: Protocol, account: string, stars: number, deposit: string | number): void {
  p.reputation.adminSetStars(p.params.admin_account, account, stars);
  seedDeposit(p, account, deposit);
}

/** Runs `fn` expecting a protocol error; returns it for inspection. */
export function rejection(fn: () => unknown) {
  try {
    fn();
  } catch (e) {
    if (isProtocolError(e)) return e;
    throw e;
  }
  throw new Error('expected the call to be rejected');
}
