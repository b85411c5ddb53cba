// Fixed-point amounts. Two scales exist: ledger (stored balances, loan principals)
// and transfer (every value movement in or out). They differ by SCALE_RATIO.

import { ProtocolError } from '../util/errors.js';

export const LEDGER_DECIMALS = 10;
export const TRANSFER_DECIMALS = 18;
export const SCALE_RATIO = 10n ** BigInt(TRANSFER_DECIMALS - LEDGER_DECIMALS); // 1e8

/** Unsigned 128-bit domain. */
export const AMOUNT_MAX = (1n << 128n) - 1n;

/** Rates, utilization and exposure cap: 1e9 == 100%. */
export const RATE_SCALE = 1_000_000_000n;

declare const ledgerBrand: unique symbol;
declare const transferBrand: unique symbol;

export type LedgerAmount = bigint & { readonly [ledgerBrand]: true };
export type TransferAmount = bigint & { readonly [transferBrand]: true };

function checkDomain(v: bigint, what: string): void {
  if (v < 0n) throw new ProtocolError('InvalidValue', { what, value: v.toString() });
  if (v > AMOUNT_MAX) throw new ProtocolError('Overflow', { what, value: v.toString() });
}

function isLedgerAmount(v: bigint): v is LedgerAmount {
  return v >= 0n && v <= AMOUNT_MAX;
}

function isTransferAmount(v: bigint): v is TransferAmount {
  return v >= 0n && v <= AMOUNT_MAX;
}

export function ledger(v: bigint): LedgerAmount {
  checkDomain(v, 'ledger');
  if (!isLedgerAmount(v)) throw new ProtocolError('Overflow', { what: 'ledger' });
  return v;
}

export function transfer(v: bigint): TransferAmount {
  checkDomain(v, 'transfer');
  if (!isTransferAmount(v)) throw new ProtocolError('Overflow', { what: 'transfer' });
  return v;
}

export const ZERO_LEDGER: LedgerAmount = ledger(0n);
export const ZERO_TRANSFER: TransferAmount = transfer(0n);

/** Exact: ledger -> transfer is multiplication by the ratio. */
export function toTransfer(v: LedgerAmount): TransferAmount {
  return transfer(v * SCALE_RATIO);
}

/** Lossy: anything below the ratio is truncated (rounds toward zero). */
export function toLedger(v: TransferAmount): LedgerAmount {
  return ledger(v / SCALE_RATIO);
}

/** The part of a transfer-scale value that `toLedger` drops. */
export function transferRemainder(v: TransferAmount): TransferAmount {
  return transfer(v % SCALE_RATIO);
}

export function addLedger(a: LedgerAmount, b: LedgerAmount): LedgerAmount {
  return ledger(a + b);
}

/** Throws InvalidValue when b > a; callers check their own precondition first. */
export function subLedger(a: LedgerAmount, b: LedgerAmount): LedgerAmount {
  return ledger(a - b);
}

export function addTransfer(a: TransferAmount, b: TransferAmount): TransferAmount {
  return transfer(a + b);
}

export function subTransfer(a: TransferAmount, b: TransferAmount): TransferAmount {
  return transfer(a - b);
}

/** floor(v * num / den), with the intermediate product held to the amount domain. */
export function mulDivLedger(v: LedgerAmount, num: bigint, den: bigint): LedgerAmount {
  if (den <= 0n) throw new ProtocolError('InvalidValue', { what: 'denominator', value: den.toString() });
  const product = v * num;
  if (product > AMOUNT_MAX * den) throw new ProtocolError('Overflow', { what: 'mulDiv' });
  return ledger(product / den);
}

export type ParseUnitsErr =
  | { code: 'bad_number'; raw: string }
  | { code: 'negative'; raw: string }
  | { code: 'too_precise'; raw: string; decimals: number };

export class AmountParseError extends Error {
  err: ParseUnitsErr;
  constructor(err: ParseUnitsErr) {
    super(err.code);
    this.name = 'AmountParseError';
    this.err = err;
  }
}

/**
 * Parse a human decimal ("1,250.5", "1_000", "0.75") into an integer scaled by 10^decimals.
 * Digits beyond `decimals` are rejected rather than rounded.
 */
export function parseUnits(raw: string, decimals: number): bigint {
  const s = raw.trim().replace(/[,_\s]/g, '');
  if (s.startsWith('-')) throw new AmountParseError({ code: 'negative', raw });
  const m = /^(\d*)(?:\.(\d*))?$/.exec(s);
  if (!m || (!m[1] && !m[2])) throw new AmountParseError({ code: 'bad_number', raw });
  const whole = m[1] || '0';
  const frac = m[2] ?? '';
  if (frac.length > decimals) throw new AmountParseError({ code: 'too_precise', raw, decimals });
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(frac.padEnd(decimals, '0') || '0');
}

/** Inverse of parseUnits; trailing fractional zeros are dropped. */
export function formatUnits(v: bigint, decimals: number): string {
  const neg = v < 0n;
  const abs = neg ? -v : v;
  const base = 10n ** BigInt(decimals);
  const whole = (abs / base).toString();
  const frac = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  return `${neg ? '-' : ''}${whole}${frac ? `.${frac}` : ''}`;
}

export function parseLedger(raw: string): LedgerAmount {
  return ledger(parseUnits(raw, LEDGER_DECIMALS));
}

export function parseTransfer(raw: string): TransferAmount {
  return transfer(parseUnits(raw, TRANSFER_DECIMALS));
}

export function formatLedger(v: LedgerAmount): string {
  return formatUnits(v, LEDGER_DECIMALS);
}

export function formatTransfer(v: TransferAmount): string {
  return formatUnits(v, TRANSFER_DECIMALS);
}
