import type { ParameterSet } from '../config/index.js';
import { LedgerAmount, RATE_SCALE, addLedger, mulDivLedger } from '../lib/amount.js';
import { clampRate } from '../pool/rate.js';
import { ProtocolError } from '../util/errors.js';
import { Loan, TierRequirement } from './types.js';

/** Tier for a principal: whole units (principal / tier_unit) below a tier's breakpoint. */
export function requirementsFor(amount: LedgerAmount, params: ParameterSet): TierRequirement {
  const units = amount / BigInt(params.tier_unit);
  for (let i = 0; i < params.tiers.length; i++) {
    const t = params.tiers[i];
    if (t.max_units === null || units < BigInt(t.max_units)) {
      return { tier: i + 1, min_stars: t.min_stars, min_vouchers: t.min_vouchers };
    }
  }
  // unreachable with a validated parameter set: the last tier is unbounded
  throw new ProtocolError('InvalidValue', { what: 'tiers', amount });
}

export function starDiscountPercent(stars: number, params: ParameterSet): number {
  return Math.min(stars * params.star_discount_percent_per_star, params.max_star_discount_percent);
}

// rate - rate * discount%, clamped to [0, max_rate]
export function adjustRateByStars(rate: bigint, stars: number, params: ParameterSet): bigint {
  const pct = BigInt(starDiscountPercent(stars, params));
  return clampRate(rate - (rate * pct) / 100n, params.max_rate);
}

/** principal + floor(principal * rate / RATE_SCALE). Throws Overflow past the amount domain. */
export function repaymentAmount(principal: LedgerAmount, rate: bigint): LedgerAmount {
  return addLedger(principal, mulDivLedger(principal, rate, RATE_SCALE));
}

/** Stars a defaulting borrower loses: one per default_slash_unit of principal, at least one. */
export function starsToSlash(principal: LedgerAmount, params: ParameterSet): number {
  const n = principal / BigInt(params.default_slash_unit);
  if (n < 1n) return 1;
  return n > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(n);
}

export function dueAt(loan: Pick<Loan, 'term_start' | 'term_duration'>, params: ParameterSet): number | null {
  if (loan.term_start === null) return null;
  return loan.term_start + loan.term_duration + params.default_grace_ms;
}

export function isOverdue(loan: Pick<Loan, 'term_start' | 'term_duration'>, now: number, params: ParameterSet): boolean {
  const due = dueAt(loan, params);
  return due !== null && now >= due;
}
