import { z } from 'zod';

const RATE_ONE = 1_000_000_000;

const rate = z.number().int().min(0);
const stars = z.number().int().min(0);
const durationMs = z.number().int().min(0);
const amountString = z.string().regex(/^\d+$/, 'expected an integer string');

const tierSchema = z.object({
  max_units: z.number().int().positive().nullable(),
  min_stars: stars,
  min_vouchers: z.number().int().min(0),
}).strict();

export const paramsSchema = z.object({
  base_interest_rate: rate,
  optimal_utilization: z.number().int().min(1).max(RATE_ONE - 1),
  slope1: rate,
  slope2: rate,
  max_rate: rate,
  reserve_factor: z.number().int().min(0).max(100),
  boost: stars,
  min_stars_to_vouch: stars,
  starting_stars: stars,
  cooldown_period_ms: durationMs,
  loan_term_default_ms: z.number().int().positive(),
  default_grace_ms: durationMs,
  exposure_cap: z.number().int().min(0).max(RATE_ONE),
  star_discount_percent_per_star: z.number().int().min(0),
  max_star_discount_percent: z.number().int().min(0).max(100),
  tier_unit: amountString.refine((s) => BigInt(s) > 0n, 'tier_unit must be positive'),
  tiers: z.array(tierSchema).min(1),
  default_slash_unit: amountString.refine((s) => BigInt(s) > 0n, 'default_slash_unit must be positive'),
  repay_reward_stars: stars,
  admin_account: z.string().min(1),
}).strict().superRefine((p, ctx) => {
  const last = p.tiers[p.tiers.length - 1];
  if (last && last.max_units !== null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tiers', p.tiers.length - 1, 'max_units'], message: 'last tier must be unbounded (null)' });
  }
  let prev = 0;
  p.tiers.forEach((t, i) => {
    if (i === p.tiers.length - 1) return;
    if (t.max_units === null || t.max_units <= prev) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tiers', i, 'max_units'], message: 'tier breakpoints must be ascending' });
      return;
    }
    prev = t.max_units;
  });
});

export type ParameterSet = Readonly<z.infer<typeof paramsSchema>>;
export type TierConfig = z.infer<typeof tierSchema>;

export const DEFAULT_PARAMS: ParameterSet = Object.freeze({
  base_interest_rate: 100_000_000, // 10%
  optimal_utilization: 800_000_000, // 80%
  slope1: 40_000_000, // +4% pre-optimal
  slope2: 750_000_000, // +75% post-optimal
  max_rate: 1_000_000_000, // 100%
  reserve_factor: 20,
  boost: 2,
  min_stars_to_vouch: 50,
  starting_stars: 7,
  cooldown_period_ms: 60_000,
  loan_term_default_ms: 2_592_000_000, // 30 days
  default_grace_ms: 0,
  exposure_cap: 50_000_000, // 5%
  star_discount_percent_per_star: 1,
  max_star_discount_percent: 50,
  tier_unit: '10000000000', // one whole unit at ledger scale
  tiers: [
    { max_units: 1000, min_stars: 5, min_vouchers: 1 },
    { max_units: 10000, min_stars: 20, min_vouchers: 2 },
    { max_units: null, min_stars: 50, min_vouchers: 3 },
  ],
  default_slash_unit: '10000000000',
  repay_reward_stars: 1,
  admin_account: 'admin',
});

/** Validate and freeze a parameter set built from defaults plus overrides. */
export function makeParams(overrides: Partial<z.input<typeof paramsSchema>> = {}): ParameterSet {
  return Object.freeze(paramsSchema.parse({ ...DEFAULT_PARAMS, ...overrides }));
}
