// Identities modules present to each other when they call a guarded entry point.
// Internal: the package entry point does not export them.
export const LOAN_MANAGER_ID = 'module:loan-manager';
export const VOUCH_REGISTRY_ID = 'module:vouch-registry';

/** Wallet account holding the liquidity pool's custody. */
export const POOL_ACCOUNT = 'module:liquidity-pool';

export type Account = string;

/** Milliseconds since the epoch. Shared by every ledger so timestamps agree. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

const RESERVED = new Set([LOAN_MANAGER_ID, VOUCH_REGISTRY_ID, POOL_ACCOUNT]);

export function isReservedAccount(account: Account): boolean {
  return RESERVED.has(account);
}
