import { reputationTables } from './001_reputation.js';
import { poolTables } from './002_pool.js';
import { vouchTables } from './003_vouches.js';
import { loanTables } from './004_loans.js';
import { walletTables } from './005_wallet.js';

export type Migration = { name: string; sql: string };

// Each ledger owns the tables in its own migration and never touches another's.
export const MIGRATIONS: readonly Migration[] = [
  reputationTables,
  poolTables,
  vouchTables,
  loanTables,
  walletTables,
];
