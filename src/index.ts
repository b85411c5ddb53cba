import 'dotenv/config';
import type Database from 'better-sqlite3';
import { ParameterSet, getParams } from './config/index.js';
import { resolveRuntime } from './config/runtime.js';
import { Clock, systemClock } from './core/principals.js';
import { closeDb, openDb } from './db/connection.js';
import { Wallet } from './economy/wallet.js';
import { LoanOrchestrator } from './loans/orchestrator.js';
import { withScope } from './log.js';
import { LiquidityPool } from './pool/liquidityPool.js';
import { ReputationLedger } from './reputation/ledger.js';
import { VouchRegistry } from './vouch/registry.js';

export * from './config/index.js';
export { POOL_ACCOUNT, isReservedAccount, systemClock } from './core/principals.js';
export type { Account, Clock } from './core/principals.js';
export * from './lib/amount.js';
export * from './util/errors.js';
export { normalizeError } from './utils/errors.js';
export { Wallet } from './economy/wallet.js';
export type { WalletTransaction } from './economy/wallet.js';
export { ReputationLedger } from './reputation/ledger.js';
export type * from './reputation/types.js';
export { LiquidityPool, YIELD_INDEX_SCALE } from './pool/liquidityPool.js';
export { borrowRate, utilization } from './pool/rate.js';
export type * from './pool/types.js';
export { VouchRegistry } from './vouch/registry.js';
export type * from './vouch/types.js';
export { LoanOrchestrator } from './loans/orchestrator.js';
export * from './loans/calculator.js';
export type * from './loans/types.js';
export { openDb, closeDb } from './db/connection.js';

const log = withScope('protocol');

export type ProtocolOptions = {
  /** An open database; migrations are not re-run on it. */
  db?: Database.Database;
  /** Used when `db` is not given. Defaults to LENDING_DB_PATH, then ':memory:'. */
  dbPath?: string;
  /** SQL tracing for a database opened here. Defaults to VERBOSE. */
  verbose?: boolean;
  params?: ParameterSet;
  clock?: Clock;
};

export type Protocol = {
  db: Database.Database;
  params: ParameterSet;
  clock: Clock;
  wallet: Wallet;
  reputation: ReputationLedger;
  pool: LiquidityPool;
  vouches: VouchRegistry;
  loans: LoanOrchestrator;
};

/** Opens the ledger database and wires the modules leaves first. */
export function createProtocol(opts: ProtocolOptions = {}): Protocol {
  const runtime = resolveRuntime();
  const db = opts.db ?? openDb(opts.dbPath ?? runtime.dbPath, { verbose: opts.verbose ?? runtime.verbose });
  const params = opts.params ?? getParams();
  const clock = opts.clock ?? systemClock;

  const wallet = new Wallet(db, clock);
  const reputation = new ReputationLedger(db, params, clock);
  const pool = new LiquidityPool(db, params, wallet, clock);
  const vouches = new VouchRegistry(db, params, reputation, pool, clock);
  const loans = new LoanOrchestrator(db, params, reputation, pool, vouches, clock);
  log.info('protocol_ready', { db: db.name, admin: params.admin_account });
  return { db, params, clock, wallet, reputation, pool, vouches, loans };
}

export function closeProtocol(p: Pick<Protocol, 'db'>): void {
  closeDb(p.db);
}
