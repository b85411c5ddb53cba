import type Database from 'better-sqlite3';
import { withScope } from '../log.js';
import { normalizeError, shortStack } from '../utils/errors.js';
import { MIGRATIONS, Migration } from './migrations/index.js';

const log = withScope('db');

function appliedNames(db: Database.Database): Set<string> {
  db.exec('CREATE TABLE IF NOT EXISTS _migrations(name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL);');
  const rows = db.prepare('SELECT name FROM _migrations').pluck().all();
  return new Set(rows.map((r) => String(r)));
}

function apply(db: Database.Database, m: Migration): void {
  const spName = `mig_${m.name.replace(/[^a-zA-Z0-9]/g, '_')}`;
  db.exec(`SAVEPOINT ${spName};`);
  try {
    db.exec(m.sql);
    db.prepare("INSERT INTO _migrations(name, applied_at) VALUES (?, strftime('%s','now'))").run(m.name);
    db.exec(`RELEASE ${spName};`);
    log.debug('migrate', { name: m.name });
  } catch (e) {
    db.exec(`ROLLBACK TO ${spName};`);
    db.exec(`RELEASE ${spName};`);
    log.error('migrate_error', { name: m.name, error: normalizeError(e), stack: shortStack(e), sqlPreview: m.sql.substring(0, 200) });
    throw e;
  }
}

/** Applies every migration not yet recorded in _migrations, in name order. */
export function migrateLedgerDb(db: Database.Database): string[] {
  const applied = appliedNames(db);
  const ran: string[] = [];
  for (const m of [...MIGRATIONS].sort((a, b) => a.name.localeCompare(b.name))) {
    if (applied.has(m.name)) continue;
    apply(db, m);
    ran.push(m.name);
  }
  return ran;
}
