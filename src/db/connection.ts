import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { VERBOSE, sqlTracer } from "../util/verbose.js";
import { migrateLedgerDb } from "./migrate.js";
import { withScope } from "../log.js";

const log = withScope("db");

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

export type OpenDbOptions = {
  /** SQL statement tracing; defaults to VERBOSE. */
  verbose?: boolean;
};

export function openDb(filePath = ":memory:", opts: OpenDbOptions = {}): Database.Database {
  const inMemory = filePath === ":memory:";
  if (!inMemory) ensureDirExists(path.dirname(path.resolve(filePath)));
  const db = new Database(inMemory ? filePath : path.resolve(filePath), {
    fileMustExist: false,
    verbose: sqlTracer(opts.verbose ?? VERBOSE),
  });
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrateLedgerDb(db);
  log.info("ledger_db_open", { path: filePath });
  return db;
}

export function closeDb(db: Database.Database): void {
  if (db.open) db.close();
}
