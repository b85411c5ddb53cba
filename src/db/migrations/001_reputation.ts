export const reputationTables = {
  name: '001_reputation',
  sql: `
CREATE TABLE IF NOT EXISTS reputation_records(
  account TEXT PRIMARY KEY,
  stars INTEGER NOT NULL CHECK (stars >= 0),
  staked_stars INTEGER NOT NULL DEFAULT 0 CHECK (staked_stars >= 0 AND staked_stars <= stars),
  banned INTEGER NOT NULL DEFAULT 0,
  first_seen INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  CHECK ((banned = 1) = (stars = 0))
);
CREATE TABLE IF NOT EXISTS reputation_vouch_history(
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  account TEXT NOT NULL,
  loan_id INTEGER NOT NULL,
  borrower TEXT NOT NULL,
  successful INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_rep_vouch_history_account ON reputation_vouch_history(account);
CREATE TABLE IF NOT EXISTS reputation_loan_history(
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  account TEXT NOT NULL,
  loan_id INTEGER NOT NULL,
  amount TEXT NOT NULL,
  repaid INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_rep_loan_history_account ON reputation_loan_history(account);
`,
};
