export const walletTables = {
  name: '005_wallet',
  sql: `
CREATE TABLE IF NOT EXISTS balances(
  account TEXT PRIMARY KEY,
  balance TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS transactions(
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  account TEXT NOT NULL,
  delta TEXT NOT NULL,
  reason TEXT,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_transactions_account ON transactions(account, id);
`,
};
