export const vouchTables = {
  name: '003_vouches',
  sql: `
CREATE TABLE IF NOT EXISTS vouches(
  loan_id INTEGER NOT NULL,
  voucher TEXT NOT NULL,
  borrower TEXT NOT NULL,
  stars_staked INTEGER NOT NULL,
  capital_percent INTEGER NOT NULL,
  staked_capital TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'fulfilled', 'defaulted')),
  created_at INTEGER NOT NULL,
  resolved_at INTEGER,
  PRIMARY KEY (loan_id, voucher)
);
CREATE INDEX IF NOT EXISTS idx_vouches_voucher_status ON vouches(voucher, status);
`,
};
