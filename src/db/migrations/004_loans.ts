export const loanTables = {
  name: '004_loans',
  sql: `
CREATE TABLE IF NOT EXISTS loans(
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  borrower TEXT NOT NULL,
  principal TEXT NOT NULL,
  interest_rate INTEGER NOT NULL,
  repayment_amount TEXT NOT NULL,
  tier INTEGER NOT NULL,
  term_start INTEGER,
  term_duration INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'active', 'repaid', 'defaulted')),
  created_at INTEGER NOT NULL,
  closed_at INTEGER
);
CREATE INDEX IF NOT EXISTS idx_loans_status ON loans(status, id);
CREATE INDEX IF NOT EXISTS idx_loans_borrower ON loans(borrower, id);
`,
};
