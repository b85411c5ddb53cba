// Amount columns are decimal TEXT: 18-decimal values do not fit SQLite INTEGER.
export const poolTables = {
  name: '002_pool',
  sql: `
CREATE TABLE IF NOT EXISTS pool_state(
  id INTEGER PRIMARY KEY CHECK (id = 1),
  total_liquidity TEXT NOT NULL,
  total_borrowed TEXT NOT NULL,
  reserve TEXT NOT NULL,
  total_principal TEXT NOT NULL,
  yield_index TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
INSERT OR IGNORE INTO pool_state(id, total_liquidity, total_borrowed, reserve, total_principal, yield_index, updated_at)
VALUES (1, '0', '0', '0', '0', '0', 0);
CREATE TABLE IF NOT EXISTS pool_deposits(
  account TEXT PRIMARY KEY,
  principal TEXT NOT NULL,
  accrued_yield TEXT NOT NULL,
  earmarked TEXT NOT NULL,
  index_snapshot TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);
`,
};
