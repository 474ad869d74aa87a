import Database, { type Database as DatabaseType } from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { config } from "../config.js";
import { logDb } from "../logging.js";

const dbPath = config.workspace.dbPath;
if (dbPath !== ":memory:") {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

const db: DatabaseType = new Database(dbPath);

// WAL mode keeps readers from blocking the completion writes
db.pragma("journal_mode = WAL");
db.pragma("synchronous = NORMAL");
db.pragma("foreign_keys = ON");

// ── Schema ───────────────────────────────────────────────────────────────

db.exec(`
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    fund_name TEXT NOT NULL,
    fund_description TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  -- Only the sha-256 of a key is stored; revoked rows are kept so a key is never reissued
  CREATE TABLE IF NOT EXISTS api_keys (
    key_hash TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    created_at TEXT NOT NULL,
    revoked INTEGER NOT NULL DEFAULT 0,
    revoked_at TEXT
  );

  CREATE TABLE IF NOT EXISTS trades (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    stocks TEXT NOT NULL,       -- JSON array
    task TEXT NOT NULL,
    allocation REAL NOT NULL,
    strategy_type TEXT,
    risk_level INTEGER,
    status TEXT NOT NULL DEFAULT 'pending',
    error TEXT,
    created_at TEXT NOT NULL,
    executed_at TEXT,
    version INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS trade_results (
    trade_id TEXT PRIMARY KEY REFERENCES trades(id) ON DELETE CASCADE,
    output TEXT NOT NULL,       -- JSON AutoHedgeOutput
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_api_keys_user ON api_keys(user_id);
  CREATE INDEX IF NOT EXISTS idx_trades_user_created ON trades(user_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_trades_user_status ON trades(user_id, status);
`);

logDb.debug({ dbPath }, "Database opened");

// ── Row types ────────────────────────────────────────────────────────────

export interface UserRow {
  id: string;
  username: string;
  email: string;
  fund_name: string;
  fund_description: string;
  created_at: string;
}

export interface ApiKeyRow {
  key_hash: string;
  user_id: string;
  created_at: string;
  revoked: number;
  revoked_at: string | null;
}

export interface TradeRow {
  id: string;
  user_id: string;
  stocks: string;
  task: string;
  allocation: number;
  strategy_type: string | null;
  risk_level: number | null;
  status: string;
  error: string | null;
  created_at: string;
  executed_at: string | null;
  version: number;
  /** Joined from trade_results */
  output: string | null;
}

export type TradeWrite = Omit<TradeRow, "version" | "output">;

// ── Prepared statements ──────────────────────────────────────────────────

const TRADE_SELECT = `
  SELECT t.*, r.output AS output
  FROM trades t LEFT JOIN trade_results r ON r.trade_id = t.id
`;

const stmts = {
  // Users
  insertUser: db.prepare<UserRow>(`
    INSERT INTO users (id, username, email, fund_name, fund_description, created_at)
    VALUES (@id, @username, @email, @fund_name, @fund_description, @created_at)
  `),
  getUserById: db.prepare<[string], UserRow>(`SELECT * FROM users WHERE id = ?`),
  getUserByUsername: db.prepare<[string], UserRow>(`SELECT * FROM users WHERE username = ?`),
  getUserByEmail: db.prepare<[string], UserRow>(`SELECT * FROM users WHERE email = ?`),
  updateUser: db.prepare<Pick<UserRow, "id" | "email" | "fund_name" | "fund_description">>(`
    UPDATE users SET email = @email, fund_name = @fund_name, fund_description = @fund_description
    WHERE id = @id
  `),

  // API keys
  insertApiKey: db.prepare<[string, string, string]>(`
    INSERT INTO api_keys (key_hash, user_id, created_at) VALUES (?, ?, ?)
  `),
  getApiKey: db.prepare<[string], ApiKeyRow>(`SELECT * FROM api_keys WHERE key_hash = ?`),
  revokeApiKey: db.prepare<[string, string]>(`
    UPDATE api_keys SET revoked = 1, revoked_at = ? WHERE key_hash = ? AND revoked = 0
  `),

  // Trades
  insertTrade: db.prepare<TradeWrite>(`
    INSERT INTO trades (id, user_id, stocks, task, allocation, strategy_type, risk_level, status, error, created_at, executed_at)
    VALUES (@id, @user_id, @stocks, @task, @allocation, @strategy_type, @risk_level, @status, @error, @created_at, @executed_at)
  `),
  replaceTrade: db.prepare<TradeWrite & { expected_version: number }>(`
    UPDATE trades
    SET stocks = @stocks, task = @task, allocation = @allocation, strategy_type = @strategy_type,
        risk_level = @risk_level, status = @status, error = @error, executed_at = @executed_at,
        version = version + 1
    WHERE id = @id AND user_id = @user_id AND created_at = @created_at AND version = @expected_version
  `),
  upsertResult: db.prepare<[string, string, string]>(`
    INSERT OR REPLACE INTO trade_results (trade_id, output, created_at) VALUES (?, ?, ?)
  `),
  deleteResult: db.prepare<[string]>(`DELETE FROM trade_results WHERE trade_id = ?`),
  getTradeById: db.prepare<[string], TradeRow>(`${TRADE_SELECT} WHERE t.id = ?`),
  queryTrades: db.prepare<[string, number, number], TradeRow>(`
    ${TRADE_SELECT} WHERE t.user_id = ?
    ORDER BY t.created_at DESC, t.rowid DESC LIMIT ? OFFSET ?
  `),
  queryTradesByStatus: db.prepare<[string, string, number, number], TradeRow>(`
    ${TRADE_SELECT} WHERE t.user_id = ? AND t.status = ?
    ORDER BY t.created_at DESC, t.rowid DESC LIMIT ? OFFSET ?
  `),
  queryTradesSince: db.prepare<[string, string], TradeRow>(`
    ${TRADE_SELECT} WHERE t.user_id = ? AND t.created_at >= ?
    ORDER BY t.created_at DESC, t.rowid DESC
  `),
  deleteTrade: db.prepare<[string, string]>(`DELETE FROM trades WHERE id = ? AND user_id = ?`),
};

// ── Users ────────────────────────────────────────────────────────────────

export function getUserById(id: string): UserRow | undefined {
  return stmts.getUserById.get(id);
}

export function getUserByUsername(username: string): UserRow | undefined {
  return stmts.getUserByUsername.get(username);
}

export function getUserByEmail(email: string): UserRow | undefined {
  return stmts.getUserByEmail.get(email);
}

export function updateUser(row: Pick<UserRow, "id" | "email" | "fund_name" | "fund_description">): boolean {
  const { id, email, fund_name, fund_description } = row;
  return stmts.updateUser.run({ id, email, fund_name, fund_description }).changes > 0;
}

/** Insert a user together with their first key, atomically. */
export const insertUserWithKey = db.transaction((user: UserRow, keyHash: string) => {
  stmts.insertUser.run(user);
  stmts.insertApiKey.run(keyHash, user.id, user.created_at);
});

// ── API keys ─────────────────────────────────────────────────────────────

export function getApiKeyByHash(keyHash: string): ApiKeyRow | undefined {
  return stmts.getApiKey.get(keyHash);
}

/** Revoke `oldHash` and register `newHash` for the same user in one step. */
export const rotateApiKey = db.transaction((oldHash: string, newHash: string, userId: string): boolean => {
  if (stmts.revokeApiKey.run(new Date().toISOString(), oldHash).changes === 0) return false;
  stmts.insertApiKey.run(newHash, userId, new Date().toISOString());
  return true;
});

// ── Trades ───────────────────────────────────────────────────────────────

export function insertTrade(row: TradeWrite): void {
  stmts.insertTrade.run(row);
}

/**
 * Whole-record replacement guarded by `expectedVersion`, together with the
 * trade's result row. Returns false when the trade is gone or was changed
 * since it was read.
 */
export const replaceTrade = db.transaction(
  (row: TradeWrite, output: string | null, expectedVersion: number): boolean => {
    const info = stmts.replaceTrade.run({ ...row, expected_version: expectedVersion });
    if (info.changes === 0) return false;
    if (output !== null) {
      stmts.upsertResult.run(row.id, output, row.executed_at ?? new Date().toISOString());
    } else {
      stmts.deleteResult.run(row.id);
    }
    return true;
  },
);

export function getTradeById(id: string): TradeRow | undefined {
  return stmts.getTradeById.get(id);
}

export function queryTrades(opts: { userId: string; status?: string; limit: number; skip: number }): TradeRow[] {
  if (opts.status) {
    return stmts.queryTradesByStatus.all(opts.userId, opts.status, opts.limit, opts.skip);
  }
  return stmts.queryTrades.all(opts.userId, opts.limit, opts.skip);
}

export function getTradesSince(userId: string, sinceIso: string): TradeRow[] {
  return stmts.queryTradesSince.all(userId, sinceIso);
}

/** Deletes the trade and, by cascade, its result. */
export function deleteTrade(id: string, userId: string): boolean {
  return stmts.deleteTrade.run(id, userId).changes > 0;
}

// ── Lifecycle ────────────────────────────────────────────────────────────

export function getDb(): DatabaseType {
  return db;
}

export function isDbWritable(): boolean {
  try {
    db.exec("SELECT 1");
    return true;
  } catch {
    return false;
  }
}

export function closeDb(): void {
  db.close();
}
