import { z } from "zod";
import * as db from "../db/database.js";
import type { TradeRow } from "../db/database.js";
import type { AutoHedgeOutput } from "../pipeline/types.js";
import type { Trade, TradeRecord, TradeStatus, User } from "./types.js";

export interface ApiKeyEntry {
  userId: string;
  revoked: boolean;
}

/**
 * The only shared mutable resource. Trades are written as whole records:
 * `replaceTrade` succeeds only against the version the caller read.
 */
export interface TradeStore {
  createUser(user: User, keyHash: string): void;
  getUser(id: string): User | null;
  findUserByUsername(username: string): User | null;
  findUserByEmail(email: string): User | null;
  saveUser(user: User): boolean;

  getApiKey(keyHash: string): ApiKeyEntry | null;
  rotateApiKey(oldHash: string, newHash: string, userId: string): boolean;

  insertTrade(trade: Trade): TradeRecord;
  getTrade(id: string): TradeRecord | null;
  replaceTrade(next: Trade, expectedVersion: number): boolean;
  listTrades(userId: string, opts: { status?: TradeStatus; limit: number; skip: number }): TradeRecord[];
  tradesSince(userId: string, sinceIso: string): TradeRecord[];
  deleteTrade(id: string, userId: string): boolean;
}

const StocksSchema = z.array(z.string());
const StatusSchema = z.enum(["pending", "running", "completed", "failed"]);

const ThesisSchema = z.object({
  id: z.string(),
  stock: z.string(),
  narrative: z.string(),
  attempt: z.number(),
  prior_rejection_rationale: z.string().nullable(),
  generated_at: z.string(),
});

const StockResultSchema = z.object({
  stock: z.string(),
  status: z.enum(["completed", "rejected_exhausted", "failed"]),
  thesis: ThesisSchema.nullable(),
  quant: z
    .object({
      id: z.string(),
      stock: z.string(),
      thesis_ref: z.string(),
      score: z.number(),
      signal: z.enum(["bullish", "bearish", "neutral"]),
      findings: z.string(),
      generated_at: z.string(),
    })
    .nullable(),
  risk: z
    .object({
      id: z.string(),
      stock: z.string(),
      thesis_ref: z.string(),
      quant_ref: z.string(),
      verdict: z.enum(["approved", "rejected"]),
      rationale: z.string(),
      position_size_hint: z.number(),
      generated_at: z.string(),
    })
    .nullable(),
  order: z
    .object({
      id: z.string(),
      stock: z.string(),
      side: z.enum(["buy", "sell"]),
      order_type: z.enum(["market", "limit", "stop_limit"]),
      entry: z.number(),
      exit: z.number(),
      stop: z.number(),
      size: z.number(),
      generated_at: z.string(),
    })
    .nullable(),
  theses: z.array(ThesisSchema),
  failed_stage: z.enum(["thesis", "quant", "risk", "order"]).nullable(),
  error: z.string().nullable(),
  duration_ms: z.number(),
});

const OutputSchema: z.ZodType<AutoHedgeOutput> = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  stocks: z.array(z.string()),
  task: z.string(),
  allocation: z.number(),
  risk_level: z.number().nullable(),
  strategy_type: z.string().nullable(),
  timestamp: z.string(),
  results: z.array(StockResultSchema),
});

function parseOutput(raw: string | null): AutoHedgeOutput | null {
  if (raw === null) return null;
  return OutputSchema.parse(JSON.parse(raw));
}

function toRecord(row: TradeRow): TradeRecord {
  return {
    id: row.id,
    user_id: row.user_id,
    stocks: StocksSchema.parse(JSON.parse(row.stocks)),
    task: row.task,
    allocation: row.allocation,
    strategy_type: row.strategy_type,
    risk_level: row.risk_level,
    status: StatusSchema.parse(row.status),
    created_at: row.created_at,
    executed_at: row.executed_at,
    error: row.error,
    result: parseOutput(row.output),
    version: row.version,
  };
}

function toWrite(trade: Trade): db.TradeWrite {
  return {
    id: trade.id,
    user_id: trade.user_id,
    stocks: JSON.stringify(trade.stocks),
    task: trade.task,
    allocation: trade.allocation,
    strategy_type: trade.strategy_type,
    risk_level: trade.risk_level,
    status: trade.status,
    error: trade.error,
    created_at: trade.created_at,
    executed_at: trade.executed_at,
  };
}

export const sqliteTradeStore: TradeStore = {
  createUser(user, keyHash) {
    db.insertUserWithKey(user, keyHash);
  },
  getUser(id) {
    return db.getUserById(id) ?? null;
  },
  findUserByUsername(username) {
    return db.getUserByUsername(username) ?? null;
  },
  findUserByEmail(email) {
    return db.getUserByEmail(email) ?? null;
  },
  saveUser(user) {
    return db.updateUser(user);
  },

  getApiKey(keyHash) {
    const row = db.getApiKeyByHash(keyHash);
    return row ? { userId: row.user_id, revoked: row.revoked === 1 } : null;
  },
  rotateApiKey(oldHash, newHash, userId) {
    return db.rotateApiKey(oldHash, newHash, userId);
  },

  insertTrade(trade) {
    db.insertTrade(toWrite(trade));
    return { ...trade, version: 1 };
  },
  getTrade(id) {
    const row = db.getTradeById(id);
    return row ? toRecord(row) : null;
  },
  replaceTrade(next, expectedVersion) {
    const output = next.result ? JSON.stringify(next.result) : null;
    return db.replaceTrade(toWrite(next), output, expectedVersion);
  },
  listTrades(userId, opts) {
    return db.queryTrades({ userId, ...opts }).map(toRecord);
  },
  tradesSince(userId, sinceIso) {
    return db.getTradesSince(userId, sinceIso).map(toRecord);
  },
  deleteTrade(id, userId) {
    return db.deleteTrade(id, userId);
  },
};
