import { beforeEach, describe, expect, it } from "vitest";
import { cleanDb } from "../../../test/helpers.js";
import {
  deleteTrade,
  getApiKeyByHash,
  getDb,
  getTradeById,
  insertTrade,
  insertUserWithKey,
  queryTrades,
  replaceTrade,
  rotateApiKey,
  type TradeWrite,
} from "../database.js";

const USER = {
  id: "u1",
  username: "alice",
  email: "alice@example.com",
  fund_name: "Alice Fund",
  fund_description: "",
  created_at: "2026-03-01T00:00:00.000Z",
};

function trade(id: string, createdAt: string): TradeWrite {
  return {
    id,
    user_id: USER.id,
    stocks: JSON.stringify(["NVDA"]),
    task: "Assess AI accelerator demand",
    allocation: 10_000,
    strategy_type: null,
    risk_level: 5,
    status: "pending",
    error: null,
    created_at: createdAt,
    executed_at: null,
  };
}

describe("database", () => {
  beforeEach(() => {
    cleanDb(getDb());
    insertUserWithKey(USER, "hash-1");
  });

  it("replaceTrade applies only against the expected version", () => {
    const row = trade("t1", "2026-03-01T01:00:00.000Z");
    insertTrade(row);

    expect(replaceTrade({ ...row, status: "running" }, null, 1)).toBe(true);
    expect(replaceTrade({ ...row, status: "failed", error: "stale" }, null, 1)).toBe(false);

    const stored = getTradeById("t1");
    expect(stored).toMatchObject({ status: "running", version: 2, output: null });
  });

  it("writes the result row with the trade and cascades it on delete", () => {
    const row = trade("t1", "2026-03-01T01:00:00.000Z");
    insertTrade(row);
    const done = { ...row, status: "completed", executed_at: "2026-03-01T01:05:00.000Z" };

    expect(replaceTrade(done, '{"results":[]}', 1)).toBe(true);
    expect(getTradeById("t1")?.output).toBe('{"results":[]}');

    expect(deleteTrade("t1", "someone-else")).toBe(false);
    expect(deleteTrade("t1", USER.id)).toBe(true);
    expect(getDb().prepare("SELECT COUNT(*) AS n FROM trade_results").get()).toEqual({ n: 0 });
  });

  it("lists newest first, then by insertion order for equal timestamps", () => {
    insertTrade(trade("a", "2026-03-01T01:00:00.000Z"));
    insertTrade(trade("b", "2026-03-01T02:00:00.000Z"));
    insertTrade(trade("c", "2026-03-01T02:00:00.000Z"));

    const ids = queryTrades({ userId: USER.id, limit: 10, skip: 0 }).map((r) => r.id);
    expect(ids).toEqual(["c", "b", "a"]);
    expect(queryTrades({ userId: USER.id, status: "completed", limit: 10, skip: 0 })).toEqual([]);
  });

  it("rotateApiKey revokes the old hash once", () => {
    expect(rotateApiKey("hash-1", "hash-2", USER.id)).toBe(true);
    expect(getApiKeyByHash("hash-1")?.revoked).toBe(1);
    expect(getApiKeyByHash("hash-2")?.revoked).toBe(0);
    expect(rotateApiKey("hash-1", "hash-3", USER.id)).toBe(false);
    expect(getApiKeyByHash("hash-3")).toBeUndefined();
  });
});
