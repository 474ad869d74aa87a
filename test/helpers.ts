import { type Database as DatabaseType } from "better-sqlite3";
import { vi, type Mock } from "vitest";
import type { AgentCapability, AgentContext, AgentResponse, AgentRole } from "../src/agents/types.js";
import type { MarketDataProvider, MarketSnapshot } from "../src/market/types.js";
import { NotFoundError } from "../src/errors.js";

/**
 * Deletes all rows from all tables in the test database.
 * Use this in beforeEach to ensure test isolation.
 */
export function cleanDb(db: DatabaseType): void {
  db.pragma("foreign_keys = OFF");
  db.exec(`
    DELETE FROM trade_results;
    DELETE FROM trades;
    DELETE FROM api_keys;
    DELETE FROM users;
  `);
  db.pragma("foreign_keys = ON");
}

// ── Canned capability responses ─────────────────────────────────────────

export const QUANT_OK = { score: 72, signal: "bullish", findings: "Price above SMA 50 with RSI at 58." };
export const APPROVED = { verdict: "approved", rationale: "Risk within limits.", position_size_hint: 0.5 };
export const ORDER_OK = { side: "buy", order_type: "limit", entry: 100, exit: 120, stop: 90, size: 10 };

export function rejected(rationale: string): Record<string, unknown> {
  return { verdict: "rejected", rationale, position_size_hint: 0 };
}

type Reply = AgentResponse | Error;
type Responder = (role: AgentRole, prompt: string, context: AgentContext) => Reply | Promise<Reply>;

export interface FakeAgent extends AgentCapability {
  invoke: Mock<(role: AgentRole, prompt: string, context: AgentContext) => Promise<AgentResponse>>;
  checkAvailability: Mock<() => Promise<void>>;
}

/** Agent whose every call is answered by `respond`; an Error reply is thrown. */
export function fakeAgent(respond: Responder): FakeAgent {
  return {
    id: "fake",
    invoke: vi.fn(async (role: AgentRole, prompt: string, context: AgentContext) => {
      const reply = await respond(role, prompt, context);
      if (reply instanceof Error) throw reply;
      return reply;
    }),
    checkAvailability: vi.fn(async () => {}),
  };
}

function defaultReply(role: AgentRole, context: AgentContext): Reply {
  switch (role) {
    case "director":
      return `Thesis for ${String(context.stock)}: earnings momentum should carry the stock higher.`;
    case "quant":
      return QUANT_OK;
    case "risk":
      return APPROVED;
    case "execution":
      return ORDER_OK;
  }
}

/**
 * Per-role reply queues. Each call takes the next reply; the last one
 * repeats once the queue is down to it. Roles without a queue get a
 * passing default.
 */
export function scriptedAgent(script: Partial<Record<AgentRole, Reply[]>> = {}): FakeAgent {
  const queues = new Map<AgentRole, Reply[]>();
  for (const [role, replies] of Object.entries(script)) {
    if (!replies) continue;
    if (role === "director" || role === "quant" || role === "risk" || role === "execution") {
      queues.set(role, [...replies]);
    }
  }
  return fakeAgent((role, _prompt, context) => {
    const queue = queues.get(role);
    if (!queue || queue.length === 0) return defaultReply(role, context);
    return queue.length > 1 ? queue.shift() ?? defaultReply(role, context) : queue[0];
  });
}

/** Answers every role with a passing default after `delayFor(stock)` ms. */
export function delayedAgent(delayFor: (stock: string) => number): FakeAgent {
  return fakeAgent(async (role, _prompt, context) => {
    await new Promise((resolve) => setTimeout(resolve, delayFor(String(context.stock))));
    return defaultReply(role, context);
  });
}

// ── Market data ─────────────────────────────────────────────────────────

export function sampleSnapshot(symbol: string): MarketSnapshot {
  return {
    symbol,
    quote: {
      price: 100,
      change_pct: 1.2,
      volume: 1_000_000,
      day_high: 101,
      day_low: 98,
      fifty_two_week_high: 130,
      fifty_two_week_low: 70,
      currency: "USD",
    },
    indicators: { sma_20: 97, sma_50: 94, ema_21: 97.5, rsi_14: 58, atr_14: 2.1, bars: 120 },
    fundamentals: {
      name: `${symbol} Corp`,
      market_cap: 1e11,
      trailing_pe: 25,
      forward_pe: 22,
      eps: 4,
      dividend_yield: null,
    },
    fetched_at: "2026-01-05T15:00:00.000Z",
  };
}

export interface FakeMarket extends MarketDataProvider {
  fetch: Mock<(symbol: string) => Promise<MarketSnapshot>>;
  checkAvailability: Mock<() => Promise<void>>;
}

/** Market data for any symbol except those in `unknown`, which raise NotFoundError. */
export function fakeMarket(unknown: readonly string[] = []): FakeMarket {
  return {
    id: "fake-market",
    fetch: vi.fn(async (symbol: string) => {
      if (unknown.includes(symbol)) throw new NotFoundError(`No market data for ${symbol}`);
      return sampleSnapshot(symbol);
    }),
    checkAvailability: vi.fn(async () => {}),
  };
}
