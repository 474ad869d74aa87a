import type { HistoricalAnalytics, Trade } from "./types.js";

const TOP_STOCKS = 5;

function round(n: number, places = 4): number {
  const f = 10 ** places;
  return Math.round(n * f) / f;
}

/** Aggregate a user's trades created within the window. Pure. */
export function computeAnalytics(trades: readonly Trade[], days: number): HistoricalAnalytics {
  let completed = 0;
  let failed = 0;
  let totalAllocation = 0;
  let analyzed = 0;
  let approved = 0;
  let rejectedExhausted = 0;
  let stockFailures = 0;
  const approvals = new Map<string, number>();

  for (const trade of trades) {
    totalAllocation += trade.allocation;
    if (trade.status === "failed") failed++;
    if (trade.status !== "completed" || !trade.result) continue;
    completed++;

    for (const r of trade.result.results) {
      analyzed++;
      if (r.status === "completed") {
        approved++;
        approvals.set(r.stock, (approvals.get(r.stock) ?? 0) + 1);
      } else if (r.status === "rejected_exhausted") {
        rejectedExhausted++;
      } else {
        stockFailures++;
      }
    }
  }

  const finished = completed + failed;
  const top = [...approvals.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, TOP_STOCKS)
    .map(([stock, count]) => ({ stock, count }));

  return {
    days,
    total_trades: trades.length,
    completed_trades: completed,
    failed_trades: failed,
    success_rate: finished > 0 ? round(completed / finished) : 0,
    total_allocation: totalAllocation,
    stocks_analyzed: analyzed,
    approved,
    rejected_exhausted: rejectedExhausted,
    stock_failures: stockFailures,
    approval_rate: analyzed > 0 ? round(approved / analyzed) : 0,
    top_approved_stocks: top,
  };
}

interface CacheEntry {
  value: HistoricalAnalytics;
  expiresAt: number;
}

/** Per-(user, days) TTL cache; a write to a user's trades drops all their entries. */
export class AnalyticsCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(userId: string, days: number): HistoricalAnalytics | null {
    const key = `${userId}:${days}`;
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  set(userId: string, days: number, value: HistoricalAnalytics): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(`${userId}:${days}`, { value, expiresAt: this.now() + this.ttlMs });
  }

  invalidate(userId: string): void {
    const prefix = `${userId}:`;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
  }
}
