import YahooFinance from "yahoo-finance2";
import { config } from "../config.js";
import { NotFoundError, StageUnavailableError, errorMessage } from "../errors.js";
import { logMarket } from "../logging.js";
import { withRetry, withTimeout } from "../retry.js";
import { computeIndicators } from "./indicators.js";
import type { DailyBar, MarketDataProvider, MarketSnapshot } from "./types.js";

const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

const MAX_RETRIES = 2;

function isNotFound(err: Error): boolean {
  const msg = err.message ?? "";
  // Don't retry on client errors (bad symbol, invalid params)
  return msg.includes("Not Found") || msg.includes("not found") || msg.includes("Invalid") || msg.includes("No data");
}

async function yahooCall<T>(label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await withRetry(() => withTimeout(fn(), config.market.timeoutMs, `yahoo ${label}`), {
      retries: MAX_RETRIES,
      label: `yahoo ${label}`,
      shouldRetry: (err) => !isNotFound(err),
    });
  } catch (e: unknown) {
    if (e instanceof Error && isNotFound(e)) {
      throw new NotFoundError(`Unknown symbol: ${label}`);
    }
    throw new StageUnavailableError(`Market data unavailable for ${label}: ${errorMessage(e)}`, { cause: e });
  }
}

function isCompleteBar(bar: { high: number | null; low: number | null; close: number | null }): bar is DailyBar {
  return bar.high !== null && bar.low !== null && bar.close !== null;
}

async function fetchDailyBars(symbol: string): Promise<DailyBar[]> {
  const period2 = new Date();
  const period1 = new Date(period2.getTime() - config.market.historyDays * 86_400_000);
  const chart = await yahooCall(symbol, () => yf.chart(symbol, { period1, period2, interval: "1d" }));
  return (chart.quotes ?? [])
    .map((bar) => ({ high: bar.high ?? null, low: bar.low ?? null, close: bar.close ?? null }))
    .filter(isCompleteBar);
}

async function fetchSnapshot(symbol: string): Promise<MarketSnapshot> {
  const start = Date.now();
  const [q, summary, bars] = await Promise.all([
    yahooCall(symbol, () => yf.quote(symbol)),
    yahooCall(symbol, () => yf.quoteSummary(symbol, { modules: ["summaryDetail"] })),
    fetchDailyBars(symbol),
  ]);

  if (!q) {
    throw new NotFoundError(`Unknown symbol: ${symbol}`);
  }

  const snapshot: MarketSnapshot = {
    symbol,
    quote: {
      price: q.regularMarketPrice ?? null,
      change_pct: q.regularMarketChangePercent ?? null,
      volume: q.regularMarketVolume ?? null,
      day_high: q.regularMarketDayHigh ?? null,
      day_low: q.regularMarketDayLow ?? null,
      fifty_two_week_high: q.fiftyTwoWeekHigh ?? null,
      fifty_two_week_low: q.fiftyTwoWeekLow ?? null,
      currency: q.currency ?? null,
    },
    indicators: computeIndicators(bars),
    fundamentals: {
      name: q.longName ?? q.shortName ?? null,
      market_cap: q.marketCap ?? null,
      trailing_pe: q.trailingPE ?? null,
      forward_pe: q.forwardPE ?? null,
      eps: q.epsTrailingTwelveMonths ?? null,
      dividend_yield: summary.summaryDetail?.dividendYield ?? null,
    },
    fetched_at: new Date().toISOString(),
  };

  logMarket.debug({ symbol, bars: bars.length, latency_ms: Date.now() - start }, "Market snapshot fetched");
  return snapshot;
}

export const yahooMarketData: MarketDataProvider = {
  id: "yahoo-finance",
  fetch: fetchSnapshot,
  // No credential needed; Yahoo counts as reachable until a call says otherwise
  checkAvailability: () => Promise.resolve(),
};
