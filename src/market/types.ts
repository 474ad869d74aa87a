export interface QuoteSnapshot {
  price: number | null;
  change_pct: number | null;
  volume: number | null;
  day_high: number | null;
  day_low: number | null;
  fifty_two_week_high: number | null;
  fifty_two_week_low: number | null;
  currency: string | null;
}

export interface IndicatorSnapshot {
  sma_20: number | null;
  sma_50: number | null;
  ema_21: number | null;
  rsi_14: number | null;
  atr_14: number | null;
  bars: number;
}

export interface FundamentalsSnapshot {
  name: string | null;
  market_cap: number | null;
  trailing_pe: number | null;
  forward_pe: number | null;
  eps: number | null;
  dividend_yield: number | null;
}

export interface MarketSnapshot {
  symbol: string;
  quote: QuoteSnapshot;
  indicators: IndicatorSnapshot;
  fundamentals: FundamentalsSnapshot;
  fetched_at: string;
}

/**
 * Ticker data retrieval. `fetch` throws NotFoundError for an unknown symbol
 * and StageUnavailableError when the provider cannot be reached in time.
 */
export interface MarketDataProvider {
  readonly id: string;
  fetch(symbol: string): Promise<MarketSnapshot>;
  checkAvailability(): Promise<void>;
}

export interface DailyBar {
  high: number;
  low: number;
  close: number;
}
