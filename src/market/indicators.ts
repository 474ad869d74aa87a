import { ATR, EMA, RSI, SMA } from "trading-signals";
import type { DailyBar, IndicatorSnapshot } from "./types.js";

// ── Safe value extraction from trading-signals ──────────────────────────────

function safeNumber(indicator: { isStable: boolean; getResult: () => unknown }): number | null {
  try {
    if (!indicator.isStable) return null;
    const val = indicator.getResult();
    if (val === undefined || val === null) return null;
    const num = Number(val);
    return isFinite(num) ? num : null;
  } catch {
    return null;
  }
}

/**
 * Compute the indicator block of a snapshot from daily bars, oldest first.
 * Indicators without enough history come back null.
 */
export function computeIndicators(bars: readonly DailyBar[]): IndicatorSnapshot {
  const sma20 = new SMA(20);
  const sma50 = new SMA(50);
  const ema21 = new EMA(21);
  const rsi14 = new RSI(14);
  const atr14 = new ATR(14);

  for (const bar of bars) {
    sma20.add(bar.close);
    sma50.add(bar.close);
    ema21.add(bar.close);
    rsi14.add(bar.close);
    atr14.add({ high: bar.high, low: bar.low, close: bar.close });
  }

  return {
    sma_20: safeNumber(sma20),
    sma_50: safeNumber(sma50),
    ema_21: safeNumber(ema21),
    rsi_14: safeNumber(rsi14),
    atr_14: safeNumber(atr14),
    bars: bars.length,
  };
}
