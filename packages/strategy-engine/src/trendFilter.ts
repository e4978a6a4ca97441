import { DEFAULT_SIGNAL_POLICY, type TrendPolicy } from "@longwatch/core";
import type { IndicatorSnapshot } from "@longwatch/indicators";

export interface TrendChecks {
	priceAboveTrendEma: boolean;
	priceAboveSlowEma: boolean;
	rsiInBand: boolean;
}

export interface TrendMargins {
	/** Percent the trend-timeframe close sits above its EMA200. */
	trendEmaPct: number | null;
	/** Percent the entry-timeframe close sits above its EMA50. */
	slowEmaPct: number | null;
	/** RSI points to the nearer band edge; negative when outside. */
	rsiInset: number | null;
}

export interface TrendFilterResult {
	passed: boolean;
	checks: TrendChecks;
	margins: TrendMargins;
}

const pctAbove = (price: number, level: number | null): number | null =>
	level === null || level === 0 ? null : ((price - level) / level) * 100;

/**
 * Fails closed: a missing indicator fails its check.
 */
export function passesTrendFilter(
	trend: IndicatorSnapshot,
	entry: IndicatorSnapshot,
	policy: TrendPolicy = DEFAULT_SIGNAL_POLICY.trend
): TrendFilterResult {
	const rsi = trend.rsi14;
	const checks: TrendChecks = {
		priceAboveTrendEma: trend.ema200 !== null && trend.close > trend.ema200,
		priceAboveSlowEma: entry.ema50 !== null && entry.close > entry.ema50,
		rsiInBand: rsi !== null && rsi >= policy.rsiLower && rsi <= policy.rsiUpper,
	};

	return {
		passed: checks.priceAboveTrendEma && checks.priceAboveSlowEma && checks.rsiInBand,
		checks,
		margins: {
			trendEmaPct: pctAbove(trend.close, trend.ema200),
			slowEmaPct: pctAbove(entry.close, entry.ema50),
			rsiInset:
				rsi === null ? null : Math.min(rsi - policy.rsiLower, policy.rsiUpper - rsi),
		},
	};
}
