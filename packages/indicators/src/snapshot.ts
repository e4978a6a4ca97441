import {
	DEFAULT_SIGNAL_POLICY,
	InsufficientDataError,
	type Candle,
	type IndicatorPolicy,
} from "@longwatch/core";
import { calculateATR } from "./atr";
import { bollingerSeries } from "./bollinger";
import { emaSeries } from "./ema";
import { rsi } from "./rsi";
import { sma } from "./sma";
import { swingLevels } from "./swing";

export interface BollingerSnapshot {
	upper: number;
	middle: number;
	lower: number;
	width: number;
	previousWidth: number | null;
}

/**
 * Indicator values at the last candle of a series. Field names carry the
 * default periods; the actual periods come from `IndicatorPolicy`.
 */
export interface IndicatorSnapshot {
	symbol: string;
	timeframe: string;
	timestamp: number;
	candleCount: number;
	close: number;
	volume: number;
	/** SMA of the volumes before the last candle. */
	volumeAverage: number | null;
	ema9: number | null;
	ema21: number | null;
	ema50: number | null;
	ema200: number | null;
	previousEma9: number | null;
	previousEma21: number | null;
	rsi14: number | null;
	atr14: number | null;
	bollinger: BollingerSnapshot | null;
	swingHigh: number | null;
	swingLow: number | null;
}

export const requiredCandles = (policy: IndicatorPolicy): number =>
	Math.max(
		policy.minCandles,
		policy.emaFast,
		policy.emaMedium,
		policy.emaSlow,
		policy.emaTrend
	);

const last = <T>(series: T[]): T | null =>
	series.length ? series[series.length - 1] : null;

const previous = <T>(series: T[]): T | null =>
	series.length > 1 ? series[series.length - 2] : null;

/**
 * @throws InsufficientDataError when the series is shorter than
 *   `requiredCandles(policy)`
 */
export function computeIndicatorSnapshot(
	candles: Candle[],
	timeframe: string,
	policy: IndicatorPolicy = DEFAULT_SIGNAL_POLICY.indicators
): IndicatorSnapshot {
	const required = requiredCandles(policy);
	if (candles.length < required) {
		throw new InsufficientDataError(timeframe, required, candles.length);
	}

	const closes = candles.map((candle) => candle.close);
	const volumes = candles.map((candle) => candle.volume);
	const current = candles[candles.length - 1];

	const fast = emaSeries(closes, policy.emaFast);
	const medium = emaSeries(closes, policy.emaMedium);
	const bands = bollingerSeries(closes, policy.bollingerPeriod, policy.bollingerStdDev);
	const band = last(bands);
	const swing = swingLevels(candles, policy.swingLookback);

	return {
		symbol: current.symbol,
		timeframe,
		timestamp: current.timestamp,
		candleCount: candles.length,
		close: current.close,
		volume: current.volume,
		volumeAverage: sma(volumes.slice(0, -1), policy.volumePeriod),
		ema9: last(fast),
		ema21: last(medium),
		ema50: last(emaSeries(closes, policy.emaSlow)),
		ema200: last(emaSeries(closes, policy.emaTrend)),
		previousEma9: previous(fast),
		previousEma21: previous(medium),
		rsi14: rsi(closes, policy.rsiPeriod),
		atr14: calculateATR(candles, policy.atrPeriod),
		bollinger: band
			? { ...band, previousWidth: previous(bands)?.width ?? null }
			: null,
		swingHigh: swing?.high ?? null,
		swingLow: swing?.low ?? null,
	};
}
