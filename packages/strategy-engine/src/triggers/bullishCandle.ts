import { TRIGGER_DESCRIPTIONS, type Candle } from "@longwatch/core";
import { sma } from "@longwatch/indicators";
import type { EntryTrigger } from "../types";

export const isBullishEngulfing = (previous: Candle, current: Candle): boolean =>
	previous.close < previous.open &&
	current.close > current.open &&
	current.open < previous.close &&
	current.close > previous.open;

export const hasLongLowerWick = (candle: Candle, wickBodyRatio: number): boolean => {
	const body = Math.abs(candle.close - candle.open);
	const lowerWick = Math.min(candle.open, candle.close) - candle.low;
	const upperWick = candle.high - Math.max(candle.open, candle.close);
	return lowerWick > wickBodyRatio * body && upperWick < body;
};

/**
 * Runs on the confirmation timeframe when one is configured, otherwise on the
 * entry candles.
 */
export const bullishCandleTrigger: EntryTrigger = {
	name: "bullish_candle",
	label: TRIGGER_DESCRIPTIONS.bullish_candle,
	evaluate({ candles, confirmationCandles }, policy) {
		const series = confirmationCandles ?? candles;
		if (series.length < 2) {
			return false;
		}

		const current = series[series.length - 1];
		const previous = series[series.length - 2];
		const volumeAverage = sma(
			series.slice(0, -1).map((candle) => candle.volume),
			policy.indicators.volumePeriod
		);
		if (volumeAverage === null) {
			return false;
		}

		const pattern =
			isBullishEngulfing(previous, current) ||
			hasLongLowerWick(current, policy.triggers.wickBodyRatio);
		return pattern && current.volume > volumeAverage * policy.triggers.candleVolumeMultiple;
	},
};
