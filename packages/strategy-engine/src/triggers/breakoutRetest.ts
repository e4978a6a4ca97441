import { TRIGGER_DESCRIPTIONS } from "@longwatch/core";
import type { EntryTrigger } from "../types";

/**
 * Resistance is the highest high of the `swingLookback` candles before the
 * retest window. Inside the window a close breaks above it, a later low comes
 * back within tolerance of it and no close from the breakout on falls below it.
 */
export const breakoutRetestTrigger: EntryTrigger = {
	name: "breakout_retest",
	label: TRIGGER_DESCRIPTIONS.breakout_retest,
	evaluate({ candles }, policy) {
		const window = policy.triggers.retestWindow;
		const lookback = policy.indicators.swingLookback;
		if (window < 2 || candles.length < window + lookback) {
			return false;
		}

		const reference = candles.slice(candles.length - window - lookback, candles.length - window);
		const recent = candles.slice(candles.length - window);
		const resistance = Math.max(...reference.map((candle) => candle.high));

		const breakoutIndex = recent.findIndex((candle) => candle.close > resistance);
		if (breakoutIndex === -1 || breakoutIndex === recent.length - 1) {
			return false;
		}

		const afterBreakout = recent.slice(breakoutIndex);
		if (afterBreakout.some((candle) => candle.close <= resistance)) {
			return false;
		}

		const retestCeiling = resistance * (1 + policy.triggers.retestTolerancePct / 100);
		return afterBreakout.slice(1).some((candle) => candle.low <= retestCeiling);
	},
};
