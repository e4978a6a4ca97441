export interface SwingInput {
	high: number;
	low: number;
}

export interface SwingLevels {
	high: number;
	low: number;
}

/**
 * Highest high and lowest low over the last `lookback` candles.
 */
export function swingLevels(candles: SwingInput[], lookback = 20): SwingLevels | null {
	if (lookback <= 0 || candles.length < lookback) {
		return null;
	}
	const window = candles.slice(candles.length - lookback);
	let high = Number.NEGATIVE_INFINITY;
	let low = Number.POSITIVE_INFINITY;
	for (const candle of window) {
		high = Math.max(high, candle.high);
		low = Math.min(low, candle.low);
	}
	return { high, low };
}
