import type { Candle } from "@longwatch/core";
import type { IndicatorSnapshot } from "@longwatch/indicators";

export const SYMBOL = "ETH/USDC";

export const buildSnapshot = (
	overrides: Partial<IndicatorSnapshot> = {}
): IndicatorSnapshot => ({
	symbol: SYMBOL,
	timeframe: "15m",
	timestamp: 0,
	candleCount: 300,
	close: 2650,
	volume: 100,
	volumeAverage: 100,
	ema9: null,
	ema21: null,
	ema50: null,
	ema200: null,
	previousEma9: null,
	previousEma21: null,
	rsi14: null,
	atr14: null,
	bollinger: null,
	swingHigh: null,
	swingLow: null,
	...overrides,
});

export const candle = (
	timestamp: number,
	open: number,
	high: number,
	low: number,
	close: number,
	volume = 100,
	timeframe = "15m"
): Candle => ({ symbol: SYMBOL, timeframe, timestamp, open, high, low, close, volume });

/**
 * 20 candles capped at 2640, a breakout close at 2645, a dip to 2638 and a
 * last close of 2650.
 */
export const breakoutRetestSeries = (): Candle[] => {
	const reference = Array.from({ length: 20 }, (_, i) =>
		candle(i * 900_000, 2615, 2640, 2600, 2620)
	);
	const start = reference.length * 900_000;
	return [
		...reference,
		candle(start, 2625, 2648, 2622, 2645),
		candle(start + 900_000, 2645, 2652, 2641, 2648),
		candle(start + 1_800_000, 2648, 2650, 2638, 2644),
		candle(start + 2_700_000, 2644, 2651, 2642, 2647),
		candle(start + 3_600_000, 2647, 2655, 2644, 2650),
	];
};

/**
 * 21 five-minute candles ending in a bullish engulfing bar on 1.5x volume.
 */
export const engulfingSeries = (lastVolume = 150): Candle[] => {
	const filler = Array.from({ length: 19 }, (_, i) =>
		candle(i * 300_000, 100, 101.5, 99.5, 101, 100, "5m")
	);
	return [
		...filler,
		candle(19 * 300_000, 101, 101.2, 99.4, 99.5, 100, "5m"),
		candle(20 * 300_000, 99.4, 101.6, 99.3, 101.5, lastVolume, "5m"),
	];
};

/**
 * 30 alternating wide closes, 29 flat closes, then a jump: the band squeezes
 * to zero width and expands on the last bar.
 */
export const squeezeSeries = (): Candle[] => {
	const closes = [
		...Array.from({ length: 30 }, (_, i) => (i % 2 === 0 ? 100 : 110)),
		...new Array<number>(29).fill(105),
		115,
	];
	return closes.map((close, i) => candle(i * 900_000, close, close + 1, close - 1, close));
};
