import type { OHLCV } from "ccxt";
import type { Candle } from "@longwatch/core";

export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};

/**
 * Ascending by timestamp, one candle per timestamp (last one wins), rows with
 * non-positive prices dropped.
 */
export const normalizeCandles = (candles: Candle[]): Candle[] => {
	const byTimestamp = new Map<number, Candle>();
	for (const candle of candles) {
		if (candle.timestamp > 0 && candle.close > 0 && candle.high >= candle.low) {
			byTimestamp.set(candle.timestamp, candle);
		}
	}
	return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
};
