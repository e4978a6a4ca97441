import { DAY_MS, HOUR_MS, MINUTE_MS, SECOND_MS } from "./constants";

/**
 * Pure time helpers. All values are UTC epoch milliseconds.
 */

const UNIT_MS: Record<string, number> = {
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

const DURATION_PATTERN = /^(\d+)([smhd])$/;

const parseAmount = (raw: string, allowSeconds: boolean): number => {
	const trimmed = raw.trim().toLowerCase();
	const match = trimmed.match(DURATION_PATTERN);
	if (!match || (!allowSeconds && match[2] === "s")) {
		throw new Error(
			`Invalid ${allowSeconds ? "duration" : "timeframe"} format: "${raw}". Expected format like "15m", "1h", "1d"`
		);
	}
	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(`Invalid duration: period must be positive, got ${n} in "${raw}"`);
	}
	return n * UNIT_MS[match[2]];
};

/**
 * @param timeframe - exchange timeframe such as "5m", "15m", "1h", "1d"
 */
export const timeframeToMs = (timeframe: string): number => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(`Invalid timeframe: expected string, got ${typeof timeframe}`);
	}
	return parseAmount(timeframe, false);
};

/**
 * Accepts a bare number of milliseconds or a unit string ("30s", "8h", "7d").
 */
export const parseDuration = (value: string | number): number => {
	if (typeof value === "number") {
		if (!Number.isFinite(value) || value <= 0) {
			throw new Error(`Invalid duration: ${value}`);
		}
		return value;
	}
	if (/^\d+$/.test(value.trim())) {
		return parseDuration(Number(value.trim()));
	}
	return parseAmount(value, true);
};

/**
 * A candle is closed once its full period has elapsed.
 */
export const isCandleClosed = (
	openTimestamp: number,
	timeframe: string,
	now: number
): boolean => openTimestamp + timeframeToMs(timeframe) <= now;
