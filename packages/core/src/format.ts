import { HOUR_MS } from "./time";
import type { Signal, SignalGrade, TriggerName } from "./types";

export const GRADE_LABELS: Record<SignalGrade, string> = {
	A: "Strong setup",
	B: "Good setup",
	C: "High-risk setup",
};

export const TRIGGER_DESCRIPTIONS: Record<TriggerName, string> = {
	breakout_retest: "Breakout & retest of resistance",
	bb_squeeze_expansion: "BB squeeze expansion + volume",
	ema_crossover: "EMA crossover above EMA50",
	bullish_candle: "Bullish candle + volume",
};

/**
 * "Strong setup: A, B and C"
 */
export const describeSetup = (
	grade: SignalGrade,
	triggers: readonly TriggerName[]
): string => {
	const texts = triggers.map((trigger) => TRIGGER_DESCRIPTIONS[trigger]);
	const label = GRADE_LABELS[grade];
	if (texts.length === 0) {
		return label;
	}
	if (texts.length === 1) {
		return `${label}: ${texts[0]}`;
	}
	return `${label}: ${texts.slice(0, -1).join(", ")} and ${texts[texts.length - 1]}`;
};

const pctFromEntry = (entry: number, level: number): string =>
	(((level - entry) / entry) * 100).toFixed(1);

const formatPrice = (value: number): string =>
	Number(value.toFixed(6)).toString();

const formatHours = (ms: number): string => {
	const hours = ms / HOUR_MS;
	return Number.isInteger(hours) ? `${hours}h` : `${hours.toFixed(1)}h`;
};

export interface SignalMessageOptions {
	maxHoldDurationMs?: number;
}

export const formatSignalMessage = (
	signal: Signal,
	options: SignalMessageOptions = {}
): string => {
	const lines = [
		`LONG Signal (${GRADE_LABELS[signal.grade]}) - ${signal.symbol} (${signal.timeframe})`,
		"",
		`Entry: ${formatPrice(signal.entryPrice)}`,
		`SL: ${formatPrice(signal.stopLoss)} (${pctFromEntry(signal.entryPrice, signal.stopLoss)}%)`,
		`TP1: ${formatPrice(signal.takeProfit1)} (+${pctFromEntry(signal.entryPrice, signal.takeProfit1)}%)`,
		`TP2: ${formatPrice(signal.takeProfit2)} (+${pctFromEntry(signal.entryPrice, signal.takeProfit2)}%)`,
		"",
		`Risk per trade: ${signal.riskPct}% -> Position: ${Number(signal.positionSize.toFixed(4))}`,
		`Why: ${signal.rationale}`,
	];
	const expiry = `Expires: ${formatHours(signal.expiresAt - signal.createdAt)}`;
	lines.push(
		options.maxHoldDurationMs
			? `${expiry} | Max hold: ${formatHours(options.maxHoldDurationMs)}`
			: expiry
	);
	return lines.join("\n");
};
