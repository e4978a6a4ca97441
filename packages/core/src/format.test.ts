import { describe, expect, it } from "vitest";
import { describeSetup, formatSignalMessage } from "./format";
import { HOUR_MS } from "./time";
import type { Signal } from "./types";

const createdAt = Date.UTC(2025, 2, 1, 12, 0, 0);

const signal: Signal = {
	id: `ETH/USDC:15m:${createdAt}`,
	symbol: "ETH/USDC",
	timeframe: "15m",
	entryPrice: 2650,
	stopLoss: 2610,
	takeProfit1: 2690,
	takeProfit2: 2730,
	grade: "A",
	riskPct: 0.7,
	positionSize: 0.175,
	riskAmount: 7,
	riskRewardRatio: 1,
	triggers: ["ema_crossover", "bullish_candle"],
	rationale: "Strong setup: EMA crossover above EMA50 and Bullish candle + volume",
	status: "pending",
	outcome: null,
	expiresAt: createdAt + 8 * HOUR_MS,
	activatedAt: null,
	triggeredAt: null,
	closedAt: null,
	createdAt,
	updatedAt: createdAt,
};

describe("describeSetup", () => {
	it("joins trigger descriptions with commas and a final 'and'", () => {
		expect(
			describeSetup("B", ["breakout_retest", "bb_squeeze_expansion", "ema_crossover"])
		).toBe(
			"Good setup: Breakout & retest of resistance, BB squeeze expansion + volume and EMA crossover above EMA50"
		);
	});

	it("handles a single trigger", () => {
		expect(describeSetup("C", ["bullish_candle"])).toBe(
			"High-risk setup: Bullish candle + volume"
		);
	});
});

describe("formatSignalMessage", () => {
	it("renders levels with percentage distances from entry", () => {
		const lines = formatSignalMessage(signal, { maxHoldDurationMs: 24 * HOUR_MS }).split("\n");
		expect(lines[0]).toBe("LONG Signal (Strong setup) - ETH/USDC (15m)");
		expect(lines[2]).toBe("Entry: 2650");
		expect(lines[3]).toBe("SL: 2610 (-1.5%)");
		expect(lines[4]).toBe("TP1: 2690 (+1.5%)");
		expect(lines[5]).toBe("TP2: 2730 (+3.0%)");
		expect(lines[7]).toBe("Risk per trade: 0.7% -> Position: 0.175");
		expect(lines[9]).toBe("Expires: 8h | Max hold: 24h");
	});
});
