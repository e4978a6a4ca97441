import { describe, expect, it } from "vitest";
import {
	DegenerateRiskError,
	InsufficientDataError,
	HOUR_MS,
	hasLongOrdering,
	type Candle,
} from "@longwatch/core";
import {
	breakoutRetestSeries,
	buildSnapshot,
	engulfingSeries,
	SYMBOL,
} from "./__tests__/fixtures";
import { SignalDetector, type DetectionOutcome, type PairSeries, type SnapshotInput } from "./detector";

const profile = { riskPerTradePct: 0.7, accountEquity: 1000 };
const NOW = Date.UTC(2024, 0, 1);

const scenarioInput = (overrides: Partial<SnapshotInput> = {}): SnapshotInput => ({
	trend: buildSnapshot({ timeframe: "1h", close: 2650, ema200: 2600, rsi14: 55 }),
	entry: buildSnapshot({
		close: 2650,
		ema9: 2640,
		ema21: 2635,
		ema50: 2600,
		previousEma9: 2630,
		previousEma21: 2632,
		atr14: 25,
		swingLow: 2610,
	}),
	entryCandles: breakoutRetestSeries(),
	confirmationCandles: engulfingSeries(),
	...overrides,
});

const risingSeries = (count: number, timeframe: string): Candle[] =>
	Array.from({ length: count }, (_, i) => ({
		symbol: SYMBOL,
		timeframe,
		timestamp: i * 60_000,
		open: 100 + i - 0.5,
		high: 101 + i,
		low: 99 + i,
		close: 100 + i,
		volume: 100,
	}));

describe("SignalDetector", () => {
	const detector = new SignalDetector();

	it("produces an A-grade candidate for the reference setup", () => {
		const outcome = detector.detectFromSnapshots(scenarioInput(), profile, NOW);
		expect(outcome.kind).toBe("candidate");
		if (outcome.kind !== "candidate") {
			return;
		}
		expect(outcome.trend.passed).toBe(true);
		expect(outcome.triggers.count).toBeGreaterThanOrEqual(2);
		expect(outcome.candidate).toMatchObject({
			symbol: SYMBOL,
			timeframe: "15m",
			entryPrice: 2650,
			stopLoss: 2610,
			takeProfit1: 2690,
			takeProfit2: 2730,
			grade: "A",
			riskPct: 0.7,
			positionSize: 0.175,
			detectedAt: NOW,
		});
		expect(outcome.candidate.rationale).toBe(
			"Strong setup: Breakout & retest of resistance, EMA crossover above EMA50 and Bullish candle + volume"
		);
	});

	it("grades two triggers with clean alignment as B", () => {
		const outcome = detector.detectFromSnapshots(
			scenarioInput({ confirmationCandles: null }),
			profile,
			NOW
		);
		expect(outcome.kind).toBe("candidate");
		if (outcome.kind === "candidate") {
			expect(outcome.candidate.triggers).toEqual(["breakout_retest", "ema_crossover"]);
			expect(outcome.candidate.grade).toBe("B");
		}
	});

	it("rejects when the trend filter fails", () => {
		const input = scenarioInput();
		const outcome = detector.detectFromSnapshots(
			{ ...input, trend: { ...input.trend, rsi14: 70 } },
			profile,
			NOW
		);
		expect(outcome).toMatchObject({ kind: "rejected", reason: "trend_filter", triggers: null });
	});

	it("rejects a single trigger", () => {
		const outcome = detector.detectFromSnapshots(
			scenarioInput({ entryCandles: [], confirmationCandles: null }),
			profile,
			NOW
		);
		expect(outcome.kind).toBe("rejected");
		if (outcome.kind === "rejected") {
			expect(outcome.reason).toBe("insufficient_triggers");
			expect(outcome.triggers?.fired).toEqual(["ema_crossover"]);
		}
	});

	it("surfaces degenerate sizing as DegenerateRiskError", () => {
		const input = scenarioInput();
		expect(() =>
			detector.detectFromSnapshots(
				{ ...input, entry: { ...input.entry, atr14: null, swingLow: null } },
				profile,
				NOW
			)
		).toThrow(DegenerateRiskError);
	});

	it("computes snapshots from raw candles and fails on short history", () => {
		expect(() =>
			detector.detect(
				{
					symbol: SYMBOL,
					trend: risingSeries(150, "1h"),
					entry: risingSeries(300, "15m"),
					confirmation: null,
				},
				profile,
				NOW
			)
		).toThrow(InsufficientDataError);

		const outcome = detector.detect(
			{
				symbol: SYMBOL,
				trend: risingSeries(300, "1h"),
				entry: risingSeries(300, "15m"),
				confirmation: null,
			},
			profile,
			NOW
		);
		// a straight rise pins RSI at 100, outside the band
		expect(outcome).toMatchObject({ kind: "rejected", reason: "trend_filter" });
	});

	it("keeps long ordering for every candidate across randomized setups", () => {
		let seed = 42;
		const random = (): number => {
			seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
			return seed / 2_147_483_648;
		};

		let candidates = 0;
		for (let i = 0; i < 200; i += 1) {
			const close = 1 + random() * 5000;
			const base = scenarioInput();
			const input: SnapshotInput = {
				...base,
				trend: { ...base.trend, close, ema200: close * (0.9 + random() * 0.09), rsi14: 45 + random() * 20 },
				entry: {
					...base.entry,
					close,
					ema9: close * 0.99,
					ema21: close * 0.985,
					ema50: close * 0.97,
					previousEma9: close * 0.98,
					previousEma21: close * 0.985,
					atr14: close * random() * 0.05,
					swingLow: close * (1 - random() * 0.12),
				},
			};
			try {
				const outcome = detector.detectFromSnapshots(input, profile, NOW);
				if (outcome.kind === "candidate") {
					candidates += 1;
					expect(hasLongOrdering(outcome.candidate)).toBe(true);
					expect(outcome.candidate.stopLoss).toBeLessThan(outcome.candidate.entryPrice);
				}
			} catch (err) {
				expect(err).toBeInstanceOf(DegenerateRiskError);
			}
		}
		expect(candidates).toBeGreaterThan(0);
	});
	it("holds its invariants over randomized candle series", () => {
		let seed = 2024;
		const random = (): number => {
			seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
			return seed / 2_147_483_648;
		};

		// drifting random walk; prices stay positive
		const walk = (timeframe: string, stepMs: number, start: number): Candle[] => {
			const candles: Candle[] = [];
			let previous = start;
			for (let i = 0; i < 300; i += 1) {
				const close = previous * (1 + (random() - 0.45) * 0.01);
				candles.push({
					symbol: SYMBOL,
					timeframe,
					timestamp: NOW - (300 - i) * stepMs,
					open: previous,
					high: Math.max(previous, close) * (1 + random() * 0.003),
					low: Math.min(previous, close) * (1 - random() * 0.003),
					close,
					volume: 50 + random() * 100,
				});
				previous = close;
			}
			return candles;
		};

		const scaled = (candles: Candle[], factor: number): Candle[] =>
			candles.map((candle) => ({
				...candle,
				open: candle.open * factor,
				high: candle.high * factor,
				low: candle.low * factor,
				close: candle.close * factor,
			}));

		const run = (series: PairSeries): DetectionOutcome | null => {
			try {
				return detector.detect(series, profile, NOW);
			} catch (err) {
				expect(err).toBeInstanceOf(DegenerateRiskError);
				return null;
			}
		};

		for (let i = 0; i < 25; i += 1) {
			const start = 10 + random() * 4990;
			const series: PairSeries = {
				symbol: SYMBOL,
				trend: walk("1h", HOUR_MS, start),
				entry: walk("15m", HOUR_MS / 4, start),
				confirmation: walk("5m", HOUR_MS / 12, start),
			};
			const outcome = run(series);
			if (!outcome) {
				continue;
			}

			if (outcome.kind === "candidate") {
				const { candidate } = outcome;
				expect(outcome.trend.passed).toBe(true);
				expect(outcome.triggers.count).toBeGreaterThanOrEqual(2);
				expect(candidate.triggers).toEqual(outcome.triggers.fired);
				expect(candidate.entryPrice).toBe(series.entry[series.entry.length - 1]?.close);
				expect(hasLongOrdering(candidate)).toBe(true);
			} else if (outcome.reason === "trend_filter") {
				expect(outcome.trend.passed).toBe(false);
				expect(outcome.triggers).toBeNull();
			} else {
				expect(outcome.trend.passed).toBe(true);
				expect(outcome.triggers?.count).toBeLessThan(2);
			}

			// powers of two scale every price exactly, so ratio-based checks must agree
			for (const factor of [4, 0.25]) {
				const rescaled = run({
					symbol: SYMBOL,
					trend: scaled(series.trend, factor),
					entry: scaled(series.entry, factor),
					confirmation: series.confirmation ? scaled(series.confirmation, factor) : null,
				});
				if (!rescaled) {
					continue;
				}
				expect(rescaled.trend.passed).toBe(outcome.trend.passed);
				expect(rescaled.triggers?.fired ?? null).toEqual(outcome.triggers?.fired ?? null);
			}
		}
	});
});
