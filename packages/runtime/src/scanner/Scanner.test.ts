import { afterEach, describe, expect, it, vi } from "vitest";
import {
	HOUR_MS,
	MarketDataError,
	type Candle,
	type MarketDataProvider,
	type RiskProfile,
	type SignalCandidate,
} from "@longwatch/core";
import { SignalLifecycleManager } from "@longwatch/lifecycle";
import {
	InMemoryEmissionSwitch,
	InMemoryPairWatchStore,
	InMemoryRiskProfileStore,
	InMemorySignalStore,
} from "@longwatch/persistence";
import {
	SignalDetector,
	type DetectionOutcome,
	type PairSeries,
	type TrendFilterResult,
	type TriggerResult,
} from "@longwatch/strategy-engine";
import { Scanner, type ScannerOptions } from "./Scanner";

const T0 = Date.UTC(2024, 2, 1, 12);

const profile: RiskProfile = {
	riskPerTradePct: 0.7,
	accountEquity: 1000,
	maxConcurrentSignals: 3,
	maxHoldDurationMs: 24 * HOUR_MS,
	signalTtlMs: 8 * HOUR_MS,
	retentionMs: 7 * 24 * HOUR_MS,
};

const trendResult = (passed: boolean): TrendFilterResult => ({
	passed,
	checks: { priceAboveTrendEma: passed, priceAboveSlowEma: passed, rsiInBand: passed },
	margins: { trendEmaPct: 1, slowEmaPct: 0.5, rsiInset: 4 },
});

const candidateFor = (symbol: string, now: number): SignalCandidate => ({
	symbol,
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
	triggers: ["breakout_retest", "ema_crossover", "bullish_candle"],
	rationale: "Strong setup",
	detectedAt: now,
});

const firedTriggers: TriggerResult = {
	flags: {
		breakout_retest: true,
		bb_squeeze_expansion: false,
		ema_crossover: true,
		bullish_candle: true,
	},
	fired: ["breakout_retest", "ema_crossover", "bullish_candle"],
	count: 3,
	rationale: [],
};

type Plan = "candidate" | "rejected" | "explode";

/**
 * Decides per symbol instead of computing indicators, so the fake market
 * data can stay tiny.
 */
class ScriptedDetector extends SignalDetector {
	constructor(private readonly plan: Record<string, Plan>) {
		super();
	}

	override detect(series: PairSeries, _profile: RiskProfile, now: number): DetectionOutcome {
		const plan = this.plan[series.symbol] ?? "rejected";
		if (plan === "explode") {
			throw new Error(`boom for ${series.symbol}`);
		}
		if (plan === "candidate") {
			return {
				kind: "candidate",
				candidate: candidateFor(series.symbol, now),
				trend: trendResult(true),
				triggers: firedTriggers,
			};
		}
		return { kind: "rejected", reason: "trend_filter", trend: trendResult(false), triggers: null };
	}
}

const candles = (symbol: string, timeframe: string, count: number): Candle[] =>
	Array.from({ length: count }, (_, i) => ({
		symbol,
		timeframe,
		timestamp: T0 - 3 * HOUR_MS + i * 15 * 60_000,
		open: 100,
		high: 101,
		low: 99,
		close: 100,
		volume: 10,
	}));

type Behaviour = "ok" | "rate_limited" | "hang";

class FakeMarketData implements MarketDataProvider {
	readonly calls: string[] = [];
	private readonly active = new Map<string, number>();
	maxConcurrentSymbols = 0;

	constructor(
		private readonly behaviour: Record<string, Behaviour> = {},
		private readonly delayMs = 0
	) {}

	async getCandles(symbol: string, timeframe: string, count: number): Promise<Candle[]> {
		this.calls.push(`${symbol}@${timeframe}`);
		const behaviour = this.behaviour[symbol] ?? "ok";
		if (behaviour === "rate_limited") {
			throw new MarketDataError("RateLimited", `429 for ${symbol}`);
		}
		if (behaviour === "hang") {
			return new Promise<Candle[]>(() => undefined);
		}
		this.active.set(symbol, (this.active.get(symbol) ?? 0) + 1);
		this.maxConcurrentSymbols = Math.max(this.maxConcurrentSymbols, this.active.size);
		await new Promise((resolve) => setTimeout(resolve, this.delayMs));
		const left = (this.active.get(symbol) ?? 1) - 1;
		if (left === 0) {
			this.active.delete(symbol);
		} else {
			this.active.set(symbol, left);
		}
		return candles(symbol, timeframe, Math.min(count, 12));
	}
}

interface HarnessOptions {
	pairs: string[];
	plan?: Record<string, Plan>;
	behaviour?: Record<string, Behaviour>;
	delayMs?: number;
	detector?: SignalDetector;
	options?: Partial<ScannerOptions>;
	now?: () => number;
}

const harness = (input: HarnessOptions) => {
	const now = input.now ?? (() => T0);
	const store = new InMemorySignalStore();
	const pairs = new InMemoryPairWatchStore(input.pairs, now);
	const riskProfiles = new InMemoryRiskProfileStore(profile);
	const emission = new InMemoryEmissionSwitch();
	const lifecycle = new SignalLifecycleManager({ store, pairs, emission, riskProfiles, now });
	const marketData = new FakeMarketData(input.behaviour, input.delayMs);
	const scanner = new Scanner(
		{
			marketData,
			pairs,
			riskProfiles,
			lifecycle,
			detector: input.detector ?? new ScriptedDetector(input.plan ?? {}),
			now,
		},
		{ scanIntervalMs: 60_000, maxConcurrentFetches: 4, fetchTimeoutMs: 1_000, ...input.options }
	);
	return { scanner, lifecycle, marketData, pairs, emission, store };
};

describe("Scanner", () => {
	let stopScanner: (() => Promise<void>) | null = null;

	afterEach(async () => {
		if (stopScanner) {
			await stopScanner();
			stopScanner = null;
		}
	});

	it("admits candidates and isolates pair failures", async () => {
		const { scanner, lifecycle } = harness({
			pairs: ["ETH/USDC", "SOL/USDC", "BNB/USDC", "XRP/USDC"],
			plan: { "ETH/USDC": "candidate", "SOL/USDC": "rejected", "XRP/USDC": "explode" },
			behaviour: { "BNB/USDC": "rate_limited" },
		});

		const report = await scanner.scanOnce();

		expect(report.pairs).toEqual([
			{ symbol: "ETH/USDC", status: "admitted", signalId: `ETH/USDC:15m:${T0}` },
			{ symbol: "SOL/USDC", status: "rejected", reason: "trend_filter" },
			{ symbol: "BNB/USDC", status: "skipped", reason: "RateLimited", detail: "429 for BNB/USDC" },
			{ symbol: "XRP/USDC", status: "skipped", reason: "unexpected_error", detail: "boom for XRP/USDC" },
		]);
		expect(await lifecycle.listOpen()).toHaveLength(1);

		const status = await scanner.getStatus();
		expect(status).toMatchObject({
			running: false,
			scanCount: 1,
			signalsGenerated: 1,
			gradeDistribution: { A: 1, B: 0, C: 0 },
			lastScanAt: T0,
			lastScanDurationMs: 0,
			openSignals: 1,
		});
		expect(status.enabledPairs).toEqual(["ETH/USDC", "SOL/USDC", "BNB/USDC", "XRP/USDC"]);
	});

	it("fetches trend, entry and confirmation timeframes for each pair", async () => {
		const { scanner, marketData } = harness({ pairs: ["ETH/USDC"] });
		await scanner.scanOnce();
		expect([...marketData.calls].sort()).toEqual(["ETH/USDC@15m", "ETH/USDC@1h", "ETH/USDC@5m"]);
	});

	it("skips a pair whose fetch exceeds the timeout", async () => {
		const { scanner } = harness({
			pairs: ["ETH/USDC", "SOL/USDC"],
			plan: { "ETH/USDC": "candidate" },
			behaviour: { "SOL/USDC": "hang" },
			options: { fetchTimeoutMs: 20 },
		});

		const report = await scanner.scanOnce();

		expect(report.pairs[0]).toMatchObject({ symbol: "ETH/USDC", status: "admitted" });
		expect(report.pairs[1]).toMatchObject({ symbol: "SOL/USDC", status: "skipped", reason: "Timeout" });
	});

	it("skips pairs with too little history under the real detector", async () => {
		const { scanner } = harness({ pairs: ["ETH/USDC"], detector: new SignalDetector() });
		const report = await scanner.scanOnce();
		expect(report.pairs).toEqual([
			{
				symbol: "ETH/USDC",
				status: "skipped",
				reason: "insufficient_data",
				detail: "Insufficient candles for 1h: need 200, got 12",
			},
		]);
	});

	it("bounds the number of pairs fetched at once", async () => {
		const pairs = ["A/USDC", "B/USDC", "C/USDC", "D/USDC", "E/USDC", "F/USDC"];
		const { scanner, marketData } = harness({ pairs, delayMs: 5, options: { maxConcurrentFetches: 2 } });

		const report = await scanner.scanOnce();

		expect(report.pairs).toHaveLength(6);
		expect(marketData.maxConcurrentSymbols).toBe(2);
	});

	it("reports admission rejections for repeated and muted candidates", async () => {
		const { scanner, emission } = harness({
			pairs: ["ETH/USDC", "SOL/USDC"],
			plan: { "ETH/USDC": "candidate", "SOL/USDC": "candidate" },
		});
		await scanner.scanOnce();

		const repeated = await scanner.scanOnce();
		expect(repeated.pairs).toEqual([
			{ symbol: "ETH/USDC", status: "rejected", reason: "duplicate_pair" },
			{ symbol: "SOL/USDC", status: "rejected", reason: "duplicate_pair" },
		]);

		await emission.setMuted(true);
		const muted = await scanner.scanOnce();
		expect(muted.pairs).toEqual([
			{ symbol: "ETH/USDC", status: "rejected", reason: "emission_muted" },
			{ symbol: "SOL/USDC", status: "rejected", reason: "emission_muted" },
		]);
		expect((await scanner.getStatus()).signalsGenerated).toBe(2);
	});

	it("sweeps expired signals at the end of a cycle", async () => {
		let now = T0;
		const plan: Record<string, Plan> = { "ETH/USDC": "candidate" };
		const { scanner, lifecycle } = harness({ pairs: ["ETH/USDC"], plan, now: () => now });
		await scanner.scanOnce();

		plan["ETH/USDC"] = "rejected";
		now = T0 + 8 * HOUR_MS + 1;
		const report = await scanner.scanOnce();

		expect(report.expired).toBe(1);
		expect(await lifecycle.listOpen()).toEqual([]);
	});

	it("runs overlapping scans one after another", async () => {
		let clock = T0;
		const { scanner } = harness({ pairs: ["ETH/USDC", "SOL/USDC"], delayMs: 5, now: () => clock++ });

		const [first, second] = await Promise.all([scanner.scanOnce(), scanner.forceScan()]);

		expect(second.startedAt).toBeGreaterThan(first.finishedAt);
	});

	it("scans on start and stops cleanly", async () => {
		const { scanner } = harness({ pairs: ["ETH/USDC"] });
		stopScanner = () => scanner.stop();

		scanner.start();
		expect(scanner.isRunning).toBe(true);
		expect(() => scanner.start()).toThrow("Scanner already running");

		await vi.waitFor(async () => {
			expect((await scanner.getStatus()).scanCount).toBe(1);
		});
		await scanner.stop();

		expect(scanner.isRunning).toBe(false);
		expect((await scanner.getStatus()).scanCount).toBe(1);
	});
});
