import {
	DEFAULT_SIGNAL_POLICY,
	Semaphore,
	describeError,
	withTimeout,
	type Candle,
	type MarketDataProvider,
	type PairWatchStore,
	type RiskProfile,
	type RiskProfileScope,
	type RiskProfileStore,
	type SignalGrade,
	type SignalPolicy,
} from "@longwatch/core";
import type { SignalLifecycleManager } from "@longwatch/lifecycle";
import { SignalDetector } from "@longwatch/strategy-engine";
import { runtimeLogger } from "../runtimeShared";
import { classifyPairError, type PairOutcome } from "./pairOutcome";

export interface ScannerDependencies {
	marketData: MarketDataProvider;
	pairs: PairWatchStore;
	riskProfiles: RiskProfileStore;
	lifecycle: SignalLifecycleManager;
	policy?: SignalPolicy;
	detector?: SignalDetector;
	now?: () => number;
}

export interface ScannerOptions {
	scanIntervalMs: number;
	maxConcurrentFetches: number;
	fetchTimeoutMs: number;
	riskScope?: RiskProfileScope;
}

export interface ScanReport {
	startedAt: number;
	finishedAt: number;
	pairs: PairOutcome[];
	expired: number;
	archived: number;
}

export interface ScannerStatus {
	running: boolean;
	scanCount: number;
	signalsGenerated: number;
	gradeDistribution: Record<SignalGrade, number>;
	lastScanAt: number | null;
	lastScanDurationMs: number | null;
	openSignals: number;
	enabledPairs: string[];
}

interface PairSeriesSet {
	trend: Candle[];
	entry: Candle[];
	confirmation: Candle[] | null;
}

/**
 * One recurring scan cycle over the enabled pairs. Candle fetches run through
 * a bounded pool; each pair fails on its own; the lifecycle manager is the
 * only shared state.
 */
export class Scanner {
	private readonly policy: SignalPolicy;
	private readonly detector: SignalDetector;
	private readonly now: () => number;
	private readonly pool: Semaphore;
	private readonly cycleLock = new Semaphore(1);
	private readonly riskScope: RiskProfileScope;

	private running = false;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private currentCycle: Promise<void> | null = null;

	private scanCount = 0;
	private signalsGenerated = 0;
	private readonly gradeDistribution: Record<SignalGrade, number> = { A: 0, B: 0, C: 0 };
	private lastScanAt: number | null = null;
	private lastScanDurationMs: number | null = null;

	constructor(
		private readonly deps: ScannerDependencies,
		private readonly options: ScannerOptions
	) {
		this.policy = deps.policy ?? DEFAULT_SIGNAL_POLICY;
		this.detector = deps.detector ?? new SignalDetector(this.policy);
		this.now = deps.now ?? Date.now;
		this.pool = new Semaphore(Math.max(1, options.maxConcurrentFetches));
		this.riskScope = options.riskScope ?? "global";
	}

	get isRunning(): boolean {
		return this.running;
	}

	start(): void {
		if (this.running) {
			throw new Error("Scanner already running");
		}
		this.running = true;
		runtimeLogger.info("scanner_started", {
			scanIntervalMs: this.options.scanIntervalMs,
			maxConcurrentFetches: this.options.maxConcurrentFetches,
			timeframes: this.policy.timeframes,
		});
		this.schedule(0);
	}

	/**
	 * Stops re-arming the timer and waits for an in-flight cycle to finish.
	 */
	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.currentCycle) {
			await this.currentCycle;
		}
		runtimeLogger.info("scanner_stopped", { scanCount: this.scanCount });
	}

	/**
	 * Runs a cycle now. Waits for a cycle already in progress first.
	 */
	async forceScan(): Promise<ScanReport> {
		runtimeLogger.info("scan_forced", {});
		return this.scanOnce();
	}

	async scanOnce(): Promise<ScanReport> {
		return this.cycleLock.run(() => this.runScan());
	}

	async getStatus(): Promise<ScannerStatus> {
		const [open, enabledPairs] = await Promise.all([
			this.deps.lifecycle.listOpen(),
			this.deps.pairs.listEnabledPairs(),
		]);
		return {
			running: this.running,
			scanCount: this.scanCount,
			signalsGenerated: this.signalsGenerated,
			gradeDistribution: { ...this.gradeDistribution },
			lastScanAt: this.lastScanAt,
			lastScanDurationMs: this.lastScanDurationMs,
			openSignals: open.length,
			enabledPairs,
		};
	}

	private schedule(delayMs: number): void {
		if (!this.running) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = null;
			this.currentCycle = this.runScheduledCycle().finally(() => {
				this.currentCycle = null;
				this.schedule(this.options.scanIntervalMs);
			});
		}, delayMs);
	}

	private async runScheduledCycle(): Promise<void> {
		try {
			await this.scanOnce();
		} catch (err) {
			runtimeLogger.error("scan_cycle_failed", { error: describeError(err) });
		}
	}

	private async runScan(): Promise<ScanReport> {
		const startedAt = this.now();
		const symbols = await this.deps.pairs.listEnabledPairs();
		const profile = await this.deps.riskProfiles.getRiskProfile(this.riskScope);
		runtimeLogger.info("scan_started", { pairs: symbols.length, scan: this.scanCount + 1 });

		const pairs = await Promise.all(
			symbols.map((symbol) => this.pool.run(() => this.evaluatePair(symbol, profile)))
		);

		const expired = await this.deps.lifecycle.sweepExpired();
		const archived = await this.deps.lifecycle.sweepRetention();
		const finishedAt = this.now();

		this.scanCount += 1;
		this.lastScanAt = finishedAt;
		this.lastScanDurationMs = finishedAt - startedAt;

		const report: ScanReport = {
			startedAt,
			finishedAt,
			pairs,
			expired: expired.length,
			archived,
		};
		runtimeLogger.info("scan_completed", {
			scan: this.scanCount,
			durationMs: this.lastScanDurationMs,
			admitted: pairs.filter((pair) => pair.status === "admitted").length,
			skipped: pairs.filter((pair) => pair.status === "skipped").length,
			expired: report.expired,
			archived,
		});
		return report;
	}

	private async evaluatePair(symbol: string, profile: RiskProfile): Promise<PairOutcome> {
		try {
			const series = await this.fetchSeries(symbol);
			await this.deps.lifecycle.applyPrice(symbol, series.entry);

			const outcome = this.detector.detect({ symbol, ...series }, profile, this.now());
			if (outcome.kind === "rejected") {
				runtimeLogger.debug("candidate_rejected", {
					symbol,
					reason: outcome.reason,
					trendChecks: outcome.trend.checks,
					triggers: outcome.triggers?.fired ?? [],
				});
				return { symbol, status: "rejected", reason: outcome.reason };
			}

			const admission = await this.deps.lifecycle.admit(outcome.candidate);
			if (!admission.admitted) {
				return { symbol, status: "rejected", reason: admission.reason };
			}
			this.signalsGenerated += 1;
			this.gradeDistribution[admission.signal.grade] += 1;
			return { symbol, status: "admitted", signalId: admission.signal.id };
		} catch (err) {
			const outcome = classifyPairError(symbol, err);
			const level = outcome.status === "skipped" && outcome.reason === "unexpected_error" ? "error" : "info";
			runtimeLogger.log(level, outcome.status === "skipped" ? "pair_skipped" : "candidate_rejected", {
				...outcome,
			});
			return outcome;
		}
	}

	private async fetchSeries(symbol: string): Promise<PairSeriesSet> {
		const { trend, entry, confirmation, history } = this.policy.timeframes;
		const [trendCandles, entryCandles, confirmationCandles] = await Promise.all([
			this.fetch(symbol, trend, history),
			this.fetch(symbol, entry, history),
			confirmation ? this.fetch(symbol, confirmation, history) : Promise.resolve(null),
		]);
		return { trend: trendCandles, entry: entryCandles, confirmation: confirmationCandles };
	}

	private fetch(symbol: string, timeframe: string, count: number): Promise<Candle[]> {
		return withTimeout(
			this.deps.marketData.getCandles(symbol, timeframe, count),
			this.options.fetchTimeoutMs,
			`getCandles ${symbol} ${timeframe}`
		);
	}
}
