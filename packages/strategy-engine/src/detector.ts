import {
	DEFAULT_SIGNAL_POLICY,
	describeSetup,
	type Candle,
	type SignalCandidate,
	type SignalPolicy,
} from "@longwatch/core";
import { computeIndicatorSnapshot, type IndicatorSnapshot } from "@longwatch/indicators";
import { RiskSizer, type SizingProfile } from "@longwatch/risk-engine";
import { evaluateTriggers } from "./evaluateTriggers";
import { gradeSignal } from "./grader";
import { passesTrendFilter, type TrendFilterResult } from "./trendFilter";
import { DEFAULT_TRIGGERS } from "./triggers";
import type { EntryTrigger, TriggerResult } from "./types";

export interface PairSeries {
	symbol: string;
	trend: Candle[];
	entry: Candle[];
	confirmation: Candle[] | null;
}

export interface SnapshotInput {
	trend: IndicatorSnapshot;
	entry: IndicatorSnapshot;
	entryCandles: Candle[];
	confirmationCandles: Candle[] | null;
}

export type DetectionRejection = "trend_filter" | "insufficient_triggers";

export type DetectionOutcome =
	| {
			kind: "candidate";
			candidate: SignalCandidate;
			trend: TrendFilterResult;
			triggers: TriggerResult;
	  }
	| {
			kind: "rejected";
			reason: DetectionRejection;
			trend: TrendFilterResult;
			triggers: TriggerResult | null;
	  };

/**
 * Indicators, trend gate, triggers, grade and size for one pair. Throws
 * `InsufficientDataError` or `DegenerateRiskError`; every other negative
 * answer is a `rejected` outcome.
 */
export class SignalDetector {
	private readonly sizer: RiskSizer;

	constructor(
		private readonly policy: SignalPolicy = DEFAULT_SIGNAL_POLICY,
		private readonly triggers: readonly EntryTrigger[] = DEFAULT_TRIGGERS
	) {
		this.sizer = new RiskSizer(policy.sizing);
	}

	detect(series: PairSeries, profile: SizingProfile, now: number): DetectionOutcome {
		const { timeframes, indicators } = this.policy;
		return this.detectFromSnapshots(
			{
				trend: computeIndicatorSnapshot(series.trend, timeframes.trend, indicators),
				entry: computeIndicatorSnapshot(series.entry, timeframes.entry, indicators),
				entryCandles: series.entry,
				confirmationCandles: series.confirmation,
			},
			profile,
			now
		);
	}

	detectFromSnapshots(
		input: SnapshotInput,
		profile: SizingProfile,
		now: number
	): DetectionOutcome {
		const trend = passesTrendFilter(input.trend, input.entry, this.policy.trend);
		if (!trend.passed) {
			return { kind: "rejected", reason: "trend_filter", trend, triggers: null };
		}

		const triggers = evaluateTriggers(
			{
				snapshot: input.entry,
				candles: input.entryCandles,
				confirmationCandles: input.confirmationCandles,
			},
			this.policy,
			this.triggers
		);
		if (triggers.count < this.policy.triggers.minTriggers) {
			return { kind: "rejected", reason: "insufficient_triggers", trend, triggers };
		}

		const entryPrice = input.entry.close;
		const plan = this.sizer.size(
			{ entryPrice, atr: input.entry.atr14, swingLow: input.entry.swingLow },
			profile
		);
		const grade = gradeSignal(
			{
				triggerCount: triggers.count,
				margins: trend.margins,
				stopDistancePct: plan.stopDistancePct,
			},
			this.policy.grading
		);

		return {
			kind: "candidate",
			trend,
			triggers,
			candidate: {
				symbol: input.entry.symbol,
				timeframe: input.entry.timeframe,
				entryPrice,
				stopLoss: plan.stopLoss,
				takeProfit1: plan.takeProfit1,
				takeProfit2: plan.takeProfit2,
				grade,
				riskPct: profile.riskPerTradePct,
				positionSize: plan.positionSize,
				riskAmount: plan.riskAmount,
				riskRewardRatio: plan.riskRewardRatio,
				triggers: triggers.fired,
				rationale: describeSetup(grade, triggers.fired),
				detectedAt: now,
			},
		};
	}
}
