/**
 * Tunable thresholds for detection, grading and sizing. Every literal the
 * detection pipeline compares against lives here so the predicates stay pure.
 */
export interface TimeframePolicy {
	trend: string;
	entry: string;
	/** Optional lower timeframe used by the candle-pattern trigger. */
	confirmation: string | null;
	/** Candles requested per timeframe. */
	history: number;
}

export interface IndicatorPolicy {
	emaFast: number;
	emaMedium: number;
	emaSlow: number;
	emaTrend: number;
	rsiPeriod: number;
	atrPeriod: number;
	bollingerPeriod: number;
	bollingerStdDev: number;
	volumePeriod: number;
	swingLookback: number;
	/** Lower bound on history length; the longest EMA raises it further. */
	minCandles: number;
}

export interface TrendPolicy {
	rsiLower: number;
	rsiUpper: number;
}

export interface TriggerPolicy {
	minTriggers: number;
	retestWindow: number;
	retestTolerancePct: number;
	squeezeLookback: number;
	squeezeRatio: number;
	expansionRatio: number;
	squeezeVolumeMultiple: number;
	candleVolumeMultiple: number;
	wickBodyRatio: number;
}

export interface GradingPolicy {
	strongEma200MarginPct: number;
	strongEma50MarginPct: number;
	strongRsiInset: number;
	wideStopPct: number;
}

export interface SizingPolicy {
	atrStopMultiple: number;
	takeProfit1R: number;
	takeProfit2R: number;
	maxRiskPerTradePct: number;
	minStopDistancePct: number;
	maxStopDistancePct: number;
}

export interface SignalPolicy {
	timeframes: TimeframePolicy;
	indicators: IndicatorPolicy;
	trend: TrendPolicy;
	triggers: TriggerPolicy;
	grading: GradingPolicy;
	sizing: SizingPolicy;
}

export const DEFAULT_SIGNAL_POLICY: SignalPolicy = {
	timeframes: {
		trend: "1h",
		entry: "15m",
		confirmation: "5m",
		history: 300,
	},
	indicators: {
		emaFast: 9,
		emaMedium: 21,
		emaSlow: 50,
		emaTrend: 200,
		rsiPeriod: 14,
		atrPeriod: 14,
		bollingerPeriod: 20,
		bollingerStdDev: 2,
		volumePeriod: 20,
		swingLookback: 20,
		minCandles: 200,
	},
	trend: {
		rsiLower: 45,
		rsiUpper: 65,
	},
	triggers: {
		minTriggers: 2,
		retestWindow: 5,
		retestTolerancePct: 0.5,
		squeezeLookback: 20,
		squeezeRatio: 0.8,
		expansionRatio: 1.1,
		squeezeVolumeMultiple: 1.2,
		candleVolumeMultiple: 1.1,
		wickBodyRatio: 2,
	},
	grading: {
		strongEma200MarginPct: 1,
		strongEma50MarginPct: 0.3,
		strongRsiInset: 3,
		wideStopPct: 3,
	},
	sizing: {
		atrStopMultiple: 1.5,
		takeProfit1R: 1,
		takeProfit2R: 2,
		maxRiskPerTradePct: 5,
		minStopDistancePct: 0.5,
		maxStopDistancePct: 10,
	},
};

type DeepPartial<T> = {
	[K in keyof T]?: T[K] extends object ? Partial<T[K]> : T[K];
};

export type SignalPolicyOverrides = DeepPartial<SignalPolicy>;

export const mergeSignalPolicy = (
	overrides: SignalPolicyOverrides = {},
	base: SignalPolicy = DEFAULT_SIGNAL_POLICY
): SignalPolicy => ({
	timeframes: { ...base.timeframes, ...overrides.timeframes },
	indicators: { ...base.indicators, ...overrides.indicators },
	trend: { ...base.trend, ...overrides.trend },
	triggers: { ...base.triggers, ...overrides.triggers },
	grading: { ...base.grading, ...overrides.grading },
	sizing: { ...base.sizing, ...overrides.sizing },
});
