export * from "./time";

export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type SignalGrade = "A" | "B" | "C";

export type SignalStatus =
	| "pending"
	| "active"
	| "triggered"
	| "expired"
	| "cancelled";

export type OpenSignalStatus = Extract<SignalStatus, "pending" | "active">;
export type TerminalSignalStatus = Exclude<SignalStatus, OpenSignalStatus>;

export type SignalOutcome =
	| "stop_loss"
	| "take_profit_1"
	| "take_profit_2"
	| "acknowledged"
	| "ttl_elapsed"
	| "max_hold_elapsed"
	| "manual_cancel"
	| "pair_muted"
	| "invalidated";

export type TriggerName =
	| "breakout_retest"
	| "bb_squeeze_expansion"
	| "ema_crossover"
	| "bullish_candle";

export interface SignalLevels {
	entryPrice: number;
	stopLoss: number;
	takeProfit1: number;
	takeProfit2: number;
}

/**
 * A graded and sized setup that has not been through admission control yet.
 */
export interface SignalCandidate extends SignalLevels {
	symbol: string;
	timeframe: string;
	grade: SignalGrade;
	riskPct: number;
	positionSize: number;
	riskAmount: number;
	riskRewardRatio: number;
	triggers: TriggerName[];
	rationale: string;
	detectedAt: number;
}

export interface Signal extends SignalLevels {
	id: string;
	symbol: string;
	timeframe: string;
	grade: SignalGrade;
	riskPct: number;
	positionSize: number;
	riskAmount: number;
	riskRewardRatio: number;
	triggers: TriggerName[];
	rationale: string;
	status: SignalStatus;
	outcome: SignalOutcome | null;
	expiresAt: number;
	activatedAt: number | null;
	triggeredAt: number | null;
	closedAt: number | null;
	createdAt: number;
	updatedAt: number;
}

export interface PairWatch {
	symbol: string;
	enabled: boolean;
	addedAt: number;
}

export interface RiskProfile {
	/** Percent of account equity put at risk per signal (0.7 means 0.7 %). */
	riskPerTradePct: number;
	accountEquity: number;
	maxConcurrentSignals: number;
	maxHoldDurationMs: number;
	signalTtlMs: number;
	retentionMs: number;
}
