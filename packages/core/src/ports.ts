import type {
	Candle,
	PairWatch,
	RiskProfile,
	Signal,
	SignalOutcome,
	SignalStatus,
} from "./types";

/**
 * Source of OHLCV history. Implementations reject with a `MarketDataError`
 * whose kind is `RateLimited`, `NotFound`, `Timeout` or `Unavailable`.
 */
export interface MarketDataProvider {
	/**
	 * @returns candles ascending by timestamp, at most `count` of them
	 */
	getCandles(symbol: string, timeframe: string, count: number): Promise<Candle[]>;
}

export interface PairWatchStore {
	listEnabledPairs(): Promise<string[]>;
	listPairs(): Promise<PairWatch[]>;
	isEnabled(symbol: string): Promise<boolean>;
	addPair(symbol: string): Promise<boolean>;
	setPairEnabled(symbol: string, enabled: boolean): Promise<boolean>;
}

export type RiskProfileScope = "global" | `user:${string}`;

export interface RiskProfileStore {
	getRiskProfile(scope: RiskProfileScope): Promise<RiskProfile>;
	setRiskProfile(scope: RiskProfileScope, profile: RiskProfile): Promise<void>;
}

export interface EmissionSwitch {
	isMuted(): Promise<boolean>;
	setMuted(muted: boolean): Promise<void>;
}

export interface SignalStatusPatch {
	outcome?: SignalOutcome | null;
	activatedAt?: number | null;
	triggeredAt?: number | null;
	closedAt?: number | null;
	updatedAt: number;
}

/**
 * Plain storage for signals. No business rules live here: the lifecycle
 * manager is the only writer of status transitions.
 */
export interface SignalStore {
	create(signal: Signal): Promise<void>;
	updateStatus(
		id: string,
		status: SignalStatus,
		patch: SignalStatusPatch
	): Promise<Signal>;
	get(id: string): Promise<Signal | null>;
	listOpen(): Promise<Signal[]>;
	list(): Promise<Signal[]>;
	/**
	 * Removes every signal created more than `maxAgeMs` before `now`.
	 * @returns number of signals archived
	 */
	archiveOlderThan(maxAgeMs: number, now: number): Promise<number>;
}

export type SignalEventType = "signal_created" | "signal_status_changed";

export interface SignalEvent {
	type: SignalEventType;
	signal: Signal;
	previousStatus?: SignalStatus;
}

/**
 * Best-effort, at-least-once delivery. Receivers must tolerate duplicates.
 */
export interface Notifier {
	publish(event: SignalEvent): Promise<void>;
}

export type LifecycleCommand =
	| { type: "markActive"; id: string }
	| { type: "markTriggered"; id: string }
	| { type: "cancel"; id: string }
	| { type: "mutePair"; symbol: string };
