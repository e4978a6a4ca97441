import type { SignalStatus } from "./types";

export class InsufficientDataError extends Error {
	readonly name = "InsufficientDataError";

	constructor(
		readonly timeframe: string,
		readonly required: number,
		readonly received: number
	) {
		super(
			`Insufficient candles for ${timeframe}: need ${required}, got ${received}`
		);
	}
}

export type DegenerateRiskReason =
	| "non_positive_risk"
	| "invalid_stop"
	| "invalid_risk_pct"
	| "invalid_equity"
	| "stop_too_close"
	| "stop_too_far";

export class DegenerateRiskError extends Error {
	readonly name = "DegenerateRiskError";

	constructor(
		readonly reason: DegenerateRiskReason,
		message: string
	) {
		super(message);
	}
}

export type MarketDataErrorKind =
	| "RateLimited"
	| "NotFound"
	| "Timeout"
	| "Unavailable";

export class MarketDataError extends Error {
	readonly name = "MarketDataError";

	constructor(
		readonly kind: MarketDataErrorKind,
		message: string,
		readonly cause?: unknown
	) {
		super(message);
	}
}

export class PersistenceError extends Error {
	readonly name = "PersistenceError";

	constructor(
		readonly operation: string,
		readonly cause: unknown
	) {
		super(
			`Signal store ${operation} failed: ${
				cause instanceof Error ? cause.message : String(cause)
			}`
		);
	}
}

export class SignalNotFoundError extends Error {
	readonly name = "SignalNotFoundError";

	constructor(readonly signalId: string) {
		super(`Signal not found: ${signalId}`);
	}
}

export class InvalidTransitionError extends Error {
	readonly name = "InvalidTransitionError";

	constructor(
		readonly signalId: string,
		readonly from: SignalStatus,
		readonly to: SignalStatus
	) {
		super(`Signal ${signalId} cannot move from ${from} to ${to}`);
	}
}

export class ConfigError extends Error {
	readonly name = "ConfigError";
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
