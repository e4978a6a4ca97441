import {
	DegenerateRiskError,
	InsufficientDataError,
	MarketDataError,
	TimeoutError,
	describeError,
	type DegenerateRiskReason,
	type MarketDataErrorKind,
} from "@longwatch/core";
import type { AdmissionRejection } from "@longwatch/lifecycle";
import type { DetectionRejection } from "@longwatch/strategy-engine";

export type PairSkipReason = "insufficient_data" | MarketDataErrorKind | "unexpected_error";

export type PairRejectReason = DetectionRejection | AdmissionRejection | DegenerateRiskReason;

export type PairOutcome =
	| { symbol: string; status: "admitted"; signalId: string }
	| { symbol: string; status: "rejected"; reason: PairRejectReason }
	| { symbol: string; status: "skipped"; reason: PairSkipReason; detail: string };

/**
 * Turns a per-pair failure into an outcome. Nothing thrown while evaluating
 * one pair reaches the cycle.
 */
export const classifyPairError = (symbol: string, err: unknown): PairOutcome => {
	if (err instanceof InsufficientDataError) {
		return { symbol, status: "skipped", reason: "insufficient_data", detail: err.message };
	}
	if (err instanceof MarketDataError) {
		return { symbol, status: "skipped", reason: err.kind, detail: err.message };
	}
	if (err instanceof TimeoutError) {
		return { symbol, status: "skipped", reason: "Timeout", detail: err.message };
	}
	if (err instanceof DegenerateRiskError) {
		return { symbol, status: "rejected", reason: err.reason };
	}
	return { symbol, status: "skipped", reason: "unexpected_error", detail: describeError(err) };
};
