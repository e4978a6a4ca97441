import type {
	OpenSignalStatus,
	SignalLevels,
	SignalStatus,
	TerminalSignalStatus,
} from "./types";

const TRANSITIONS: Record<SignalStatus, readonly SignalStatus[]> = {
	pending: ["active", "triggered", "expired", "cancelled"],
	active: ["triggered", "expired", "cancelled"],
	triggered: [],
	expired: [],
	cancelled: [],
};

export const OPEN_STATUSES: readonly OpenSignalStatus[] = ["pending", "active"];

export const isOpenStatus = (
	status: SignalStatus
): status is OpenSignalStatus => status === "pending" || status === "active";

export const isTerminalStatus = (
	status: SignalStatus
): status is TerminalSignalStatus => !isOpenStatus(status);

export const canTransition = (
	from: SignalStatus,
	to: SignalStatus
): boolean => TRANSITIONS[from].includes(to);

/**
 * Long-only ordering: stop < entry < tp1 < tp2, all finite and positive.
 */
export const hasLongOrdering = (levels: SignalLevels): boolean => {
	const { entryPrice, stopLoss, takeProfit1, takeProfit2 } = levels;
	const values = [entryPrice, stopLoss, takeProfit1, takeProfit2];
	if (!values.every((value) => Number.isFinite(value) && value > 0)) {
		return false;
	}
	return stopLoss < entryPrice && entryPrice < takeProfit1 && takeProfit1 < takeProfit2;
};

export const buildSignalId = (
	symbol: string,
	timeframe: string,
	createdAt: number
): string => `${symbol}:${timeframe}:${createdAt}`;
