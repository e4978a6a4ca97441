import type {
	Signal,
	SignalGrade,
	SignalOutcome,
	SignalStatus,
	TriggerName,
} from "@longwatch/core";

const GRADES: readonly SignalGrade[] = ["A", "B", "C"];
const STATUSES: readonly SignalStatus[] = [
	"pending",
	"active",
	"triggered",
	"expired",
	"cancelled",
];
const OUTCOMES: readonly SignalOutcome[] = [
	"stop_loss",
	"take_profit_1",
	"take_profit_2",
	"acknowledged",
	"ttl_elapsed",
	"max_hold_elapsed",
	"manual_cancel",
	"pair_muted",
	"invalidated",
];
const TRIGGERS: readonly TriggerName[] = [
	"breakout_retest",
	"bb_squeeze_expansion",
	"ema_crossover",
	"bullish_candle",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const includes = <T extends string>(list: readonly T[], value: unknown): value is T =>
	typeof value === "string" && list.some((entry) => entry === value);

const readNumber = (record: Record<string, unknown>, key: string): number => {
	const value = record[key];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`field "${key}" must be a finite number`);
	}
	return value;
};

const readNullableNumber = (
	record: Record<string, unknown>,
	key: string
): number | null => (record[key] === null || record[key] === undefined ? null : readNumber(record, key));

const readString = (record: Record<string, unknown>, key: string): string => {
	const value = record[key];
	if (typeof value !== "string" || !value) {
		throw new Error(`field "${key}" must be a non-empty string`);
	}
	return value;
};

/**
 * Rebuilds a Signal from parsed JSON, rejecting records written by anything
 * other than this store.
 */
export const decodeSignal = (value: unknown): Signal => {
	if (!isRecord(value)) {
		throw new Error("signal record must be an object");
	}
	const { grade, status, outcome, triggers } = value;
	if (!includes(GRADES, grade)) {
		throw new Error(`unknown grade ${String(grade)}`);
	}
	if (!includes(STATUSES, status)) {
		throw new Error(`unknown status ${String(status)}`);
	}
	let decodedOutcome: SignalOutcome | null = null;
	if (outcome !== null && outcome !== undefined) {
		if (!includes(OUTCOMES, outcome)) {
			throw new Error(`unknown outcome ${String(outcome)}`);
		}
		decodedOutcome = outcome;
	}
	if (!Array.isArray(triggers)) {
		throw new Error(`field "triggers" must be an array`);
	}
	const decodedTriggers: TriggerName[] = [];
	for (const trigger of triggers) {
		if (!includes(TRIGGERS, trigger)) {
			throw new Error(`unknown trigger ${String(trigger)}`);
		}
		decodedTriggers.push(trigger);
	}

	return {
		id: readString(value, "id"),
		symbol: readString(value, "symbol"),
		timeframe: readString(value, "timeframe"),
		entryPrice: readNumber(value, "entryPrice"),
		stopLoss: readNumber(value, "stopLoss"),
		takeProfit1: readNumber(value, "takeProfit1"),
		takeProfit2: readNumber(value, "takeProfit2"),
		grade,
		riskPct: readNumber(value, "riskPct"),
		positionSize: readNumber(value, "positionSize"),
		riskAmount: readNumber(value, "riskAmount"),
		riskRewardRatio: readNumber(value, "riskRewardRatio"),
		triggers: decodedTriggers,
		rationale: typeof value.rationale === "string" ? value.rationale : "",
		status,
		outcome: decodedOutcome,
		expiresAt: readNumber(value, "expiresAt"),
		activatedAt: readNullableNumber(value, "activatedAt"),
		triggeredAt: readNullableNumber(value, "triggeredAt"),
		closedAt: readNullableNumber(value, "closedAt"),
		createdAt: readNumber(value, "createdAt"),
		updatedAt: readNumber(value, "updatedAt"),
	};
};

export const SIGNAL_FILE_VERSION = 1;

export interface SignalFile {
	version: number;
	signals: Signal[];
}

export const decodeSignalFile = (raw: string): Signal[] => {
	const parsed: unknown = JSON.parse(raw);
	if (!isRecord(parsed) || !Array.isArray(parsed.signals)) {
		throw new Error("signal file must contain a signals array");
	}
	if (parsed.version !== SIGNAL_FILE_VERSION) {
		throw new Error(`unsupported signal file version ${String(parsed.version)}`);
	}
	return parsed.signals.map((entry, index) => {
		try {
			return decodeSignal(entry);
		} catch (err) {
			throw new Error(
				`signals[${index}]: ${err instanceof Error ? err.message : String(err)}`
			);
		}
	});
};
