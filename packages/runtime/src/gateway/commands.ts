import type { LifecycleCommand } from "@longwatch/core";

export type GatewayCommand =
	| LifecycleCommand
	| { type: "setPairEnabled"; symbol: string; enabled: boolean }
	| { type: "addPair"; symbol: string }
	| { type: "setMuted"; muted: boolean }
	| { type: "listOpen" }
	| { type: "status" }
	| { type: "forceScan" };

export const GATEWAY_COMMAND_TYPES = [
	"markActive",
	"markTriggered",
	"cancel",
	"mutePair",
	"addPair",
	"setPairEnabled",
	"setMuted",
	"listOpen",
	"status",
	"forceScan",
] as const satisfies readonly GatewayCommand["type"][];

export type ParsedCommand =
	| { ok: true; command: GatewayCommand; requestId: string | null }
	| { ok: false; error: string; requestId: string | null };

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (record: Record<string, unknown>, key: string): string | null => {
	const value = record[key];
	return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
};

const readBoolean = (record: Record<string, unknown>, key: string): boolean | null => {
	const value = record[key];
	return typeof value === "boolean" ? value : null;
};

const toCommand = (record: Record<string, unknown>): GatewayCommand | string => {
	const type = readString(record, "type");
	switch (type) {
		case "markActive":
		case "markTriggered":
		case "cancel": {
			const id = readString(record, "id");
			return id ? { type, id } : `${type} needs an id`;
		}
		case "mutePair":
		case "addPair": {
			const symbol = readString(record, "symbol");
			return symbol ? { type, symbol } : `${type} needs a symbol`;
		}
		case "setPairEnabled": {
			const symbol = readString(record, "symbol");
			const enabled = readBoolean(record, "enabled");
			if (!symbol || enabled === null) {
				return "setPairEnabled needs a symbol and a boolean enabled";
			}
			return { type, symbol, enabled };
		}
		case "setMuted": {
			const muted = readBoolean(record, "muted");
			return muted === null ? "setMuted needs a boolean muted" : { type, muted };
		}
		case "listOpen":
		case "status":
		case "forceScan":
			return { type };
		case null:
			return "command type is missing";
		default:
			return `unknown command type: ${type}`;
	}
};

/**
 * Parses one inbound gateway frame. Never throws.
 */
export const parseGatewayCommand = (raw: string): ParsedCommand => {
	let payload: unknown;
	try {
		payload = JSON.parse(raw);
	} catch {
		return { ok: false, error: "invalid JSON", requestId: null };
	}
	if (!isRecord(payload)) {
		return { ok: false, error: "command must be a JSON object", requestId: null };
	}
	const requestId = readString(payload, "requestId");
	const command = toCommand(payload);
	if (typeof command === "string") {
		return { ok: false, error: command, requestId };
	}
	return { ok: true, command, requestId };
};
