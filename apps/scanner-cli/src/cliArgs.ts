import { ConfigError, parsePairList } from "@longwatch/core";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token || !token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const getStringArg = (args: Record<string, ArgValue>, key: string): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length > 0 ? value : undefined;
};

export interface ScannerCliOptions {
	riskProfile?: string;
	policyProfile?: string;
	pairs?: string[];
	/** undefined keeps WS_PORT from the environment; null disables the gateway. */
	wsPort?: number | null;
	once: boolean;
}

/**
 * --risk <profile> --policy <profile> --pairs A/B,C/D --ws-port <n> --no-ws --once
 */
export const resolveCliOptions = (args: Record<string, ArgValue>): ScannerCliOptions => {
	const pairsArg = getStringArg(args, "pairs");
	const pairs = pairsArg ? parsePairList(pairsArg) : undefined;
	if (pairs && pairs.length === 0) {
		throw new ConfigError("--pairs needs at least one symbol");
	}

	let wsPort: number | null | undefined;
	if (args["no-ws"] === true) {
		wsPort = null;
	} else {
		const raw = getStringArg(args, "ws-port");
		if (raw !== undefined) {
			wsPort = Number(raw);
			if (!Number.isInteger(wsPort) || wsPort < 0 || wsPort > 65_535) {
				throw new ConfigError(`--ws-port must be a port number, got "${raw}"`);
			}
		}
	}

	return {
		riskProfile: getStringArg(args, "risk"),
		policyProfile: getStringArg(args, "policy"),
		pairs,
		wsPort,
		once: args.once === true,
	};
};
