import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError } from "./errors";
import {
	DEFAULT_SIGNAL_POLICY,
	mergeSignalPolicy,
	type SignalPolicy,
	type TimeframePolicy,
} from "./policy";
import { parseDuration } from "./time";
import type { RiskProfile } from "./types";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("longwatch.config.meta");

const isRecord = (value: unknown): value is Record<PropertyKey, unknown> =>
	typeof value === "object" && value !== null;

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	isRecord(value) && typeof value.source === "string";

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!isRecord(config)) {
		return null;
	}
	const meta = config[CONFIG_META_SYMBOL];
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = getConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [".git", path.join("config", "risk")];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export type PersistenceDriver = "memory" | "file";

export interface EnvConfig {
	exchangeId: string;
	scanIntervalMs: number;
	defaultPairs: string[];
	fetchTimeoutMs: number;
	maxConcurrentFetches: number;
	persistenceDriver: PersistenceDriver;
	signalStorePath: string;
	wsPort: number | null;
	riskProfile: string;
	policyProfile: string;
	notifyAttempts: number;
}

export interface ExchangeConfig {
	id: string;
	apiKey?: string;
	secret?: string;
	sandbox: boolean;
	options: Record<string, unknown>;
}

export interface ScannerConfig {
	env: EnvConfig;
	exchange: ExchangeConfig;
	risk: RiskProfile;
	policy: SignalPolicy;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	riskProfile?: string;
	policyProfile?: string;
	env?: NodeJS.ProcessEnv;
}

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readIntegerEnv = (
	env: NodeJS.ProcessEnv,
	key: string,
	fallback: number,
	min = 1
): number => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
	}
	return value;
};

/**
 * Accepts "ETH/USDC,SOL/USDC" or a JSON array string.
 */
export const parsePairList = (value?: string): string[] => {
	if (!value) {
		return [];
	}
	const trimmed = value.trim();
	if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
		const parsed = parseJsonArray(trimmed);
		if (parsed) {
			return normalizePairs(parsed.map((entry) => String(entry)));
		}
	}
	return normalizePairs(trimmed.split(","));
};

/** Null when the text is not a JSON array; callers fall back to comma parsing. */
const parseJsonArray = (text: string): unknown[] | null => {
	try {
		const parsed: unknown = JSON.parse(text);
		return Array.isArray(parsed) ? parsed : null;
	} catch {
		return null;
	}
};

const normalizePairs = (values: string[]): string[] => {
	const pairs = values
		.map((token) => token.trim().replace(/^["'[]+|["'\]]+$/g, "").toUpperCase())
		.filter((token) => token.length > 0);
	return pairs.filter((pair, index) => pairs.indexOf(pair) === index);
};

const normalizeDriver = (value: string | undefined): PersistenceDriver =>
	value?.toLowerCase() === "file" ? "file" : "memory";

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
		);
	}
};

const requireRecord = (value: unknown, filePath: string): Record<string, unknown> => {
	if (!isRecord(value) || Array.isArray(value)) {
		throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
	}
	const record: Record<string, unknown> = {};
	for (const [key, nested] of Object.entries(value)) {
		record[key] = nested;
	}
	return record;
};

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new ConfigError(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositive = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (num <= 0) {
		throw new ConfigError(`${field} must be positive, got ${num}`);
	}
	return num;
};

const ensureDuration = (value: unknown, field: string): number => {
	if (typeof value !== "string" && typeof value !== "number") {
		throw new ConfigError(`Required duration field missing in ${field}`);
	}
	try {
		return parseDuration(value);
	} catch (error) {
		throw new ConfigError(
			`${field}: ${error instanceof Error ? error.message : String(error)}`
		);
	}
};

/**
 * Copies variables from a dotenv file into `env` without overriding values
 * that are already set.
 */
const applyEnvFile = (envPath: string, env: NodeJS.ProcessEnv): void => {
	const parsed = dotenv.parse(fs.readFileSync(envPath));
	for (const [key, value] of Object.entries(parsed)) {
		if (env[key] === undefined) {
			env[key] = value;
		}
	}
};

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env"),
	env: NodeJS.ProcessEnv = process.env
): EnvConfig => {
	const resolvedEnvPath = readOptionalEnvVar(env, "LONGWATCH_ENV_FILE") ?? envPath;
	const alreadyLoaded = env === process.env && loadedEnvPath === resolvedEnvPath;
	if (!alreadyLoaded && fs.existsSync(resolvedEnvPath)) {
		applyEnvFile(resolvedEnvPath, env);
		if (env === process.env) {
			loadedEnvPath = resolvedEnvPath;
		}
	}

	const wsPortRaw = readOptionalEnvVar(env, "WS_PORT");
	const wsPort = wsPortRaw === undefined ? null : Number(wsPortRaw);
	if (wsPort !== null && (!Number.isInteger(wsPort) || wsPort < 0 || wsPort > 65_535)) {
		throw new ConfigError(`WS_PORT must be a port number, got "${wsPortRaw}"`);
	}

	return {
		exchangeId: (readOptionalEnvVar(env, "EXCHANGE_ID") ?? "binance").toLowerCase(),
		scanIntervalMs: readIntegerEnv(env, "SCAN_INTERVAL_SEC", 180) * 1_000,
		defaultPairs: parsePairList(
			readOptionalEnvVar(env, "DEFAULT_PAIRS") ??
				"ETH/USDC,BNB/USDC,XRP/USDC,SOL/USDC,ADA/USDC"
		),
		fetchTimeoutMs: readIntegerEnv(env, "FETCH_TIMEOUT_MS", 10_000),
		maxConcurrentFetches: readIntegerEnv(env, "MAX_CONCURRENT_FETCHES", 4),
		persistenceDriver: normalizeDriver(readOptionalEnvVar(env, "PERSISTENCE_DRIVER")),
		signalStorePath:
			readOptionalEnvVar(env, "SIGNAL_STORE_PATH") ??
			path.join(findWorkspaceRoot(), "data", "signals.json"),
		wsPort,
		riskProfile: readOptionalEnvVar(env, "RISK_PROFILE") ?? "default",
		policyProfile: readOptionalEnvVar(env, "POLICY_PROFILE") ?? "default",
		notifyAttempts: readIntegerEnv(env, "NOTIFY_ATTEMPTS", 3),
	};
};

export const loadExchangeConfig = (
	envConfig: EnvConfig,
	configDir = path.join(findWorkspaceRoot(), "config"),
	env: NodeJS.ProcessEnv = process.env
): ExchangeConfig => {
	const exchangePath = path.join(configDir, "exchange", `${envConfig.exchangeId}.json`);
	const file = fs.existsSync(exchangePath)
		? requireRecord(readJsonFile(exchangePath), exchangePath)
		: {};
	const options = isRecord(file.options) ? requireRecord(file.options, exchangePath) : {};
	return withConfigMetadata(
		{
			id: envConfig.exchangeId,
			apiKey: readOptionalEnvVar(env, "EXCHANGE_API_KEY"),
			secret: readOptionalEnvVar(env, "EXCHANGE_API_SECRET"),
			sandbox: file.sandbox === true,
			options,
		},
		fs.existsSync(exchangePath)
			? { source: "file", path: exchangePath, profile: envConfig.exchangeId }
			: { source: "embedded", profile: envConfig.exchangeId }
	);
};

export const loadRiskProfile = (
	configDir = path.join(findWorkspaceRoot(), "config"),
	riskProfile = "default"
): RiskProfile => {
	const riskPath = path.join(configDir, "risk", `${riskProfile}.json`);
	const file = requireRecord(readJsonFile(riskPath), riskPath);
	const maxConcurrentSignals = ensureNumber(
		file.maxConcurrentSignals,
		"risk.maxConcurrentSignals"
	);
	if (!Number.isInteger(maxConcurrentSignals) || maxConcurrentSignals < 1) {
		throw new ConfigError(
			`risk.maxConcurrentSignals must be an integer >= 1, got ${maxConcurrentSignals}`
		);
	}
	return withConfigMetadata(
		{
			riskPerTradePct: ensurePositive(file.riskPerTradePct, "risk.riskPerTradePct"),
			accountEquity: ensurePositive(file.accountEquity, "risk.accountEquity"),
			maxConcurrentSignals,
			maxHoldDurationMs: ensureDuration(file.maxHoldDuration, "risk.maxHoldDuration"),
			signalTtlMs: ensureDuration(file.signalTtl, "risk.signalTtl"),
			retentionMs: ensureDuration(file.retention, "risk.retention"),
		},
		{ source: "file", path: riskPath, profile: riskProfile }
	);
};

const isKeyOf = <K extends string>(
	record: Record<K, unknown>,
	key: string
): key is K => Object.prototype.hasOwnProperty.call(record, key);

const overrideNumbers = <K extends string>(
	base: Record<K, number>,
	raw: Record<string, unknown>,
	label: string
): Record<K, number> => {
	const result: Record<K, number> = { ...base };
	for (const key of Object.keys(raw)) {
		if (!isKeyOf(base, key)) {
			throw new ConfigError(`${label}: unknown policy field "${key}"`);
		}
		result[key] = ensureNumber(raw[key], `${label}.${key}`);
	}
	return result;
};

const ensureString = (value: unknown, field: string): string => {
	if (typeof value !== "string" || !value.trim()) {
		throw new ConfigError(`Required string field missing in ${field}`);
	}
	return value.trim();
};

const overrideTimeframes = (
	base: TimeframePolicy,
	raw: Record<string, unknown>,
	label: string
): TimeframePolicy => {
	const result: TimeframePolicy = { ...base };
	for (const key of Object.keys(raw)) {
		const value = raw[key];
		switch (key) {
			case "trend":
			case "entry":
				result[key] = ensureString(value, `${label}.${key}`);
				break;
			case "confirmation":
				result.confirmation =
					value === null ? null : ensureString(value, `${label}.confirmation`);
				break;
			case "history":
				result.history = ensurePositive(value, `${label}.history`);
				break;
			default:
				throw new ConfigError(`${label}: unknown policy field "${key}"`);
		}
	}
	return result;
};

const POLICY_SECTIONS = [
	"timeframes",
	"indicators",
	"trend",
	"triggers",
	"grading",
	"sizing",
];

const sectionOf = (
	file: Record<string, unknown>,
	key: string,
	policyPath: string
): Record<string, unknown> =>
	file[key] === undefined ? {} : requireRecord(file[key], `${policyPath} (${key})`);

export const parseSignalPolicy = (
	file: Record<string, unknown>,
	policyPath: string,
	base: SignalPolicy = DEFAULT_SIGNAL_POLICY
): SignalPolicy => {
	for (const key of Object.keys(file)) {
		if (!POLICY_SECTIONS.includes(key)) {
			throw new ConfigError(`${policyPath}: unknown policy section "${key}"`);
		}
	}
	const policy: SignalPolicy = {
		timeframes: overrideTimeframes(
			base.timeframes,
			sectionOf(file, "timeframes", policyPath),
			`${policyPath}: timeframes`
		),
		indicators: overrideNumbers(
			base.indicators,
			sectionOf(file, "indicators", policyPath),
			`${policyPath}: indicators`
		),
		trend: overrideNumbers(base.trend, sectionOf(file, "trend", policyPath), `${policyPath}: trend`),
		triggers: overrideNumbers(
			base.triggers,
			sectionOf(file, "triggers", policyPath),
			`${policyPath}: triggers`
		),
		grading: overrideNumbers(
			base.grading,
			sectionOf(file, "grading", policyPath),
			`${policyPath}: grading`
		),
		sizing: overrideNumbers(base.sizing, sectionOf(file, "sizing", policyPath), `${policyPath}: sizing`),
	};
	if (policy.trend.rsiLower > policy.trend.rsiUpper) {
		throw new ConfigError(`${policyPath}: trend.rsiLower must not exceed trend.rsiUpper`);
	}
	if (policy.sizing.takeProfit1R <= 0 || policy.sizing.takeProfit2R <= policy.sizing.takeProfit1R) {
		throw new ConfigError(`${policyPath}: sizing requires 0 < takeProfit1R < takeProfit2R`);
	}
	if (policy.triggers.minTriggers < 1) {
		throw new ConfigError(`${policyPath}: triggers.minTriggers must be at least 1`);
	}
	return policy;
};

export const loadSignalPolicy = (
	configDir = path.join(findWorkspaceRoot(), "config"),
	policyProfile = "default"
): SignalPolicy => {
	const policyPath = path.join(configDir, "policy", `${policyProfile}.json`);
	if (!fs.existsSync(policyPath)) {
		return withConfigMetadata(mergeSignalPolicy(), { source: "embedded", profile: policyProfile });
	}
	const file = requireRecord(readJsonFile(policyPath), policyPath);
	return withConfigMetadata(parseSignalPolicy(file, policyPath), {
		source: "merged",
		path: policyPath,
		profile: policyProfile,
	});
};

export const loadScannerConfig = (options: ConfigLoadOptions = {}): ScannerConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const env = options.env ?? process.env;
	const envConfig = loadEnvConfig(options.envPath ?? path.join(workspaceRoot, ".env"), env);
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	return {
		env: envConfig,
		exchange: loadExchangeConfig(envConfig, configDir, env),
		risk: loadRiskProfile(configDir, options.riskProfile ?? envConfig.riskProfile),
		policy: loadSignalPolicy(configDir, options.policyProfile ?? envConfig.policyProfile),
	};
};
