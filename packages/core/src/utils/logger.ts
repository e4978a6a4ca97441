export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

interface LoggerSettings {
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

const readModuleFilter = (raw: string | undefined): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const readSettings = (env: NodeJS.ProcessEnv): LoggerSettings => {
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		moduleFilter: readModuleFilter(env.LOG_MODULE),
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

let settings = readSettings(process.env);

/**
 * Re-reads LOG_* variables. Called after dotenv has populated process.env.
 */
export const configureLogger = (env: NodeJS.ProcessEnv = process.env): void => {
	settings = readSettings(env);
};

type LogSink = (line: string) => void;

let sink: LogSink = (line) => console.log(line);

/**
 * Redirects output, mainly so tests can capture lines. Returns a restore hook.
 */
export const setLogSink = (next: LogSink): (() => void) => {
	const previous = sink;
	sink = next;
	return () => {
		sink = previous;
	};
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		sink(formatPretty(base));
	}

	if (settings.json) {
		try {
			sink(JSON.stringify(sanitize(base)));
		} catch (err) {
			sink(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): unknown => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen);
};

export const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Set) {
		return sanitizeValue(Array.from(value), seen);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const formatPrettyValue = (value: unknown): string => {
	if (typeof value === "number") {
		return Number.isInteger(value) ? String(value) : value.toFixed(4);
	}
	if (value === null || value === undefined) {
		return "-";
	}
	if (typeof value === "object") {
		return JSON.stringify(sanitizeValue(value, new WeakSet<object>()));
	}
	return String(value);
};

function formatPretty(base: BaseLogPayload): string {
	const { level, event, module, ts, ...rest } = base;
	const fields = Object.entries(rest)
		.map(([key, value]) => `${key}=${formatPrettyValue(value)}`)
		.join(" ");
	const header = `[${ts}] [${level.toUpperCase()}] ${module}:${event}`;
	return fields.length ? `${header} ${fields}` : header;
}
