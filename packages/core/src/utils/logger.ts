export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const prettyEnabled = process.env.LOG_PRETTY === "true";

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

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

// Vitest sets NODE_ENV=test; keep test output quiet unless asked for.
const minLevel = normalizeLevel(
	process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "error" : undefined)
);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

/** One JSON line per event, or a console table with LOG_PRETTY=true. */
const log = (payload: LogPayload): void => {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const base: LogPayload = { ts: new Date().toISOString(), ...payload };

	if (prettyEnabled) {
		printPretty(base);
		return;
	}
	try {
		console.log(JSON.stringify(sanitizeValue(base, new WeakSet())));
	} catch (err) {
		console.log(
			JSON.stringify({
				ts: base.ts,
				level: "error",
				event: "logging_error",
				module: "logger",
				error: err instanceof Error ? err.message : "serialization_failed",
			})
		);
	}
};

export interface ModuleLogger {
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object>
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
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
	if (value instanceof Map) {
		return sanitizeValue(Object.fromEntries(value), seen);
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

const field = (rest: Record<string, unknown>, key: string): unknown =>
	rest[key] ?? null;

function printPretty(base: LogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "step_summary":
			console.table([
				{
					timestamp: field(rest, "timestamp"),
					bars: field(rest, "bars"),
					eligible: field(rest, "eligible"),
					signals: field(rest, "signals"),
					accepted: field(rest, "accepted"),
					rejected: field(rest, "rejected"),
					equity: field(rest, "equity"),
					cash: field(rest, "cash"),
				},
			]);
			break;
		case "order_accepted":
		case "order_rejected":
			console.table([
				{
					symbol: field(rest, "symbol"),
					action: field(rest, "action"),
					direction: field(rest, "direction"),
					quantity: field(rest, "quantity"),
					price: field(rest, "price"),
					rationale: field(rest, "rationale"),
					reason: field(rest, "reason"),
				},
			]);
			break;
		case "backtest_complete": {
			const summary = rest.summary;
			if (summary && typeof summary === "object") {
				console.table([summary]);
			}
			break;
		}
		default:
			break;
	}
}
