import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError } from "./errors";
import { deepFreeze } from "./utils/freeze";

export interface IndicatorConfig {
	/** Rolling window length for the trend SMA. */
	lookback: number;
	atrPeriod: number;
	/** Bars between the two SMA values compared for slope. */
	slopeLookback: number;
	volumeLookback: number;
}

export interface SignalConfig {
	crossThreshold: number;
	retestMinDistance: number;
	retestMaxDistance: number;
	requirePositiveSlope: boolean;
	shortingEnabled: boolean;
}

export type StopAnchor = "sma" | "entry";

export interface StopLossConfig {
	anchor: StopAnchor;
	pct: number;
}

export interface TrailingStopConfig {
	activationPct: number;
	atrMultiplier: number;
}

export interface RiskConfig {
	/** Fraction of equity risked between entry and stop. */
	riskPerTrade: number;
	maxConcurrentPositions: number;
	/** Fills allowed per symbol; above 1 lets an open position be added to. */
	maxEntriesPerSymbol: number;
	/** Gross exposure limit as a multiple of equity. */
	maxAggregateExposure: number;
	stopLoss: StopLossConfig;
	takeProfitPct: number | null;
	trailing: TrailingStopConfig | null;
	/** Cash held back when an entry has to be cut down to buying power. */
	cashBufferPct: number;
}

export interface UniverseConfig {
	minPrice: number;
	minAverageVolume: number;
	minWarmupBars: number;
	maxSize: number | null;
}

export interface RegimeFilterConfig {
	benchmark: string;
}

export interface AccountConfig {
	initialCash: number;
}

export interface BacktestConfig {
	indicators: IndicatorConfig;
	signals: SignalConfig;
	risk: RiskConfig;
	universe: UniverseConfig;
	regimeFilter: RegimeFilterConfig | null;
	account: AccountConfig;
}

export type ResolvedBacktestConfig = Readonly<BacktestConfig>;

export interface BacktestConfigOverrides {
	indicators?: Partial<IndicatorConfig>;
	signals?: Partial<SignalConfig>;
	risk?: Partial<RiskConfig>;
	universe?: Partial<UniverseConfig>;
	regimeFilter?: RegimeFilterConfig | null;
	account?: Partial<AccountConfig>;
}

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = {
	indicators: {
		lookback: 150,
		atrPeriod: 14,
		slopeLookback: 5,
		volumeLookback: 20,
	},
	signals: {
		crossThreshold: 0.01,
		retestMinDistance: 0.03,
		retestMaxDistance: 0.04,
		requirePositiveSlope: false,
		shortingEnabled: false,
	},
	risk: {
		riskPerTrade: 0.01,
		maxConcurrentPositions: 2,
		maxEntriesPerSymbol: 1,
		maxAggregateExposure: 1,
		stopLoss: { anchor: "sma", pct: 0.015 },
		takeProfitPct: null,
		trailing: { activationPct: 0.15, atrMultiplier: 2 },
		cashBufferPct: 0,
	},
	universe: {
		minPrice: 5,
		minAverageVolume: 0,
		minWarmupBars: 150,
		maxSize: 100,
	},
	regimeFilter: null,
	account: {
		initialCash: 100_000,
	},
};

export const validateBacktestConfig = (config: BacktestConfig): void => {
	const { indicators, signals, risk, universe, account } = config;
	requireInteger(indicators.lookback, "indicators.lookback", 1);
	requireInteger(indicators.atrPeriod, "indicators.atrPeriod", 1);
	requireInteger(indicators.slopeLookback, "indicators.slopeLookback", 1);
	requireInteger(indicators.volumeLookback, "indicators.volumeLookback", 1);

	if (risk.riskPerTrade <= 0 || risk.riskPerTrade > 0.1) {
		throw new ConfigError("risk.riskPerTrade must be in (0, 0.1]", {
			value: risk.riskPerTrade,
		});
	}
	requireInteger(risk.maxConcurrentPositions, "risk.maxConcurrentPositions", 1);
	requireInteger(risk.maxEntriesPerSymbol, "risk.maxEntriesPerSymbol", 1);
	if (!(risk.cashBufferPct >= 0 && risk.cashBufferPct < 1)) {
		throw new ConfigError("risk.cashBufferPct must be in [0, 1)", {
			value: risk.cashBufferPct,
		});
	}
	if (!(risk.maxAggregateExposure > 0)) {
		throw new ConfigError("risk.maxAggregateExposure must be positive");
	}
	if (!(risk.stopLoss.pct >= 0)) {
		throw new ConfigError("risk.stopLoss.pct must not be negative");
	}
	if (risk.takeProfitPct !== null && !(risk.takeProfitPct > 0)) {
		throw new ConfigError("risk.takeProfitPct must be positive or null");
	}
	if (
		risk.trailing !== null &&
		(!(risk.trailing.atrMultiplier > 0) || risk.trailing.activationPct < 0)
	) {
		throw new ConfigError(
			"risk.trailing needs a positive atrMultiplier and non-negative activationPct"
		);
	}

	if (!(signals.crossThreshold > 0)) {
		throw new ConfigError("signals.crossThreshold must be positive");
	}
	if (signals.retestMinDistance >= signals.retestMaxDistance) {
		throw new ConfigError(
			"signals.retestMinDistance must be less than signals.retestMaxDistance"
		);
	}

	if (universe.minPrice < 0 || universe.minAverageVolume < 0) {
		throw new ConfigError("universe minimums must not be negative");
	}
	requireInteger(universe.minWarmupBars, "universe.minWarmupBars", 0);
	if (universe.maxSize !== null) {
		requireInteger(universe.maxSize, "universe.maxSize", 1);
	}
	if (!(account.initialCash > 0)) {
		throw new ConfigError("account.initialCash must be positive");
	}
};

/**
 * Merges overrides onto the defaults, validates, and freezes the result.
 * Components receive this object through their constructors and never read
 * configuration from anywhere else.
 */
export const createBacktestConfig = (
	overrides: BacktestConfigOverrides = {},
	base: BacktestConfig = DEFAULT_BACKTEST_CONFIG
): ResolvedBacktestConfig => {
	const merged: BacktestConfig = {
		indicators: { ...base.indicators, ...overrides.indicators },
		signals: { ...base.signals, ...overrides.signals },
		risk: {
			...base.risk,
			...overrides.risk,
			stopLoss: { ...(overrides.risk?.stopLoss ?? base.risk.stopLoss) },
			trailing:
				overrides.risk?.trailing !== undefined
					? overrides.risk.trailing
					: base.risk.trailing,
		},
		universe: { ...base.universe, ...overrides.universe },
		regimeFilter:
			overrides.regimeFilter !== undefined
				? overrides.regimeFilter
				: base.regimeFilter,
		account: { ...base.account, ...overrides.account },
	};
	validateBacktestConfig(merged);
	return deepFreeze(merged);
};

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	paths: string[];
	source: ConfigSourceType;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	configMetadata.set(config, {
		...(configMetadata.get(config) ?? {}),
		...metadata,
	});
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

export interface EnvConfig {
	configDir?: string;
	profile: string;
	initialCash?: number;
}

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git", ".env"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	const start = process.cwd();
	let current = start;
	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = start;
			return start;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}
	const rawCash = readOptionalEnvVar("TRENDLINE_INITIAL_CASH");
	let initialCash: number | undefined;
	if (rawCash !== undefined) {
		initialCash = Number(rawCash);
		if (!Number.isFinite(initialCash)) {
			throw new ConfigError(
				`TRENDLINE_INITIAL_CASH is not a number: ${rawCash}`
			);
		}
	}
	return {
		configDir: readOptionalEnvVar("TRENDLINE_CONFIG_DIR"),
		profile: readOptionalEnvVar("TRENDLINE_PROFILE") ?? "default",
		initialCash,
	};
};

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonRecord = (filePath: string): JsonRecord => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Unable to read config file ${filePath}`, {
			cause: error instanceof Error ? error.message : String(error),
		});
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Config file ${filePath} must contain an object`);
	}
	return parsed;
};

const requireInteger = (value: number, field: string, min: number): void => {
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(`${field} must be an integer >= ${min}`, { value });
	}
};

const ensureNumber = (
	file: JsonRecord,
	key: string,
	field: string
): number | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new ConfigError(`Expected a number for ${field}`, { value });
	}
	return value;
};

const ensureNullableNumber = (
	file: JsonRecord,
	key: string,
	field: string
): number | null | undefined =>
	file[key] === null ? null : ensureNumber(file, key, field);

const ensureBoolean = (
	file: JsonRecord,
	key: string,
	field: string
): boolean | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "boolean") {
		throw new ConfigError(`Expected a boolean for ${field}`, { value });
	}
	return value;
};

const ensureRecord = (
	file: JsonRecord,
	key: string,
	field: string
): JsonRecord | null | undefined => {
	const value = file[key];
	if (value === undefined || value === null) {
		return value;
	}
	if (!isRecord(value)) {
		throw new ConfigError(`Expected an object for ${field}`, { value });
	}
	return value;
};

const assignDefined = <T, K extends keyof T>(
	target: Partial<T>,
	key: K,
	value: T[K] | undefined
): void => {
	if (value !== undefined) {
		target[key] = value;
	}
};

const parseStrategyFile = (file: JsonRecord): BacktestConfigOverrides => {
	const indicators = ensureRecord(file, "indicators", "strategy.indicators");
	const signals = ensureRecord(file, "signals", "strategy.signals");
	const regime = ensureRecord(file, "regimeFilter", "strategy.regimeFilter");
	const overrides: BacktestConfigOverrides = {};
	if (indicators) {
		const parsed: Partial<IndicatorConfig> = {};
		for (const key of INDICATOR_KEYS) {
			assignDefined(
				parsed,
				key,
				ensureNumber(indicators, key, `indicators.${key}`)
			);
		}
		overrides.indicators = parsed;
	}
	if (signals) {
		const parsed: Partial<SignalConfig> = {};
		for (const key of SIGNAL_NUMBER_KEYS) {
			assignDefined(parsed, key, ensureNumber(signals, key, `signals.${key}`));
		}
		for (const key of SIGNAL_FLAG_KEYS) {
			assignDefined(parsed, key, ensureBoolean(signals, key, `signals.${key}`));
		}
		overrides.signals = parsed;
	}
	if (regime === null) {
		overrides.regimeFilter = null;
	} else if (regime) {
		const benchmark = regime.benchmark;
		if (typeof benchmark !== "string" || !benchmark.length) {
			throw new ConfigError("regimeFilter.benchmark must be a symbol");
		}
		overrides.regimeFilter = { benchmark };
	}
	return overrides;
};

const INDICATOR_KEYS = [
	"lookback",
	"atrPeriod",
	"slopeLookback",
	"volumeLookback",
] as const;
const SIGNAL_NUMBER_KEYS = [
	"crossThreshold",
	"retestMinDistance",
	"retestMaxDistance",
] as const;
const SIGNAL_FLAG_KEYS = ["requirePositiveSlope", "shortingEnabled"] as const;

const parseStopAnchor = (value: unknown): StopAnchor | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (value === "sma" || value === "entry") {
		return value;
	}
	throw new ConfigError(`risk.stopLoss.anchor must be "sma" or "entry"`, {
		value,
	});
};

const parseRiskFile = (file: JsonRecord): Partial<RiskConfig> => {
	const risk: Partial<RiskConfig> = {};
	assignDefined(
		risk,
		"riskPerTrade",
		ensureNumber(file, "riskPerTrade", "risk.riskPerTrade")
	);
	assignDefined(
		risk,
		"maxConcurrentPositions",
		ensureNumber(file, "maxConcurrentPositions", "risk.maxConcurrentPositions")
	);
	assignDefined(
		risk,
		"maxEntriesPerSymbol",
		ensureNumber(file, "maxEntriesPerSymbol", "risk.maxEntriesPerSymbol")
	);
	assignDefined(
		risk,
		"cashBufferPct",
		ensureNumber(file, "cashBufferPct", "risk.cashBufferPct")
	);
	assignDefined(
		risk,
		"maxAggregateExposure",
		ensureNumber(file, "maxAggregateExposure", "risk.maxAggregateExposure")
	);
	assignDefined(
		risk,
		"takeProfitPct",
		ensureNullableNumber(file, "takeProfitPct", "risk.takeProfitPct")
	);

	const stopLoss = ensureRecord(file, "stopLoss", "risk.stopLoss");
	if (stopLoss) {
		risk.stopLoss = {
			anchor:
				parseStopAnchor(stopLoss.anchor) ??
				DEFAULT_BACKTEST_CONFIG.risk.stopLoss.anchor,
			pct:
				ensureNumber(stopLoss, "pct", "risk.stopLoss.pct") ??
				DEFAULT_BACKTEST_CONFIG.risk.stopLoss.pct,
		};
	}

	const trailing = ensureRecord(file, "trailing", "risk.trailing");
	if (trailing === null) {
		risk.trailing = null;
	} else if (trailing) {
		const activationPct = ensureNumber(
			trailing,
			"activationPct",
			"risk.trailing.activationPct"
		);
		const atrMultiplier = ensureNumber(
			trailing,
			"atrMultiplier",
			"risk.trailing.atrMultiplier"
		);
		if (activationPct === undefined || atrMultiplier === undefined) {
			throw new ConfigError(
				"risk.trailing requires activationPct and atrMultiplier"
			);
		}
		risk.trailing = { activationPct, atrMultiplier };
	}
	return risk;
};

const parseUniverseFile = (file: JsonRecord): Partial<UniverseConfig> => {
	const universe: Partial<UniverseConfig> = {};
	assignDefined(
		universe,
		"minPrice",
		ensureNumber(file, "minPrice", "universe.minPrice")
	);
	assignDefined(
		universe,
		"minAverageVolume",
		ensureNumber(file, "minAverageVolume", "universe.minAverageVolume")
	);
	assignDefined(
		universe,
		"minWarmupBars",
		ensureNumber(file, "minWarmupBars", "universe.minWarmupBars")
	);
	assignDefined(
		universe,
		"maxSize",
		ensureNullableNumber(file, "maxSize", "universe.maxSize")
	);
	return universe;
};

const parseAccountFile = (file: JsonRecord): Partial<AccountConfig> => {
	const account: Partial<AccountConfig> = {};
	assignDefined(
		account,
		"initialCash",
		ensureNumber(file, "initialCash", "account.initialCash")
	);
	return account;
};

export interface ConfigLoadOptions {
	configDir?: string;
	profile?: string;
	envPath?: string;
	initialCash?: number;
}

const SECTIONS = ["strategy", "risk", "universe", "account"] as const;
type ConfigSection = (typeof SECTIONS)[number];

export const resolveProfilePath = (
	configDir: string,
	section: ConfigSection,
	profile: string
): string | null => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidate = path.join(configDir, section, fileName);
	return fs.existsSync(candidate) ? candidate : null;
};

/**
 * Reads `<configDir>/{strategy,risk,universe,account}/<profile>.json`. Missing
 * section files fall back to the defaults; at least one must exist.
 */
export const loadBacktestConfig = (
	options: ConfigLoadOptions = {}
): ResolvedBacktestConfig => {
	const env = loadEnvConfig(options.envPath);
	const configDir = path.resolve(
		options.configDir ??
			env.configDir ??
			path.join(findWorkspaceRoot(), "config")
	);
	const profile = options.profile ?? env.profile;

	const paths: string[] = [];
	const overrides: BacktestConfigOverrides = {};
	for (const section of SECTIONS) {
		const filePath = resolveProfilePath(configDir, section, profile);
		if (!filePath) {
			continue;
		}
		paths.push(filePath);
		const file = readJsonRecord(filePath);
		switch (section) {
			case "strategy":
				Object.assign(overrides, parseStrategyFile(file));
				break;
			case "risk":
				overrides.risk = parseRiskFile(file);
				break;
			case "universe":
				overrides.universe = parseUniverseFile(file);
				break;
			case "account":
				overrides.account = parseAccountFile(file);
				break;
		}
	}
	if (!paths.length) {
		throw new ConfigError(
			`No config files found for profile "${profile}" in ${configDir}`
		);
	}

	const initialCash = options.initialCash ?? env.initialCash;
	if (initialCash !== undefined) {
		overrides.account = { ...overrides.account, initialCash };
	}

	return withConfigMetadata(createBacktestConfig(overrides), {
		source: "file",
		paths,
		profile,
	});
};
