import {
	Bar,
	BarFingerprintSummary,
	ResolvedBacktestConfig,
	getConfigMetadata,
	hashJson,
	summarizeBars,
} from "@trendline/core";

export type ConfigFingerprint = string;

const CONFIG_SECTIONS = [
	"indicators",
	"signals",
	"risk",
	"universe",
	"regimeFilter",
	"account",
] as const;

export type ConfigSection = (typeof CONFIG_SECTIONS)[number];

export interface RunFingerprints {
	config: ConfigFingerprint;
	sections: Record<ConfigSection, string>;
	bars: BarFingerprintSummary;
	/** Load paths recorded by the config loader, when the config came from disk. */
	sources: string[];
}

/** Identifies a run configuration; equal configs hash equally regardless of key order. */
export const computeConfigFingerprint = (
	config: ResolvedBacktestConfig
): ConfigFingerprint => hashJson(config);

export const buildRunFingerprints = (
	config: ResolvedBacktestConfig,
	bars: readonly Bar[]
): RunFingerprints => {
	const sections = {
		indicators: hashJson(config.indicators),
		signals: hashJson(config.signals),
		risk: hashJson(config.risk),
		universe: hashJson(config.universe),
		regimeFilter: hashJson(config.regimeFilter),
		account: hashJson(config.account),
	} satisfies Record<ConfigSection, string>;
	return {
		config: computeConfigFingerprint(config),
		sections,
		bars: summarizeBars(bars),
		sources: getConfigMetadata(config)?.paths ?? [],
	};
};
