import {
	IndicatorState,
	UniverseConfig,
	UniverseFlags,
	createLogger,
	readingValue,
} from "@trendline/core";

const universeLogger = createLogger("universe");

export type ExclusionReason =
	| "benchmark"
	| "no_history"
	| "warming_up"
	| "min_price"
	| "min_average_volume"
	| "universe_size";

/** Read-only access to indicator state; the selector never mutates it. */
export interface IndicatorView {
	state(symbol: string): IndicatorState | null;
}

export interface UniverseSelection {
	asOf: number;
	/** Ascending by symbol. */
	eligible: string[];
	/** Held symbols that were candidates this step but failed eligibility. */
	forcedExits: string[];
	excluded: Record<string, ExclusionReason>;
}

export interface UniverseSelectorOptions {
	/** Reference symbols (regime benchmark) that are tracked but never traded. */
	benchmarks?: readonly string[];
}

type EligibilityRule = (
	state: IndicatorState,
	config: Readonly<UniverseConfig>
) => ExclusionReason | null;

const warmupRule: EligibilityRule = (state, config) =>
	state.barsSeen < config.minWarmupBars ? "warming_up" : null;

const minPriceRule: EligibilityRule = (state, config) =>
	state.close < config.minPrice ? "min_price" : null;

const minAverageVolumeRule: EligibilityRule = (state, config) => {
	if (config.minAverageVolume <= 0) {
		return null;
	}
	const average = readingValue(state.values.averageVolume);
	return average === null || average < config.minAverageVolume
		? "min_average_volume"
		: null;
};

export const ELIGIBILITY_RULES: readonly EligibilityRule[] = [
	warmupRule,
	minPriceRule,
	minAverageVolumeRule,
];

const dollarVolume = (state: IndicatorState): number =>
	state.close * (readingValue(state.values.averageVolume) ?? 0);

export class UniverseSelector {
	private readonly benchmarks: ReadonlySet<string>;

	constructor(
		private readonly config: Readonly<UniverseConfig>,
		private readonly indicators: IndicatorView,
		options: UniverseSelectorOptions = {}
	) {
		this.benchmarks = new Set(options.benchmarks ?? []);
	}

	/**
	 * Deterministic for a given `asOf`, candidate set and indicator history.
	 */
	eligible(
		asOf: number,
		candidates: Iterable<string>,
		held: ReadonlySet<string> = new Set()
	): UniverseSelection {
		const excluded: Record<string, ExclusionReason> = {};
		const passing: IndicatorState[] = [];
		const ordered = Array.from(new Set(candidates)).sort();

		for (const symbol of ordered) {
			if (this.benchmarks.has(symbol)) {
				excluded[symbol] = "benchmark";
				continue;
			}
			const state = this.indicators.state(symbol);
			if (!state) {
				excluded[symbol] = "no_history";
				continue;
			}
			const reason = this.firstFailure(state);
			if (reason) {
				excluded[symbol] = reason;
				continue;
			}
			passing.push(state);
		}

		let eligible = passing.map((state) => state.symbol);
		const { maxSize } = this.config;
		if (maxSize !== null && passing.length > maxSize) {
			const ranked = [...passing].sort(
				(a, b) =>
					dollarVolume(b) - dollarVolume(a) || a.symbol.localeCompare(b.symbol)
			);
			const kept = new Set(ranked.slice(0, maxSize).map((state) => state.symbol));
			for (const state of ranked.slice(maxSize)) {
				excluded[state.symbol] = "universe_size";
			}
			eligible = eligible.filter((symbol) => kept.has(symbol));
		}

		const eligibleSet = new Set(eligible);
		const forcedExits = ordered.filter(
			(symbol) => held.has(symbol) && !eligibleSet.has(symbol)
		);
		if (forcedExits.length) {
			universeLogger.info("forced_exit_flagged", {
				asOf: new Date(asOf).toISOString(),
				symbols: forcedExits,
				reasons: forcedExits.map((symbol) => excluded[symbol]),
			});
		}

		return { asOf, eligible, forcedExits, excluded };
	}

	private firstFailure(state: IndicatorState): ExclusionReason | null {
		for (const rule of ELIGIBILITY_RULES) {
			const reason = rule(state, this.config);
			if (reason) {
				return reason;
			}
		}
		return null;
	}
}

export const toUniverseFlags = (selection: UniverseSelection): UniverseFlags => ({
	forcedExits: new Set(selection.forcedExits),
});
