import { IndicatorState, readingValue } from "@trendline/core";

export type Regime = "bullish" | "bearish" | "unknown";

/**
 * Classifies the benchmark trend. An unknown regime (benchmark still warming
 * up, or no bar yet) blocks entries the same way a bearish one does.
 */
export const classifyRegime = (benchmark: IndicatorState | null): Regime => {
	if (!benchmark) {
		return "unknown";
	}
	const sma = readingValue(benchmark.values.sma);
	if (sma === null) {
		return "unknown";
	}
	return benchmark.close > sma ? "bullish" : "bearish";
};

export const entriesAllowed = (regime: Regime | null): boolean =>
	regime === null || regime === "bullish";
