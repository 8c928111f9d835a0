import { describe, expect, it } from "vitest";
import {
	IndicatorReading,
	IndicatorState,
	UniverseConfig,
} from "@trendline/core";
import { IndicatorView, UniverseSelector, toUniverseFlags } from "./index";

const ready = (value: number): IndicatorReading => ({ status: "ready", value });

const buildState = (
	symbol: string,
	overrides: { close?: number; barsSeen?: number; averageVolume?: number | null } = {}
): IndicatorState => {
	const averageVolume = overrides.averageVolume === undefined ? 1_000 : overrides.averageVolume;
	return {
		symbol,
		timestamp: 1_000,
		barsSeen: overrides.barsSeen ?? 200,
		close: overrides.close ?? 50,
		previousClose: null,
		warmingUp: false,
		values: {
			sma: ready(48),
			previousSma: ready(47.9),
			smaSlope: ready(0.5),
			atr: ready(1.2),
			averageVolume:
				averageVolume === null
					? { status: "warming_up", barsRemaining: 3 }
					: ready(averageVolume),
		},
	};
};

const viewOf = (states: IndicatorState[]): IndicatorView => {
	const bySymbol = new Map(states.map((state) => [state.symbol, state]));
	return { state: (symbol) => bySymbol.get(symbol) ?? null };
};

const baseConfig: UniverseConfig = {
	minPrice: 5,
	minAverageVolume: 500,
	minWarmupBars: 150,
	maxSize: null,
};

describe("UniverseSelector.eligible", () => {
	it("applies warm-up, price and volume rules in order", () => {
		const selector = new UniverseSelector(
			baseConfig,
			viewOf([
				buildState("AAA"),
				buildState("BBB", { barsSeen: 149, close: 1 }),
				buildState("CCC", { close: 4.99 }),
				buildState("DDD", { averageVolume: 499 }),
				buildState("EEE", { averageVolume: null }),
			])
		);

		const selection = selector.eligible(1_000, ["EEE", "DDD", "CCC", "BBB", "AAA", "ZZZ"]);

		expect(selection.eligible).toEqual(["AAA"]);
		expect(selection.excluded).toEqual({
			BBB: "warming_up",
			CCC: "min_price",
			DDD: "min_average_volume",
			EEE: "min_average_volume",
			ZZZ: "no_history",
		});
		expect(selection.forcedExits).toEqual([]);
	});

	it("never makes the benchmark eligible", () => {
		const selector = new UniverseSelector(
			baseConfig,
			viewOf([buildState("SPY"), buildState("AAA")]),
			{ benchmarks: ["SPY"] }
		);

		const selection = selector.eligible(1_000, ["SPY", "AAA"]);

		expect(selection.eligible).toEqual(["AAA"]);
		expect(selection.excluded.SPY).toBe("benchmark");
	});

	it("keeps the top symbols by dollar volume with ties broken by symbol", () => {
		const selector = new UniverseSelector(
			{ ...baseConfig, maxSize: 2 },
			viewOf([
				buildState("AAA", { close: 10, averageVolume: 1_000 }),
				buildState("BBB", { close: 20, averageVolume: 1_000 }),
				buildState("CCC", { close: 10, averageVolume: 2_000 }),
				buildState("DDD", { close: 5, averageVolume: 1_000 }),
			])
		);

		const selection = selector.eligible(1_000, ["AAA", "BBB", "CCC", "DDD"]);

		expect(selection.eligible).toEqual(["BBB", "CCC"]);
		expect(selection.excluded).toEqual({
			AAA: "universe_size",
			DDD: "universe_size",
		});
	});

	it("flags held symbols that lose eligibility for forced exit", () => {
		const selector = new UniverseSelector(
			baseConfig,
			viewOf([
				buildState("AAA", { close: 3 }),
				buildState("BBB"),
				buildState("CCC", { close: 2 }),
			])
		);

		const selection = selector.eligible(
			1_000,
			["AAA", "BBB"],
			new Set(["AAA", "BBB", "CCC"])
		);

		expect(selection.eligible).toEqual(["BBB"]);
		// CCC had no bar this step, so it is not a candidate and is not flagged.
		expect(selection.forcedExits).toEqual(["AAA"]);
		expect(toUniverseFlags(selection).forcedExits.has("AAA")).toBe(true);
	});

	it("returns the same selection for the same inputs", () => {
		const selector = new UniverseSelector(
			{ ...baseConfig, maxSize: 1 },
			viewOf([buildState("AAA"), buildState("BBB")])
		);

		const first = selector.eligible(1_000, ["BBB", "AAA"]);
		const second = selector.eligible(1_000, new Set(["AAA", "BBB"]));

		expect(second).toEqual(first);
		expect(first.eligible).toEqual(["AAA"]);
	});
});
