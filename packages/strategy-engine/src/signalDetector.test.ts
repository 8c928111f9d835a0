import { describe, expect, it } from "vitest";
import {
	DataError,
	IndicatorReading,
	IndicatorState,
	Position,
	SignalConfig,
} from "@trendline/core";
import {
	FLAT,
	SignalDetector,
	classifyRegime,
	entriesAllowed,
	stateFromPosition,
	transition,
} from "./index";

const signalConfig: SignalConfig = {
	crossThreshold: 0.01,
	retestMinDistance: 0.03,
	retestMaxDistance: 0.04,
	requirePositiveSlope: false,
	shortingEnabled: false,
};

const ready = (value: number): IndicatorReading => ({ status: "ready", value });

const buildState = (
	close: number,
	options: { sma?: number; slope?: number | null; warming?: boolean } = {}
): IndicatorState => {
	const warming = options.warming ?? false;
	const slope = options.slope === undefined ? 0.2 : options.slope;
	return {
		symbol: "AAA",
		timestamp: 5_000,
		barsSeen: warming ? 10 : 200,
		close,
		previousClose: null,
		warmingUp: warming,
		values: {
			sma: warming
				? { status: "warming_up", barsRemaining: 140 }
				: ready(options.sma ?? 100),
			previousSma: ready(99.9),
			smaSlope:
				slope === null ? { status: "warming_up", barsRemaining: 2 } : ready(slope),
			atr: ready(2),
			averageVolume: ready(1_000),
		},
	};
};

const buildPosition = (
	quantity: number,
	overrides: Partial<Position> = {}
): Position => ({
	symbol: "AAA",
	quantity,
	averageEntryPrice: 100,
	openedAt: 1_000,
	lastPrice: 100,
	unrealizedPnl: 0,
	peakPrice: 100,
	troughPrice: 100,
	entries: 1,
	...overrides,
});

describe("transition", () => {
	it("never fires while the SMA is warming up", () => {
		const result = transition(FLAT, buildState(100.5, { warming: true }), signalConfig);
		expect(result.signal).toBeNull();
		expect(result.next).toBe(FLAT);
	});

	it("enters long on a cross within the threshold", () => {
		const result = transition(FLAT, buildState(100.5), signalConfig);
		expect(result.next).toEqual({ tag: "LONG", trailingStopPrice: null });
		expect(result.signal).toMatchObject({
			symbol: "AAA",
			kind: "ENTRY_LONG",
			reason: "cross",
			price: 100.5,
			sma: 100,
			atr: 2,
			timestamp: 5_000,
		});
		expect(result.signal?.strength).toBeCloseTo(0.005, 10);
	});

	it("enters long on a retest inside the retest band", () => {
		const result = transition(FLAT, buildState(103.5), signalConfig);
		expect(result.signal?.kind).toBe("ENTRY_LONG");
		expect(result.signal?.reason).toBe("retest");
	});

	it("stays flat between the cross and retest bands or at the SMA", () => {
		expect(transition(FLAT, buildState(102), signalConfig).signal).toBeNull();
		expect(transition(FLAT, buildState(100), signalConfig).signal).toBeNull();
		expect(transition(FLAT, buildState(105), signalConfig).signal).toBeNull();
	});

	it("requires a rising SMA when configured", () => {
		const config = { ...signalConfig, requirePositiveSlope: true };
		expect(transition(FLAT, buildState(100.5, { slope: -0.1 }), config).signal).toBeNull();
		expect(transition(FLAT, buildState(100.5, { slope: null }), config).signal).toBeNull();
		expect(transition(FLAT, buildState(100.5, { slope: 0.1 }), config).signal?.kind).toBe(
			"ENTRY_LONG"
		);
	});

	it("exits a long when the close drops below the SMA", () => {
		const state = stateFromPosition(buildPosition(10));
		const result = transition(state, buildState(99), signalConfig);
		expect(result.next).toBe(FLAT);
		expect(result.signal?.kind).toBe("EXIT_LONG");
		expect(result.signal?.reason).toBe("sma_cross_below");
	});

	it("exits a long when the close breaks the trailing stop", () => {
		const state = stateFromPosition(buildPosition(10, { trailingStopPrice: 105 }));
		const result = transition(state, buildState(104), signalConfig);
		expect(result.signal?.kind).toBe("EXIT_LONG");
		expect(result.signal?.reason).toBe("trailing_stop");
	});

	it("holds a long above the SMA without re-entering", () => {
		const state = stateFromPosition(buildPosition(10));
		const result = transition(state, buildState(100.5), signalConfig);
		expect(result.signal).toBeNull();
		expect(result.next).toBe(state);
	});

	it("signals an add-on entry for a held position when allowed", () => {
		const long = stateFromPosition(buildPosition(10));
		const added = transition(long, buildState(100.5), signalConfig, true);
		expect(added.next).toBe(long);
		expect(added.signal?.kind).toBe("ENTRY_LONG");
		expect(added.signal?.reason).toBe("cross");
		expect(transition(long, buildState(102), signalConfig, true).signal).toBeNull();

		const short = stateFromPosition(buildPosition(-10));
		const shortAdd = transition(short, buildState(96.5), signalConfig, true);
		expect(shortAdd.signal?.kind).toBe("ENTRY_SHORT");
		expect(shortAdd.signal?.reason).toBe("retest");
	});

	it("ignores short setups unless shorting is enabled", () => {
		expect(transition(FLAT, buildState(99.5), signalConfig).signal).toBeNull();

		const result = transition(FLAT, buildState(99.5), {
			...signalConfig,
			shortingEnabled: true,
		});
		expect(result.next).toEqual({ tag: "SHORT", trailingStopPrice: null });
		expect(result.signal?.kind).toBe("ENTRY_SHORT");
		expect(result.signal?.reason).toBe("cross");
		expect(result.signal?.strength).toBeCloseTo(0.005, 10);
	});

	it("exits a short when the close rises above the SMA", () => {
		const state = stateFromPosition(buildPosition(-10));
		expect(state.tag).toBe("SHORT");
		const result = transition(state, buildState(101), {
			...signalConfig,
			shortingEnabled: true,
		});
		expect(result.signal?.kind).toBe("EXIT_SHORT");
		expect(result.signal?.reason).toBe("sma_cross_above");
	});
});

describe("SignalDetector.detect", () => {
	it("derives the state from the current position", () => {
		const detector = new SignalDetector(signalConfig);
		expect(detector.detect("AAA", buildState(100.5))?.kind).toBe("ENTRY_LONG");
		expect(detector.detect("AAA", buildState(100.5), buildPosition(5))).toBeNull();
		expect(detector.detect("AAA", buildState(98), buildPosition(5))?.kind).toBe(
			"EXIT_LONG"
		);
	});

	it("offers add-ons only below the entry cap", () => {
		const detector = new SignalDetector(signalConfig, { maxEntriesPerSymbol: 2 });
		expect(detector.detect("AAA", buildState(100.5), buildPosition(5))?.kind).toBe(
			"ENTRY_LONG"
		);
		expect(
			detector.detect("AAA", buildState(100.5), buildPosition(10, { entries: 2 }))
		).toBeNull();
	});

	it("rejects indicator state for another symbol", () => {
		const detector = new SignalDetector(signalConfig);
		expect(() => detector.detect("BBB", buildState(100.5))).toThrow(DataError);
	});
});

describe("regime filter", () => {
	it("classifies the benchmark against its SMA", () => {
		expect(classifyRegime(null)).toBe("unknown");
		expect(classifyRegime(buildState(100, { warming: true }))).toBe("unknown");
		expect(classifyRegime(buildState(99))).toBe("bearish");
		expect(classifyRegime(buildState(101))).toBe("bullish");
	});

	it("blocks entries unless the regime is bullish", () => {
		expect(entriesAllowed(null)).toBe(true);
		expect(entriesAllowed("bullish")).toBe(true);
		expect(entriesAllowed("bearish")).toBe(false);
		expect(entriesAllowed("unknown")).toBe(false);
	});
});
