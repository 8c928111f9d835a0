import {
	DataError,
	EntryReason,
	ExitReason,
	IndicatorState,
	Position,
	Signal,
	SignalConfig,
	SignalKind,
	readingValue,
} from "@trendline/core";

/**
 * Per-symbol detector state. It is rebuilt from the portfolio on every call,
 * so the detector itself never carries anything between bars.
 */
export type DetectorState =
	| { tag: "FLAT" }
	| { tag: "LONG"; trailingStopPrice: number | null }
	| { tag: "SHORT"; trailingStopPrice: number | null };

export interface Transition {
	next: DetectorState;
	signal: Signal | null;
}

export const FLAT: DetectorState = Object.freeze({ tag: "FLAT" });

export const stateFromPosition = (
	position: Readonly<Pick<Position, "quantity" | "trailingStopPrice">> | undefined
): DetectorState => {
	if (!position || position.quantity === 0) {
		return FLAT;
	}
	const trailingStopPrice = position.trailingStopPrice ?? null;
	return position.quantity > 0
		? { tag: "LONG", trailingStopPrice }
		: { tag: "SHORT", trailingStopPrice };
};

const buildSignal = (
	indicators: IndicatorState,
	kind: SignalKind,
	reason: EntryReason | ExitReason,
	sma: number,
	strength?: number
): Signal => ({
	symbol: indicators.symbol,
	kind,
	timestamp: indicators.timestamp,
	price: indicators.close,
	reason,
	...(strength === undefined ? {} : { strength }),
	sma,
	atr: readingValue(indicators.values.atr),
});

const classifyEntry = (
	distance: number,
	config: Readonly<SignalConfig>
): EntryReason | null => {
	if (distance > 0 && distance <= config.crossThreshold) {
		return "cross";
	}
	if (
		distance >= config.retestMinDistance &&
		distance <= config.retestMaxDistance
	) {
		return "retest";
	}
	return null;
};

const slopeAllows = (
	indicators: IndicatorState,
	config: Readonly<SignalConfig>,
	direction: 1 | -1
): boolean => {
	if (!config.requirePositiveSlope) {
		return true;
	}
	const slope = readingValue(indicators.values.smaSlope);
	return slope !== null && slope * direction > 0;
};

const hold = (state: DetectorState): Transition => ({
	next: state,
	signal: null,
});

const addOn = (
	state: DetectorState,
	indicators: IndicatorState,
	config: Readonly<SignalConfig>,
	sma: number
): Transition => {
	const direction = state.tag === "SHORT" ? -1 : 1;
	const distance = ((indicators.close - sma) / sma) * direction;
	const reason = slopeAllows(indicators, config, direction)
		? classifyEntry(distance, config)
		: null;
	if (!reason) {
		return hold(state);
	}
	const kind: SignalKind = direction === 1 ? "ENTRY_LONG" : "ENTRY_SHORT";
	return {
		next: state,
		signal: buildSignal(indicators, kind, reason, sma, distance),
	};
};

/**
 * Pure state transition for one bar. Exits are checked before entries, and
 * nothing fires while the SMA is still warming up. With `allowAddOn`, a held
 * position that does not exit may signal another entry in its own direction.
 */
export const transition = (
	state: DetectorState,
	indicators: IndicatorState,
	config: Readonly<SignalConfig>,
	allowAddOn = false
): Transition => {
	const sma = readingValue(indicators.values.sma);
	if (indicators.warmingUp || sma === null || sma <= 0) {
		return hold(state);
	}
	const close = indicators.close;

	switch (state.tag) {
		case "LONG": {
			if (close < sma) {
				return {
					next: FLAT,
					signal: buildSignal(indicators, "EXIT_LONG", "sma_cross_below", sma),
				};
			}
			if (state.trailingStopPrice !== null && close < state.trailingStopPrice) {
				return {
					next: FLAT,
					signal: buildSignal(indicators, "EXIT_LONG", "trailing_stop", sma),
				};
			}
			return allowAddOn ? addOn(state, indicators, config, sma) : hold(state);
		}
		case "SHORT": {
			if (close > sma) {
				return {
					next: FLAT,
					signal: buildSignal(indicators, "EXIT_SHORT", "sma_cross_above", sma),
				};
			}
			if (state.trailingStopPrice !== null && close > state.trailingStopPrice) {
				return {
					next: FLAT,
					signal: buildSignal(indicators, "EXIT_SHORT", "trailing_stop", sma),
				};
			}
			return allowAddOn ? addOn(state, indicators, config, sma) : hold(state);
		}
		case "FLAT": {
			const distance = (close - sma) / sma;
			const longEntry = slopeAllows(indicators, config, 1)
				? classifyEntry(distance, config)
				: null;
			if (longEntry) {
				return {
					next: { tag: "LONG", trailingStopPrice: null },
					signal: buildSignal(indicators, "ENTRY_LONG", longEntry, sma, distance),
				};
			}
			if (!config.shortingEnabled) {
				return hold(state);
			}
			const shortEntry = slopeAllows(indicators, config, -1)
				? classifyEntry(-distance, config)
				: null;
			if (shortEntry) {
				return {
					next: { tag: "SHORT", trailingStopPrice: null },
					signal: buildSignal(
						indicators,
						"ENTRY_SHORT",
						shortEntry,
						sma,
						-distance
					),
				};
			}
			return hold(state);
		}
		default:
			return hold(state);
	}
};

export interface SignalDetectorOptions {
	/** Held positions with fewer fills than this may signal add-on entries. */
	maxEntriesPerSymbol?: number;
}

export class SignalDetector {
	private readonly maxEntriesPerSymbol: number;

	constructor(
		private readonly config: Readonly<SignalConfig>,
		options: SignalDetectorOptions = {}
	) {
		this.maxEntriesPerSymbol = options.maxEntriesPerSymbol ?? 1;
	}

	detect(
		symbol: string,
		indicators: IndicatorState,
		currentPosition?: Readonly<Position>
	): Signal | null {
		if (indicators.symbol !== symbol) {
			throw new DataError(
				`Indicator state for ${indicators.symbol} passed to detector for ${symbol}`,
				{ symbol, stateSymbol: indicators.symbol }
			);
		}
		const allowAddOn =
			currentPosition !== undefined &&
			currentPosition.entries < this.maxEntriesPerSymbol;
		return transition(
			stateFromPosition(currentPosition),
			indicators,
			this.config,
			allowAddOn
		).signal;
	}
}
