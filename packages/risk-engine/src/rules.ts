import {
	ActivePositionSide,
	OrderIntent,
	OrderRationale,
	PortfolioSnapshot,
	Position,
	REJECT_INSUFFICIENT_BUYING_POWER,
	REJECT_MAX_EXPOSURE,
	REJECT_MAX_POSITIONS,
	REJECT_ZERO_QUANTITY,
	RejectedOrder,
	RiskConfig,
	Signal,
	UniverseFlags,
	buyingPower,
	positionSideOf,
} from "@trendline/core";
import {
	calculateStopPrice,
	calculateTargetPrice,
	orderSideFor,
	sizePosition,
} from "./sizing";

export interface RiskInput {
	symbol: string;
	signal: Signal | null;
	/** Reference price for the fill; the bar close. */
	price: number;
	timestamp: number;
	snapshot: PortfolioSnapshot;
	flags: UniverseFlags;
}

export type RiskDecision =
	| { type: "order"; intent: OrderIntent }
	| { type: "reject"; rejection: RejectedOrder }
	| { type: "hold" };

export type RuleOutcome = RiskDecision | { type: "defer" };

export type RiskRule = (
	input: RiskInput,
	config: Readonly<RiskConfig>
) => RuleOutcome;

const DEFER: RuleOutcome = { type: "defer" };
const HOLD: RiskDecision = { type: "hold" };

const openPosition = (input: RiskInput): Readonly<Position> | null => {
	const position = input.snapshot.positions[input.symbol];
	return position && position.quantity !== 0 ? position : null;
};

const closeOrder = (
	input: RiskInput,
	position: Readonly<Position>,
	rationale: OrderRationale
): RiskDecision => {
	const direction: ActivePositionSide = position.quantity > 0 ? "LONG" : "SHORT";
	return {
		type: "order",
		intent: {
			symbol: input.symbol,
			action: "CLOSE",
			direction,
			side: orderSideFor(direction, "CLOSE"),
			quantity: Math.abs(position.quantity),
			referencePrice: input.price,
			rationale,
			timestamp: input.timestamp,
		},
	};
};

const reject = (
	input: RiskInput,
	reason: string,
	signal: Signal
): RiskDecision => ({
	type: "reject",
	rejection: {
		symbol: input.symbol,
		timestamp: input.timestamp,
		reason,
		rationale: signal.reason,
		signal: signal.kind,
	},
});

/** Held symbols that dropped out of the universe are closed regardless of signal. */
export const forcedExitRule: RiskRule = (input) => {
	const position = openPosition(input);
	if (!position || !input.flags.forcedExits.has(input.symbol)) {
		return DEFER;
	}
	return closeOrder(input, position, "forced_exit");
};

export const stopTargetRule: RiskRule = (input) => {
	const position = openPosition(input);
	if (!position) {
		return DEFER;
	}
	const isLong = position.quantity > 0;
	const { stopPrice, targetPrice } = position;
	if (
		stopPrice !== undefined &&
		(isLong ? input.price < stopPrice : input.price > stopPrice)
	) {
		return closeOrder(input, position, "stop");
	}
	if (
		targetPrice !== undefined &&
		(isLong ? input.price >= targetPrice : input.price <= targetPrice)
	) {
		return closeOrder(input, position, "target");
	}
	return DEFER;
};

/**
 * Open positions leave through a matching exit signal. Entry signals fall
 * through to the add-on check; anything else holds.
 */
export const exitSignalRule: RiskRule = (input) => {
	const position = openPosition(input);
	if (!position) {
		return DEFER;
	}
	const { signal } = input;
	const side = positionSideOf(position);
	if (
		signal &&
		((signal.kind === "EXIT_LONG" && side === "LONG") ||
			(signal.kind === "EXIT_SHORT" && side === "SHORT"))
	) {
		return closeOrder(input, position, signal.reason);
	}
	if (signal && (signal.kind === "ENTRY_LONG" || signal.kind === "ENTRY_SHORT")) {
		return DEFER;
	}
	return HOLD;
};

/**
 * Opens a position, or adds to one in the same direction while it has fewer
 * than `maxEntriesPerSymbol` fills.
 */
export const entryRule: RiskRule = (input, config) => {
	const { signal, snapshot, price } = input;
	if (!signal || (signal.kind !== "ENTRY_LONG" && signal.kind !== "ENTRY_SHORT")) {
		return HOLD;
	}
	const direction: ActivePositionSide =
		signal.kind === "ENTRY_LONG" ? "LONG" : "SHORT";

	const existing = openPosition(input);
	if (existing) {
		if (
			positionSideOf(existing) !== direction ||
			existing.entries >= config.maxEntriesPerSymbol
		) {
			return HOLD;
		}
	} else {
		const openCount = Object.values(snapshot.positions).filter(
			(position) => position.quantity !== 0
		).length;
		if (openCount >= config.maxConcurrentPositions) {
			return reject(input, REJECT_MAX_POSITIONS, signal);
		}
	}

	const stopPrice = calculateStopPrice(direction, price, signal.sma, config.stopLoss);
	let quantity = sizePosition(
		direction,
		snapshot.equity,
		config.riskPerTrade,
		price,
		stopPrice
	);
	if (quantity < 1) {
		return reject(input, REJECT_ZERO_QUANTITY, signal);
	}

	const available = Math.max(0, buyingPower(snapshot));
	if (quantity * price > available) {
		quantity = Math.floor((available / price) * (1 - config.cashBufferPct));
	}
	if (quantity < 1) {
		return reject(input, REJECT_INSUFFICIENT_BUYING_POWER, signal);
	}

	const headroom = config.maxAggregateExposure * snapshot.equity - snapshot.exposure;
	const withinExposure = Math.floor(headroom / price);
	if (withinExposure < 1) {
		return reject(input, REJECT_MAX_EXPOSURE, signal);
	}
	quantity = Math.min(quantity, withinExposure);

	const targetPrice = calculateTargetPrice(direction, price, config.takeProfitPct);
	return {
		type: "order",
		intent: {
			symbol: input.symbol,
			action: "OPEN",
			direction,
			side: orderSideFor(direction, "OPEN"),
			quantity,
			referencePrice: price,
			rationale: signal.reason,
			timestamp: input.timestamp,
			stopPrice,
			...(targetPrice === undefined ? {} : { targetPrice }),
		},
	};
};

/** Evaluated top to bottom; the first rule that does not defer decides. */
export const DEFAULT_RISK_RULES: readonly RiskRule[] = [
	forcedExitRule,
	stopTargetRule,
	exitSignalRule,
	entryRule,
];
