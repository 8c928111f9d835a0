export interface Bar {
	readonly symbol: string;
	/** UTC epoch milliseconds */
	readonly timestamp: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

export type ActivePositionSide = "LONG" | "SHORT";
export type PositionSide = ActivePositionSide | "FLAT";

export type TradeAction = "OPEN" | "CLOSE";
export type TradeOrderSide = "buy" | "sell";

export type IndicatorName =
	| "sma"
	| "previousSma"
	| "smaSlope"
	| "atr"
	| "averageVolume";

export type IndicatorReading =
	| { readonly status: "warming_up"; readonly barsRemaining: number }
	| { readonly status: "ready"; readonly value: number };

export interface IndicatorState {
	readonly symbol: string;
	readonly timestamp: number;
	readonly barsSeen: number;
	readonly close: number;
	readonly previousClose: number | null;
	/** True until the lookback window is full; no entry may fire while set. */
	readonly warmingUp: boolean;
	readonly values: Readonly<Record<IndicatorName, IndicatorReading>>;
}

export type SignalKind =
	| "ENTRY_LONG"
	| "EXIT_LONG"
	| "ENTRY_SHORT"
	| "EXIT_SHORT";

export type EntryReason = "cross" | "retest";
export type ExitReason = "sma_cross_below" | "sma_cross_above" | "trailing_stop";
export type SignalReason = EntryReason | ExitReason;

export interface Signal {
	symbol: string;
	kind: SignalKind;
	timestamp: number;
	price: number;
	reason: SignalReason;
	strength?: number;
	sma: number;
	atr: number | null;
}

export type OrderRationale = "forced_exit" | "stop" | "target" | SignalReason;

export interface OrderIntent {
	symbol: string;
	action: TradeAction;
	direction: ActivePositionSide;
	side: TradeOrderSide;
	quantity: number;
	referencePrice: number;
	rationale: OrderRationale;
	timestamp: number;
	stopPrice?: number;
	targetPrice?: number;
}

export interface Position {
	symbol: string;
	/** Positive for longs, negative for shorts. */
	quantity: number;
	averageEntryPrice: number;
	openedAt: number;
	lastPrice: number;
	unrealizedPnl: number;
	stopPrice?: number;
	targetPrice?: number;
	trailingStopPrice?: number;
	peakPrice: number;
	troughPrice: number;
	/** Fills that built the position; add-ons raise it. */
	entries: number;
}

export interface PortfolioSnapshot {
	readonly timestamp: number;
	readonly cash: number;
	readonly positions: Readonly<Record<string, Readonly<Position>>>;
	/** cash + sum(quantity * lastPrice) */
	readonly equity: number;
	/** sum(|quantity| * lastPrice) */
	readonly exposure: number;
	readonly realizedPnl: number;
}

export interface RejectedOrder {
	symbol: string;
	timestamp: number;
	reason: string;
	rationale?: OrderRationale;
	signal?: SignalKind;
}

export const REJECT_INSUFFICIENT_BUYING_POWER =
	"rejected: insufficient buying power";
export const REJECT_MAX_POSITIONS = "rejected: max concurrent positions";
export const REJECT_MAX_EXPOSURE = "rejected: max aggregate exposure";
export const REJECT_ZERO_QUANTITY = "rejected: quantity rounds to zero";

export interface UniverseFlags {
	readonly forcedExits: ReadonlySet<string>;
}

export const positionSideOf = (
	position: Pick<Position, "quantity"> | undefined
): PositionSide => {
	if (!position || position.quantity === 0) {
		return "FLAT";
	}
	return position.quantity > 0 ? "LONG" : "SHORT";
};

/** Multiple of each open short's marked notional held back from new orders. */
export const SHORT_COLLATERAL_MULTIPLE = 2;

/**
 * Cash available for new orders: short-sale proceeds and an equal collateral
 * amount stay reserved so every open short can be covered.
 */
export const buyingPower = (
	snapshot: Pick<PortfolioSnapshot, "cash" | "positions">
): number => {
	let reserved = 0;
	for (const position of Object.values(snapshot.positions)) {
		if (position.quantity < 0) {
			reserved +=
				-position.quantity * position.lastPrice * SHORT_COLLATERAL_MULTIPLE;
		}
	}
	return snapshot.cash - reserved;
};

export const readingValue = (reading: IndicatorReading): number | null =>
	reading.status === "ready" ? reading.value : null;
