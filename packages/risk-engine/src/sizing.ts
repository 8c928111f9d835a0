import {
	ActivePositionSide,
	SizingError,
	StopLossConfig,
	TradeAction,
	TradeOrderSide,
} from "@trendline/core";

/**
 * Initial protective stop. The `sma` anchor hangs the stop a fixed fraction
 * beyond the trend line; the `entry` anchor measures from the fill price.
 */
export const calculateStopPrice = (
	direction: ActivePositionSide,
	price: number,
	sma: number,
	stopLoss: Readonly<StopLossConfig>
): number => {
	const base = stopLoss.anchor === "sma" ? sma : price;
	return direction === "LONG"
		? base * (1 - stopLoss.pct)
		: base * (1 + stopLoss.pct);
};

export const calculateTargetPrice = (
	direction: ActivePositionSide,
	price: number,
	takeProfitPct: number | null
): number | undefined => {
	if (takeProfitPct === null) {
		return undefined;
	}
	return direction === "LONG"
		? price * (1 + takeProfitPct)
		: price * (1 - takeProfitPct);
};

/**
 * Whole-share quantity risking `riskPerTrade` of equity between entry and
 * stop. Throws SizingError when the stop sits at or beyond the entry.
 */
export const sizePosition = (
	direction: ActivePositionSide,
	equity: number,
	riskPerTrade: number,
	price: number,
	stopPrice: number
): number => {
	const stopDistance =
		direction === "LONG" ? price - stopPrice : stopPrice - price;
	if (!(stopDistance > 0)) {
		throw new SizingError(
			`Stop distance must be positive (price ${price}, stop ${stopPrice})`,
			{ direction, price, stopPrice, stopDistance }
		);
	}
	const quantity = Math.floor((equity * riskPerTrade) / stopDistance);
	if (!Number.isFinite(quantity)) {
		throw new SizingError(`Non-finite position size for price ${price}`, {
			equity,
			riskPerTrade,
			stopDistance,
		});
	}
	return Math.max(quantity, 0);
};

export const orderSideFor = (
	direction: ActivePositionSide,
	action: TradeAction
): TradeOrderSide => {
	if (action === "OPEN") {
		return direction === "LONG" ? "buy" : "sell";
	}
	return direction === "LONG" ? "sell" : "buy";
};
