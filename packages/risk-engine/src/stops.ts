import {
	IndicatorState,
	Position,
	RiskConfig,
	readingValue,
} from "@trendline/core";

export interface StopUpdate {
	stopPrice?: number;
	trailingStopPrice?: number;
	peakPrice?: number;
	troughPrice?: number;
}

/**
 * Moves protective levels for an open position after a new bar. Stops only
 * ever tighten: the SMA-anchored stop follows a rising (or, for shorts,
 * falling) trend line, and the ATR trailing stop arms once the best price
 * since entry clears `trailing.activationPct`. Returns null when nothing moved.
 */
export const refreshStops = (
	position: Readonly<Position>,
	indicators: IndicatorState,
	config: Readonly<RiskConfig>
): StopUpdate | null => {
	if (position.quantity === 0) {
		return null;
	}
	const isLong = position.quantity > 0;
	const close = indicators.close;
	const updates: StopUpdate = {};

	const peakPrice = Math.max(position.peakPrice, close);
	const troughPrice = Math.min(position.troughPrice, close);
	if (isLong && peakPrice !== position.peakPrice) {
		updates.peakPrice = peakPrice;
	}
	if (!isLong && troughPrice !== position.troughPrice) {
		updates.troughPrice = troughPrice;
	}

	const sma = readingValue(indicators.values.sma);
	if (config.stopLoss.anchor === "sma" && sma !== null) {
		const { pct } = config.stopLoss;
		const proposed = isLong ? sma * (1 - pct) : sma * (1 + pct);
		const current = position.stopPrice;
		if (
			current === undefined ||
			(isLong ? proposed > current : proposed < current)
		) {
			updates.stopPrice = proposed;
		}
	}

	const atr = readingValue(indicators.values.atr);
	const entry = position.averageEntryPrice;
	if (config.trailing && atr !== null && entry > 0) {
		const { activationPct, atrMultiplier } = config.trailing;
		const bestMove = isLong
			? (peakPrice - entry) / entry
			: (entry - troughPrice) / entry;
		const armed = position.trailingStopPrice !== undefined;
		if (armed || bestMove >= activationPct) {
			const proposed = isLong
				? peakPrice - atrMultiplier * atr
				: troughPrice + atrMultiplier * atr;
			const current = position.trailingStopPrice;
			if (
				current === undefined ||
				(isLong ? proposed > current : proposed < current)
			) {
				updates.trailingStopPrice = proposed;
			}
		}
	}

	return Object.keys(updates).length ? updates : null;
};
