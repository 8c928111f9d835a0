import {
	OrderIntent,
	PortfolioSnapshot,
	Position,
	REJECT_INSUFFICIENT_BUYING_POWER,
	RejectedOrder,
	buyingPower,
	createLogger,
	deepFreeze,
	positionSideOf,
} from "@trendline/core";
import { ClosedTrade, PaperAccount, PaperAccountSnapshot } from "./paperAccount";

const trackerLogger = createLogger("execution-engine:portfolio");

export const REJECT_INVALID_FILL = "rejected: invalid fill";
export const REJECT_POSITION_OPEN = "rejected: opposite position open";
export const REJECT_NO_POSITION = "rejected: no open position";
export const REJECT_CLOSE_MISMATCH = "rejected: close quantity mismatch";

export type PositionLevels = Partial<
	Pick<Position, "stopPrice" | "targetPrice" | "trailingStopPrice" | "peakPrice" | "troughPrice">
>;

export type FillOutcome =
	| {
			status: "filled";
			intent: OrderIntent;
			fillPrice: number;
			snapshot: PortfolioSnapshot;
			trade?: ClosedTrade;
	  }
	| {
			status: "rejected";
			intent: OrderIntent;
			rejection: RejectedOrder;
			snapshot: PortfolioSnapshot;
	  };

/**
 * Sole owner of cash and positions. Every fill is all-or-nothing at the
 * supplied price, and no fill may leave cash below zero. Snapshots are
 * rebuilt from positions on every call instead of being patched in place.
 */
export class PortfolioTracker {
	private cash: number;
	private timestamp = 0;
	private readonly positions = new Map<string, Position>();

	constructor(
		initialCash: number,
		private readonly account: PaperAccount = new PaperAccount(initialCash)
	) {
		this.cash = initialCash;
	}

	apply(intent: OrderIntent, fillPrice: number): FillOutcome {
		if (
			!Number.isFinite(fillPrice) ||
			fillPrice <= 0 ||
			!Number.isInteger(intent.quantity) ||
			intent.quantity <= 0
		) {
			return this.reject(intent, REJECT_INVALID_FILL);
		}
		this.advanceClock(intent.timestamp);
		return intent.action === "OPEN"
			? this.applyOpen(intent, fillPrice)
			: this.applyClose(intent, fillPrice);
	}

	/** Revalues held positions; symbols without a price keep their last mark. */
	markToMarket(prices: ReadonlyMap<string, number>, timestamp: number): PortfolioSnapshot {
		this.advanceClock(timestamp);
		for (const [symbol, position] of this.positions) {
			const price = prices.get(symbol);
			if (price === undefined) {
				continue;
			}
			position.lastPrice = price;
			position.unrealizedPnl = (price - position.averageEntryPrice) * position.quantity;
		}
		return this.snapshot();
	}

	updateStops(symbol: string, levels: PositionLevels): Readonly<Position> | null {
		const position = this.positions.get(symbol);
		if (!position) {
			return null;
		}
		Object.assign(position, levels);
		return { ...position };
	}

	position(symbol: string): Readonly<Position> | null {
		const position = this.positions.get(symbol);
		return position ? { ...position } : null;
	}

	heldSymbols(): Set<string> {
		return new Set(this.positions.keys());
	}

	snapshot(): PortfolioSnapshot {
		let marketValue = 0;
		let exposure = 0;
		const positions: Record<string, Position> = {};
		const symbols = Array.from(this.positions.keys()).sort();
		for (const symbol of symbols) {
			const position = this.positions.get(symbol);
			if (!position) {
				continue;
			}
			marketValue += position.quantity * position.lastPrice;
			exposure += Math.abs(position.quantity) * position.lastPrice;
			positions[symbol] = { ...position };
		}
		return deepFreeze({
			timestamp: this.timestamp,
			cash: this.cash,
			positions,
			equity: this.cash + marketValue,
			exposure,
			realizedPnl: this.account.realizedPnl(),
		});
	}

	/** Feeds the latest equity into the drawdown tracker. */
	recordEquity(): PaperAccountSnapshot {
		return this.account.recordEquity(this.snapshot().equity);
	}

	trades(): ClosedTrade[] {
		return this.account.history();
	}

	accountSummary(): PaperAccountSnapshot {
		return this.account.snapshot();
	}

	private applyOpen(intent: OrderIntent, fillPrice: number): FillOutcome {
		const existing = this.positions.get(intent.symbol);
		if (existing && positionSideOf(existing) !== intent.direction) {
			return this.reject(intent, REJECT_POSITION_OPEN);
		}
		const notional = intent.quantity * fillPrice;
		if (notional > buyingPower(this.snapshot())) {
			return this.reject(intent, REJECT_INSUFFICIENT_BUYING_POWER);
		}

		const isLong = intent.direction === "LONG";
		const signed = isLong ? intent.quantity : -intent.quantity;
		this.cash += isLong ? -notional : notional;

		if (existing) {
			this.addTo(existing, intent, fillPrice);
		} else {
			this.positions.set(intent.symbol, {
				symbol: intent.symbol,
				quantity: signed,
				averageEntryPrice: fillPrice,
				openedAt: intent.timestamp,
				lastPrice: fillPrice,
				unrealizedPnl: 0,
				peakPrice: fillPrice,
				troughPrice: fillPrice,
				entries: 1,
				...(intent.stopPrice === undefined ? {} : { stopPrice: intent.stopPrice }),
				...(intent.targetPrice === undefined ? {} : { targetPrice: intent.targetPrice }),
			});
		}

		trackerLogger.debug(existing ? "position_added" : "position_opened", {
			symbol: intent.symbol,
			direction: intent.direction,
			quantity: intent.quantity,
			price: fillPrice,
			cash: this.cash,
		});
		return { status: "filled", intent, fillPrice, snapshot: this.snapshot() };
	}

	/** Re-averages the entry price; the stop only moves if the add-on's is tighter. */
	private addTo(position: Position, intent: OrderIntent, fillPrice: number): void {
		const isLong = position.quantity > 0;
		const held = Math.abs(position.quantity);
		const total = held + intent.quantity;
		position.averageEntryPrice =
			(held * position.averageEntryPrice + intent.quantity * fillPrice) / total;
		position.quantity = isLong ? total : -total;
		position.lastPrice = fillPrice;
		position.unrealizedPnl =
			(fillPrice - position.averageEntryPrice) * position.quantity;
		position.entries += 1;
		const { stopPrice } = intent;
		if (
			stopPrice !== undefined &&
			(position.stopPrice === undefined ||
				(isLong ? stopPrice > position.stopPrice : stopPrice < position.stopPrice))
		) {
			position.stopPrice = stopPrice;
		}
		if (position.targetPrice === undefined && intent.targetPrice !== undefined) {
			position.targetPrice = intent.targetPrice;
		}
	}

	private applyClose(intent: OrderIntent, fillPrice: number): FillOutcome {
		const position = this.positions.get(intent.symbol);
		if (!position || positionSideOf(position) !== intent.direction) {
			return this.reject(intent, REJECT_NO_POSITION);
		}
		if (Math.abs(position.quantity) !== intent.quantity) {
			return this.reject(intent, REJECT_CLOSE_MISMATCH);
		}

		const proceeds = position.quantity * fillPrice;
		if (this.cash + proceeds < 0) {
			return this.reject(intent, REJECT_INSUFFICIENT_BUYING_POWER);
		}
		this.cash += proceeds;
		this.positions.delete(intent.symbol);

		const trade: ClosedTrade = {
			symbol: intent.symbol,
			direction: intent.direction,
			quantity: intent.quantity,
			entryPrice: position.averageEntryPrice,
			exitPrice: fillPrice,
			realizedPnl: (fillPrice - position.averageEntryPrice) * position.quantity,
			openedAt: position.openedAt,
			closedAt: intent.timestamp,
			rationale: intent.rationale,
		};
		this.account.registerClosedTrade(trade);

		trackerLogger.debug("position_closed", {
			symbol: trade.symbol,
			direction: trade.direction,
			quantity: trade.quantity,
			price: fillPrice,
			realizedPnl: trade.realizedPnl,
			rationale: trade.rationale,
		});
		return {
			status: "filled",
			intent,
			fillPrice,
			snapshot: this.snapshot(),
			trade,
		};
	}

	private reject(intent: OrderIntent, reason: string): FillOutcome {
		return {
			status: "rejected",
			intent,
			rejection: {
				symbol: intent.symbol,
				timestamp: intent.timestamp,
				reason,
				rationale: intent.rationale,
			},
			snapshot: this.snapshot(),
		};
	}

	private advanceClock(timestamp: number): void {
		if (timestamp > this.timestamp) {
			this.timestamp = timestamp;
		}
	}
}
