import { ActivePositionSide, OrderRationale } from "@trendline/core";

export interface ClosedTrade {
	symbol: string;
	direction: ActivePositionSide;
	quantity: number;
	entryPrice: number;
	exitPrice: number;
	realizedPnl: number;
	openedAt: number;
	closedAt: number;
	rationale: OrderRationale;
}

export interface TradeCounters {
	total: number;
	wins: number;
	losses: number;
	breakeven: number;
}

export interface PaperAccountSnapshot {
	startingBalance: number;
	equity: number;
	totalRealizedPnl: number;
	maxEquity: number;
	/** Largest peak-to-trough equity decline seen so far, in currency. */
	maxDrawdown: number;
	/** Same decline as a fraction of the peak it fell from. */
	maxDrawdownPct: number;
	trades: TradeCounters;
	lastTrade?: ClosedTrade;
}

/**
 * Running performance ledger: closed-trade counters plus an equity
 * high-water mark for drawdown.
 */
export class PaperAccount {
	private readonly startingBalance: number;
	private equity: number;
	private maxEquity: number;
	private maxDrawdown = 0;
	private maxDrawdownPct = 0;
	private totalRealizedPnl = 0;
	private readonly closedTrades: ClosedTrade[] = [];
	private trades: TradeCounters = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};

	constructor(startingBalance: number) {
		this.startingBalance = startingBalance;
		this.equity = startingBalance;
		this.maxEquity = startingBalance;
	}

	registerClosedTrade(trade: ClosedTrade): void {
		this.totalRealizedPnl += trade.realizedPnl;
		this.trades.total += 1;

		if (trade.realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		this.closedTrades.push(trade);
	}

	recordEquity(equity: number): PaperAccountSnapshot {
		this.equity = equity;
		if (equity > this.maxEquity) {
			this.maxEquity = equity;
		}
		const drawdown = this.maxEquity - equity;
		if (drawdown > this.maxDrawdown) {
			this.maxDrawdown = drawdown;
		}
		const drawdownPct = this.maxEquity > 0 ? drawdown / this.maxEquity : 0;
		if (drawdownPct > this.maxDrawdownPct) {
			this.maxDrawdownPct = drawdownPct;
		}
		return this.snapshot();
	}

	realizedPnl(): number {
		return this.totalRealizedPnl;
	}

	history(): ClosedTrade[] {
		return this.closedTrades.map((trade) => ({ ...trade }));
	}

	snapshot(): PaperAccountSnapshot {
		const lastTrade = this.closedTrades[this.closedTrades.length - 1];
		return {
			startingBalance: this.startingBalance,
			equity: this.equity,
			totalRealizedPnl: this.totalRealizedPnl,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxDrawdown,
			maxDrawdownPct: this.maxDrawdownPct,
			trades: { ...this.trades },
			...(lastTrade ? { lastTrade: { ...lastTrade } } : {}),
		};
	}
}
