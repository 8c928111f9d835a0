import { describe, expect, it } from "vitest";
import { ClosedTrade, PaperAccount } from "./index";

const buildTrade = (realizedPnl: number): ClosedTrade => ({
	symbol: "AAA",
	direction: "LONG",
	quantity: 1,
	entryPrice: 100,
	exitPrice: 100 + realizedPnl,
	realizedPnl,
	openedAt: 0,
	closedAt: 1,
	rationale: "stop",
});

describe("PaperAccount", () => {
	it("counts wins, losses and breakeven trades", () => {
		const account = new PaperAccount(1_000);
		account.registerClosedTrade(buildTrade(5));
		account.registerClosedTrade(buildTrade(-3));
		account.registerClosedTrade(buildTrade(0));

		const snapshot = account.snapshot();
		expect(snapshot.trades).toEqual({ total: 3, wins: 1, losses: 1, breakeven: 1 });
		expect(snapshot.totalRealizedPnl).toBe(2);
		expect(snapshot.lastTrade?.realizedPnl).toBe(0);
	});

	it("tracks the deepest drawdown from the equity high-water mark", () => {
		const account = new PaperAccount(100);
		account.recordEquity(110);
		account.recordEquity(99);
		const snapshot = account.recordEquity(105);

		expect(snapshot.equity).toBe(105);
		expect(snapshot.maxEquity).toBe(110);
		expect(snapshot.maxDrawdown).toBe(11);
		expect(snapshot.maxDrawdownPct).toBeCloseTo(0.1, 10);
	});
});
