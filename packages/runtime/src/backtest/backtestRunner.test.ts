import path from "node:path";
import { describe, expect, it } from "vitest";
import { Bar, createBacktestConfig } from "@trendline/core";
import { PortfolioTracker } from "@trendline/execution-engine";
import { computeConfigFingerprint } from "../fingerprints";
import { runBacktest } from "./backtestRunner";

const CONFIG_DIR = path.join(__dirname, "__tests__", "fixtures", "config");
const NO_ENV = path.join(CONFIG_DIR, "absent.env");
const DAY = 86_400_000;

const bars = (closes: number[]): Bar[] =>
	closes.map((close, index) => ({
		symbol: "AAA",
		timestamp: DAY * (index + 1),
		open: close,
		high: close + 0.1,
		low: close - 0.1,
		close,
		volume: 10_000,
	}));

const ROUND_TRIP = bars([100, 100, 100, 100, 100.5, 96]);

describe("runBacktest", () => {
	it("loads a config profile from disk and replays the bars", () => {
		const result = runBacktest(ROUND_TRIP, {
			configDir: CONFIG_DIR,
			profile: "small",
			envPath: NO_ENV,
		});

		expect(result.config.indicators.lookback).toBe(5);
		expect(result.config.account.initialCash).toBe(50_000);
		expect(result.configFingerprint).toBe(computeConfigFingerprint(result.config));
		expect(result.snapshots).toHaveLength(6);

		// 500 at risk over a 4.02 stop distance
		expect(result.trades).toHaveLength(1);
		expect(result.trades[0].quantity).toBe(124);
		expect(result.trades[0].rationale).toBe("stop");
		expect(result.trades[0].realizedPnl).toBe(-558);
		expect(result.summary).toMatchObject({
			startingEquity: 50_000,
			finalEquity: 49_442,
			steps: 6,
			accepted: 2,
			rejected: 0,
			dropped: 0,
		});
		expect(result.summary.trades.total).toBe(1);
		expect(result.summary.trades.losses).toBe(1);
	});

	it("uses a supplied config and tracker without touching disk", () => {
		const config = createBacktestConfig({
			indicators: { lookback: 5, atrPeriod: 3, slopeLookback: 2, volumeLookback: 3 },
			universe: { minWarmupBars: 5, maxSize: null },
			account: { initialCash: 10_000 },
		});
		const tracker = new PortfolioTracker(10_000);
		const result = runBacktest(bars([100, 100, 100, 100, 100.5]), {
			config,
			tracker,
			configDir: path.join(CONFIG_DIR, "missing"),
		});

		expect(result.config).toBe(config);
		expect(Object.keys(tracker.snapshot().positions)).toEqual(["AAA"]);
		expect(result.summary.accepted).toBe(1);
	});

	it("returns an empty run when there are no bars", () => {
		const result = runBacktest([], { config: createBacktestConfig() });
		expect(result.snapshots).toEqual([]);
		expect(result.summary.finalEquity).toBe(100_000);
		expect(result.summary.totalReturn).toBe(0);
	});
});
