import { describe, expect, it } from "vitest";
import { WilderAtr, calculateATRSeries, trueRange } from "./atr";

const candles = [
	{ high: 11, low: 9, close: 10 },
	{ high: 12, low: 10, close: 11 },
	{ high: 13, low: 10, close: 12 },
	{ high: 12, low: 8, close: 9 },
	{ high: 10, low: 8.5, close: 10 },
	{ high: 14, low: 10, close: 13 },
];

describe("trueRange", () => {
	it("takes the widest of the three ranges", () => {
		expect(trueRange({ high: 12, low: 8, close: 9 }, 12)).toBe(4);
		expect(trueRange({ high: 14, low: 10, close: 13 }, 8)).toBe(6);
	});
});

describe("WilderAtr", () => {
	it("seeds with the mean of the first period true ranges", () => {
		const atr = new WilderAtr(3);
		expect(atr.update(candles[0])).toBeNull();
		expect(atr.barsRemaining).toBe(3);
		expect(atr.update(candles[1])).toBeNull();
		expect(atr.update(candles[2])).toBeNull();
		// true ranges 2, 3, 4
		expect(atr.update(candles[3])).toBe(3);
		expect(atr.barsRemaining).toBe(0);
		// (3 * 2 + 1.5) / 3
		expect(atr.update(candles[4])).toBeCloseTo(2.5, 12);
	});

	it("agrees with the batch series", () => {
		const atr = new WilderAtr(3);
		const streamed = candles
			.map((candle) => atr.update(candle))
			.filter((value): value is number => value !== null);
		const batch = calculateATRSeries(candles, 3);
		expect(streamed).toHaveLength(batch.length);
		streamed.forEach((value, idx) => expect(value).toBeCloseTo(batch[idx], 12));
	});
});
