import { describe, expect, it } from "vitest";
import { Bar, DataError } from "@trendline/core";
import { parseBar, parseTimestamp, validateBar } from "./index";

const goodBar: Bar = {
	symbol: "AAA",
	timestamp: 1_000,
	open: 10,
	high: 11,
	low: 9,
	close: 10.5,
	volume: 0,
};

describe("validateBar", () => {
	it("accepts a well-formed bar", () => {
		expect(validateBar(goodBar)).toBe(goodBar);
	});

	it.each<[string, Partial<Bar>]>([
		["empty symbol", { symbol: " " }],
		["non-finite timestamp", { timestamp: Number.NaN }],
		["zero close", { close: 0 }],
		["negative volume", { volume: -1 }],
		["high below close", { high: 10.4 }],
		["low above open", { low: 10.1 }],
	])("rejects %s", (_label, overrides) => {
		expect(() => validateBar({ ...goodBar, ...overrides })).toThrow(DataError);
	});
});

describe("parseBar", () => {
	it("coerces numeric strings", () => {
		expect(
			parseBar(
				{
					symbol: " AAA ",
					timestamp: "1000",
					open: "10",
					high: "11",
					low: "9",
					close: "10.5",
					volume: "0",
				},
				"row"
			)
		).toEqual(goodBar);
	});

	it("rejects non-objects and blank fields", () => {
		expect(() => parseBar(null, "row")).toThrow("Expected a bar object at row");
		expect(() => parseBar({ ...goodBar, volume: "" }, "row")).toThrow(
			"Bar AAA at row has invalid volume"
		);
	});
});

describe("parseTimestamp", () => {
	it("reads epoch milliseconds and ISO dates", () => {
		expect(parseTimestamp(1_704_067_200_000)).toBe(Date.UTC(2024, 0, 1));
		expect(parseTimestamp("1704067200000")).toBe(Date.UTC(2024, 0, 1));
		expect(parseTimestamp("2024-01-01T00:00:00Z")).toBe(Date.UTC(2024, 0, 1));
		expect(Number.isNaN(parseTimestamp("not a date"))).toBe(true);
		expect(Number.isNaN(parseTimestamp(undefined))).toBe(true);
	});
});
