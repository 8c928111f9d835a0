import path from "node:path";
import { describe, expect, it } from "vitest";
import { Bar, DataError } from "@trendline/core";
import {
	batchByTimestamp,
	loadBarsFromFile,
	parseBarsCsv,
	parseBarsJson,
} from "./index";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const DAY_ONE = Date.UTC(2024, 0, 1);
const DAY_TWO = Date.UTC(2024, 0, 2);

const bar = (symbol: string, timestamp: number): Bar => ({
	symbol,
	timestamp,
	open: 10,
	high: 11,
	low: 9,
	close: 10,
	volume: 100,
});

describe("loadBarsFromFile", () => {
	it("reads CSV bars and orders them by timestamp then symbol", () => {
		const bars = loadBarsFromFile(path.join(FIXTURE_DIR, "bars.csv"));
		expect(bars.map((entry) => [entry.symbol, entry.timestamp])).toEqual([
			["AAA", DAY_ONE],
			["AAA", DAY_TWO],
			["BBB", DAY_TWO],
		]);
		expect(bars[2]).toEqual({
			symbol: "BBB",
			timestamp: DAY_TWO,
			open: 20,
			high: 21,
			low: 19.5,
			close: 20.5,
			volume: 3000,
		});
	});

	it("reads JSON bars with epoch or ISO timestamps", () => {
		const bars = loadBarsFromFile(path.join(FIXTURE_DIR, "bars.json"));
		expect(bars.map((entry) => entry.timestamp)).toEqual([DAY_ONE, DAY_TWO]);
		expect(bars[1].close).toBe(10.2);
	});

	it("fails on a malformed row with its location", () => {
		const file = path.join(FIXTURE_DIR, "broken.csv");
		expect(() => loadBarsFromFile(file)).toThrow(DataError);
		expect(() => loadBarsFromFile(file)).toThrow(
			`Bar AAA at ${file}:3 has invalid close`
		);
	});

	it("fails on missing files and unknown extensions", () => {
		expect(() => loadBarsFromFile(path.join(FIXTURE_DIR, "absent.csv"))).toThrow(
			DataError
		);
		expect(() => loadBarsFromFile(path.join(FIXTURE_DIR, "bars.txt"))).toThrow(
			'Unsupported bar file extension ".txt"'
		);
	});
});

describe("parsers", () => {
	it("requires every CSV column", () => {
		expect(() => parseBarsCsv("symbol,timestamp,close\nAAA,1,2", "inline")).toThrow(
			"CSV header in inline is missing: open, high, low, volume"
		);
	});

	it("rejects rows with the wrong number of fields", () => {
		const text = "symbol,timestamp,open,high,low,close,volume\nAAA,1,2,3";
		expect(() => parseBarsCsv(text, "inline")).toThrow(
			"Expected 7 fields at inline:2, got 4"
		);
	});

	it("rejects JSON that is not an array", () => {
		expect(() => parseBarsJson('{"symbol":"AAA"}', "inline")).toThrow(
			"Expected an array of bars in inline"
		);
		expect(() => parseBarsJson("[", "inline")).toThrow(DataError);
	});
});

describe("batchByTimestamp", () => {
	it("groups adjacent bars sharing a timestamp", () => {
		const batches = Array.from(
			batchByTimestamp([bar("AAA", 1), bar("BBB", 1), bar("AAA", 2)])
		);
		expect(batches).toEqual([
			{ timestamp: 1, bars: [bar("AAA", 1), bar("BBB", 1)] },
			{ timestamp: 2, bars: [bar("AAA", 2)] },
		]);
	});

	it("yields nothing for an empty stream", () => {
		expect(Array.from(batchByTimestamp([]))).toEqual([]);
	});
});
