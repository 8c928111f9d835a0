import fs from "node:fs";
import path from "node:path";
import { Bar, DataError, createLogger, describeError } from "@trendline/core";
import { parseBar } from "./validation";

const dataLogger = createLogger("data");

export const CSV_COLUMNS = [
	"symbol",
	"timestamp",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

export interface BarBatch {
	timestamp: number;
	bars: Bar[];
}

export const compareBars = (a: Bar, b: Bar): number =>
	a.timestamp - b.timestamp || (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0);

export const sortBars = (bars: readonly Bar[]): Bar[] => [...bars].sort(compareBars);

export const parseBarsJson = (text: string, source: string): Bar[] => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw new DataError(`Invalid JSON in ${source}: ${describeError(error)}`, {
			source,
		});
	}
	if (!Array.isArray(parsed)) {
		throw new DataError(`Expected an array of bars in ${source}`, { source });
	}
	return parsed.map((entry, index) => parseBar(entry, `${source}[${index}]`));
};

export const parseBarsCsv = (text: string, source: string): Bar[] => {
	const lines = text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
	const [header, ...rows] = lines;
	if (!header) {
		return [];
	}
	const columns = header.split(",").map((column) => column.trim().toLowerCase());
	const missing = CSV_COLUMNS.filter((column) => !columns.includes(column));
	if (missing.length) {
		throw new DataError(`CSV header in ${source} is missing: ${missing.join(", ")}`, {
			source,
			missing,
		});
	}
	return rows.map((line, index) => {
		const cells = line.split(",");
		const location = `${source}:${index + 2}`;
		if (cells.length !== columns.length) {
			throw new DataError(
				`Expected ${columns.length} fields at ${location}, got ${cells.length}`,
				{ location }
			);
		}
		const record: Record<string, string> = {};
		columns.forEach((column, position) => {
			record[column] = cells[position].trim();
		});
		return parseBar(record, location);
	});
};

/**
 * Reads a `.json` or `.csv` bar file and returns its bars ordered by
 * timestamp, then symbol.
 */
export const loadBarsFromFile = (filePath: string): Bar[] => {
	const resolved = path.resolve(filePath);
	if (!fs.existsSync(resolved)) {
		throw new DataError(`Bar file not found: ${resolved}`, { path: resolved });
	}
	const text = fs.readFileSync(resolved, "utf-8");
	const extension = path.extname(resolved).toLowerCase();
	let bars: Bar[];
	if (extension === ".json") {
		bars = parseBarsJson(text, resolved);
	} else if (extension === ".csv") {
		bars = parseBarsCsv(text, resolved);
	} else {
		throw new DataError(`Unsupported bar file extension "${extension}"`, {
			path: resolved,
		});
	}
	const sorted = sortBars(bars);
	dataLogger.info("bars_loaded", {
		path: resolved,
		bars: sorted.length,
		symbols: new Set(sorted.map((bar) => bar.symbol)).size,
		firstTimestamp: sorted[0]?.timestamp ?? null,
		lastTimestamp: sorted[sorted.length - 1]?.timestamp ?? null,
	});
	return sorted;
};

/**
 * Groups a timestamp-ordered stream into one batch per timestamp. Adjacent
 * bars with equal timestamps land in the same batch; ordering is not checked
 * here.
 */
export function* batchByTimestamp(bars: Iterable<Bar>): Generator<BarBatch> {
	let current: BarBatch | null = null;
	for (const bar of bars) {
		if (current && current.timestamp === bar.timestamp) {
			current.bars.push(bar);
			continue;
		}
		if (current) {
			yield current;
		}
		current = { timestamp: bar.timestamp, bars: [bar] };
	}
	if (current) {
		yield current;
	}
}
