export {
	CSV_COLUMNS,
	batchByTimestamp,
	compareBars,
	loadBarsFromFile,
	parseBarsCsv,
	parseBarsJson,
	sortBars,
} from "./barFile";
export type { BarBatch } from "./barFile";
export { parseBar, parseTimestamp, validateBar } from "./validation";
