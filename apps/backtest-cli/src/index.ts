#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { describeError } from "@trendline/core";
import { loadBarsFromFile } from "@trendline/data";
import { BacktestResult, runBacktest } from "@trendline/runtime";
import { parseCliArgs, readFlag, readNumberArg, readStringArg } from "./cliArgs";

const USAGE = `Usage:
  npm run backtest -- --bars <file> [options]

Options (all optional unless noted):
  --bars <file>            CSV or JSON bar file (required)
  --configDir <path>       Config directory (defaults to <workspace>/config)
  --profile <name>         Config profile name (defaults to "default")
  --envPath <path>         Custom .env path
  --initialCash <amount>   Override starting cash
  --out <dir>              Directory to save the full result JSON
  --json                   Print full JSON result payload
  --help                   Show this message
`;

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;

const formatPct = (value: number): string => `${(value * 100).toFixed(2)}%`;

const persistBacktestResult = (result: BacktestResult, outDir: string): string => {
	const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
	const fileName = `backtest-${result.configFingerprint}-${timestamp}.json`;
	const outputDir = path.resolve(process.cwd(), outDir);
	fs.mkdirSync(outputDir, { recursive: true });
	const outputPath = path.join(outputDir, fileName);
	fs.writeFileSync(outputPath, JSON.stringify(result, null, 2));
	const relative = path.relative(process.cwd(), outputPath) || outputPath;
	console.log(`Backtest saved to ${relative}`);
	return outputPath;
};

const main = (): void => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (readFlag(argMap, "help")) {
		console.log(USAGE);
		return;
	}

	const barsPath = readStringArg(argMap, "bars");
	if (!barsPath) {
		throw new Error("Missing required --bars <file>");
	}
	const bars = loadBarsFromFile(barsPath);

	console.log(`Running backtest over ${bars.length} bars from ${barsPath}...`);
	const result = runBacktest(bars, {
		configDir: readStringArg(argMap, "configDir"),
		profile: readStringArg(argMap, "profile"),
		envPath: readStringArg(argMap, "envPath"),
		initialCash: readNumberArg(argMap, "initialCash"),
	});

	if (readFlag(argMap, "json")) {
		console.log(JSON.stringify(result, null, 2));
	} else {
		const { summary } = result;
		console.log("---- Summary ----");
		console.log(`Config fingerprint: ${result.configFingerprint}`);
		console.log(`Steps: ${summary.steps}`);
		console.log(
			`Trades closed: ${summary.trades.total} (${summary.trades.wins} won, ${summary.trades.losses} lost)`
		);
		console.log(
			`Orders: ${summary.accepted} accepted, ${summary.rejected} rejected, ${summary.dropped} dropped`
		);
		console.log(`Starting equity: ${formatUsd(summary.startingEquity)}`);
		console.log(`Final equity: ${formatUsd(summary.finalEquity)}`);
		console.log(`Total return: ${formatPct(summary.totalReturn)}`);
		console.log(
			`Max drawdown: ${formatUsd(summary.maxDrawdown)} (${formatPct(summary.maxDrawdownPct)})`
		);
	}

	const outDir = readStringArg(argMap, "out");
	if (outDir) {
		persistBacktestResult(result, outDir);
	}
};

try {
	main();
} catch (error) {
	console.error("Backtest failed:", describeError(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
}
