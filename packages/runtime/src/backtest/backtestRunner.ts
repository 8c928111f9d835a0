import {
	Bar,
	ConfigLoadOptions,
	ResolvedBacktestConfig,
	loadBacktestConfig,
} from "@trendline/core";
import { PortfolioTracker } from "@trendline/execution-engine";
import { buildRunFingerprints } from "../fingerprints";
import { StrategyOrchestrator } from "../loop/strategyOrchestrator";
import { logBacktestConfig, runtimeLogger } from "../runtimeShared";
import { BacktestResult } from "./backtestTypes";

export interface RunBacktestOptions extends ConfigLoadOptions {
	/** Skips config loading entirely when supplied. */
	config?: ResolvedBacktestConfig;
	tracker?: PortfolioTracker;
}

/**
 * Replays `bars` (ordered by timestamp) through a fresh orchestrator. Data
 * and sequence errors propagate; there is no partial result.
 */
export const runBacktest = (
	bars: readonly Bar[],
	options: RunBacktestOptions = {}
): BacktestResult => {
	const config =
		options.config ??
		loadBacktestConfig({
			configDir: options.configDir,
			profile: options.profile,
			envPath: options.envPath,
			initialCash: options.initialCash,
		});
	const fingerprints = buildRunFingerprints(config, bars);
	logBacktestConfig(config, fingerprints.config, {
		sections: fingerprints.sections,
		bars: fingerprints.bars,
		sources: fingerprints.sources,
	});

	const orchestrator = new StrategyOrchestrator(config, {
		tracker: options.tracker,
	});
	const result = orchestrator.run(bars);

	runtimeLogger.info("backtest_complete", {
		configFingerprint: result.configFingerprint,
		summary: result.summary,
	});
	return result;
};
