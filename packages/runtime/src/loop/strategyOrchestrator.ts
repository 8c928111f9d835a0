import {
	Bar,
	DataError,
	IndicatorState,
	PortfolioSnapshot,
	ResolvedBacktestConfig,
	SequenceError,
	Signal,
	SizingError,
	UniverseFlags,
} from "@trendline/core";
import { batchByTimestamp, validateBar } from "@trendline/data";
import { PortfolioTracker } from "@trendline/execution-engine";
import { IndicatorEngine } from "@trendline/indicators";
import { RiskDecision, RiskManager } from "@trendline/risk-engine";
import {
	Regime,
	SignalDetector,
	classifyRegime,
	entriesAllowed,
} from "@trendline/strategy-engine";
import { UniverseSelector, toUniverseFlags } from "@trendline/universe";
import type {
	BacktestResult,
	BacktestSummary,
	DecisionRecord,
	StepReport,
} from "../backtest/backtestTypes";
import { computeConfigFingerprint } from "../fingerprints";
import {
	logOrderAccepted,
	logOrderDropped,
	logOrderRejected,
	logStepSummary,
} from "../runtimeShared";

const isEntry = (signal: Signal): boolean =>
	signal.kind === "ENTRY_LONG" || signal.kind === "ENTRY_SHORT";

export interface StrategyOrchestratorOptions {
	tracker?: PortfolioTracker;
}

interface StepContext {
	timestamp: number;
	bars: ReadonlyMap<string, Bar>;
	flags: UniverseFlags;
	decisions: DecisionRecord[];
}

/**
 * Drives one backtest timeline. Each `step` completes indicators, universe,
 * signals, sizing and fills for one timestamp before the next may start.
 */
export class StrategyOrchestrator {
	private readonly indicators: IndicatorEngine;
	private readonly universe: UniverseSelector;
	private readonly detector: SignalDetector;
	private readonly risk: RiskManager;
	private readonly tracker: PortfolioTracker;
	private readonly benchmark: string | null;
	private readonly snapshots: PortfolioSnapshot[] = [];
	private readonly decisions: DecisionRecord[] = [];
	private lastTimestamp: number | null = null;

	constructor(
		private readonly config: ResolvedBacktestConfig,
		options: StrategyOrchestratorOptions = {}
	) {
		this.benchmark = config.regimeFilter?.benchmark ?? null;
		this.indicators = new IndicatorEngine(config.indicators);
		this.universe = new UniverseSelector(config.universe, this.indicators, {
			benchmarks: this.benchmark ? [this.benchmark] : [],
		});
		this.detector = new SignalDetector(config.signals, {
			maxEntriesPerSymbol: config.risk.maxEntriesPerSymbol,
		});
		this.risk = new RiskManager(config.risk);
		this.tracker =
			options.tracker ?? new PortfolioTracker(config.account.initialCash);
	}

	/** Processes every bar sharing one timestamp. */
	step(bars: readonly Bar[]): StepReport {
		const timestamp = this.checkBatch(bars);

		const ordered = [...bars].sort((a, b) => (a.symbol < b.symbol ? -1 : 1));
		const bySymbol = new Map<string, Bar>();
		const states = new Map<string, IndicatorState>();
		for (const bar of ordered) {
			states.set(bar.symbol, this.indicators.update(bar.symbol, bar));
			bySymbol.set(bar.symbol, bar);
		}
		this.lastTimestamp = timestamp;

		this.tracker.markToMarket(
			new Map(ordered.map((bar) => [bar.symbol, bar.close])),
			timestamp
		);

		const held = this.tracker.heldSymbols();
		const selection = this.universe.eligible(timestamp, bySymbol.keys(), held);
		const eligible = new Set(selection.eligible);
		const regime: Regime | null = this.benchmark
			? classifyRegime(this.indicators.state(this.benchmark))
			: null;

		const heldWithBars = Array.from(held)
			.filter((symbol) => bySymbol.has(symbol))
			.sort();

		const context: StepContext = {
			timestamp,
			bars: bySymbol,
			flags: toUniverseFlags(selection),
			decisions: [],
		};
		const signals: Signal[] = [];
		const suppressed: Signal[] = [];

		// Held positions are judged against the levels they carried into the
		// bar; stops ratchet only after the exit checks have run.
		for (const symbol of heldWithBars) {
			const state = states.get(symbol);
			const position = this.tracker.position(symbol);
			let signal =
				state && position && eligible.has(symbol)
					? this.detector.detect(symbol, state, position)
					: null;
			if (signal) {
				signals.push(signal);
				if (isEntry(signal) && !entriesAllowed(regime)) {
					suppressed.push(signal);
					signal = null;
				}
			}
			this.evaluate(symbol, signal, context);
			if (state) {
				this.ratchetStops(symbol, state);
			}
		}

		const candidates = selection.eligible.filter((symbol) => !held.has(symbol));
		for (const symbol of candidates) {
			const state = states.get(symbol);
			const signal = state ? this.detector.detect(symbol, state) : null;
			if (!signal) {
				continue;
			}
			signals.push(signal);
			if (!entriesAllowed(regime)) {
				suppressed.push(signal);
				continue;
			}
			this.evaluate(symbol, signal, context);
		}

		const snapshot = this.tracker.snapshot();
		this.tracker.recordEquity();
		this.snapshots.push(snapshot);
		this.decisions.push(...context.decisions);

		const report: StepReport = {
			timestamp,
			snapshot,
			selection,
			signals,
			suppressed,
			decisions: context.decisions,
		};
		logStepSummary(report, ordered.length);
		return report;
	}

	run(bars: Iterable<Bar>): BacktestResult {
		for (const batch of batchByTimestamp(bars)) {
			this.step(batch.bars);
		}
		return this.result();
	}

	history(): PortfolioSnapshot[] {
		return [...this.snapshots];
	}

	result(): BacktestResult {
		return {
			configFingerprint: computeConfigFingerprint(this.config),
			config: this.config,
			snapshots: this.history(),
			decisions: [...this.decisions],
			trades: this.tracker.trades(),
			summary: this.summarize(),
		};
	}

	private ratchetStops(symbol: string, state: IndicatorState): void {
		const position = this.tracker.position(symbol);
		if (!position) {
			return;
		}
		const update = this.risk.refreshStops(position, state);
		if (update) {
			this.tracker.updateStops(symbol, update);
		}
	}

	private evaluate(symbol: string, signal: Signal | null, context: StepContext): void {
		const bar = context.bars.get(symbol);
		if (!bar) {
			return;
		}
		let decision: RiskDecision;
		try {
			decision = this.risk.size({
				symbol,
				signal,
				price: bar.close,
				timestamp: context.timestamp,
				snapshot: this.tracker.snapshot(),
				flags: context.flags,
			});
		} catch (error) {
			if (!(error instanceof SizingError)) {
				throw error;
			}
			logOrderDropped(symbol, context.timestamp, error.message, signal);
			context.decisions.push({
				outcome: "dropped",
				timestamp: context.timestamp,
				symbol,
				reason: error.message,
				...(signal ? { signal: signal.kind } : {}),
			});
			return;
		}

		if (decision.type === "hold") {
			return;
		}
		if (decision.type === "reject") {
			logOrderRejected(decision.rejection);
			context.decisions.push({
				outcome: "rejected",
				timestamp: context.timestamp,
				symbol,
				rejection: decision.rejection,
			});
			return;
		}

		const outcome = this.tracker.apply(decision.intent, bar.close);
		if (outcome.status === "rejected") {
			const rejection = signal
				? { ...outcome.rejection, signal: signal.kind }
				: outcome.rejection;
			logOrderRejected(rejection, decision.intent);
			context.decisions.push({
				outcome: "rejected",
				timestamp: context.timestamp,
				symbol,
				rejection,
			});
			return;
		}
		logOrderAccepted(outcome.intent, outcome.fillPrice);
		context.decisions.push({
			outcome: "accepted",
			timestamp: context.timestamp,
			symbol,
			intent: outcome.intent,
			fillPrice: outcome.fillPrice,
		});
	}

	/**
	 * Validates every bar before anything is mutated, so a rejected batch
	 * leaves indicator and portfolio state untouched.
	 */
	private checkBatch(bars: readonly Bar[]): number {
		const first = bars[0];
		if (!first) {
			throw new DataError("Empty bar batch");
		}
		const seen = new Set<string>();
		for (const bar of bars) {
			validateBar(bar, `${bar.symbol}@${bar.timestamp}`);
			if (bar.timestamp !== first.timestamp) {
				throw new DataError(
					`Bar batch mixes timestamps ${first.timestamp} and ${bar.timestamp}`,
					{ timestamps: [first.timestamp, bar.timestamp] }
				);
			}
			if (seen.has(bar.symbol)) {
				throw new SequenceError(
					`Duplicate bar for ${bar.symbol} at ${bar.timestamp}`,
					{ symbol: bar.symbol, timestamp: bar.timestamp }
				);
			}
			seen.add(bar.symbol);
		}
		if (this.lastTimestamp !== null && first.timestamp <= this.lastTimestamp) {
			throw new SequenceError(
				`Bar batch at ${first.timestamp} does not advance past ${this.lastTimestamp}`,
				{ timestamp: first.timestamp, lastTimestamp: this.lastTimestamp }
			);
		}
		return first.timestamp;
	}

	private summarize(): BacktestSummary {
		const account = this.tracker.accountSummary();
		const startingEquity = this.config.account.initialCash;
		const finalEquity =
			this.snapshots[this.snapshots.length - 1]?.equity ?? startingEquity;
		const counts = { accepted: 0, rejected: 0, dropped: 0 };
		for (const decision of this.decisions) {
			counts[decision.outcome] += 1;
		}
		return {
			startingEquity,
			finalEquity,
			totalReturn: startingEquity > 0 ? finalEquity / startingEquity - 1 : 0,
			maxDrawdown: account.maxDrawdown,
			maxDrawdownPct: account.maxDrawdownPct,
			steps: this.snapshots.length,
			trades: account.trades,
			...counts,
		};
	}
}
