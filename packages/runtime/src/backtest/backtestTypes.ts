import {
	OrderIntent,
	PortfolioSnapshot,
	RejectedOrder,
	ResolvedBacktestConfig,
	Signal,
	SignalKind,
} from "@trendline/core";
import { ClosedTrade, TradeCounters } from "@trendline/execution-engine";
import { UniverseSelection } from "@trendline/universe";

export type DecisionRecord =
	| {
			outcome: "accepted";
			timestamp: number;
			symbol: string;
			intent: OrderIntent;
			fillPrice: number;
	  }
	| {
			outcome: "rejected";
			timestamp: number;
			symbol: string;
			rejection: RejectedOrder;
	  }
	| {
			outcome: "dropped";
			timestamp: number;
			symbol: string;
			reason: string;
			signal?: SignalKind;
	  };

export type DecisionOutcome = DecisionRecord["outcome"];

export interface StepReport {
	timestamp: number;
	snapshot: PortfolioSnapshot;
	selection: UniverseSelection;
	signals: Signal[];
	/** Entry signals discarded because the benchmark regime was not bullish. */
	suppressed: Signal[];
	decisions: DecisionRecord[];
}

export interface BacktestSummary {
	startingEquity: number;
	finalEquity: number;
	/** finalEquity / startingEquity - 1 */
	totalReturn: number;
	maxDrawdown: number;
	maxDrawdownPct: number;
	steps: number;
	trades: TradeCounters;
	accepted: number;
	rejected: number;
	dropped: number;
}

export interface BacktestResult {
	configFingerprint: string;
	config: ResolvedBacktestConfig;
	snapshots: PortfolioSnapshot[];
	decisions: DecisionRecord[];
	trades: ClosedTrade[];
	summary: BacktestSummary;
}
