import {
	OrderIntent,
	RejectedOrder,
	ResolvedBacktestConfig,
	Signal,
	createLogger,
} from "@trendline/core";
import type { StepReport } from "./backtest/backtestTypes";

export const runtimeLogger = createLogger("runtime");

export const logOrderAccepted = (intent: OrderIntent, fillPrice: number): void => {
	runtimeLogger.info("order_accepted", {
		timestamp: new Date(intent.timestamp).toISOString(),
		symbol: intent.symbol,
		action: intent.action,
		direction: intent.direction,
		quantity: intent.quantity,
		price: fillPrice,
		rationale: intent.rationale,
		stopPrice: intent.stopPrice ?? null,
		targetPrice: intent.targetPrice ?? null,
	});
	if (intent.rationale === "forced_exit") {
		runtimeLogger.info("forced_exit", {
			timestamp: new Date(intent.timestamp).toISOString(),
			symbol: intent.symbol,
			quantity: intent.quantity,
			price: fillPrice,
		});
	}
};

export const logOrderRejected = (
	rejection: RejectedOrder,
	intent?: OrderIntent
): void => {
	runtimeLogger.warn("order_rejected", {
		timestamp: new Date(rejection.timestamp).toISOString(),
		symbol: rejection.symbol,
		action: intent?.action ?? null,
		direction: intent?.direction ?? null,
		quantity: intent?.quantity ?? null,
		price: intent?.referencePrice ?? null,
		rationale: rejection.rationale ?? null,
		reason: rejection.reason,
	});
};

export const logOrderDropped = (
	symbol: string,
	timestamp: number,
	reason: string,
	signal: Signal | null
): void => {
	runtimeLogger.warn("order_dropped", {
		timestamp: new Date(timestamp).toISOString(),
		symbol,
		signal: signal?.kind ?? null,
		rationale: signal?.reason ?? null,
		reason,
	});
};

export const logStepSummary = (report: StepReport, barCount: number): void => {
	const counts = { accepted: 0, rejected: 0, dropped: 0 };
	for (const decision of report.decisions) {
		counts[decision.outcome] += 1;
	}
	runtimeLogger.debug("step_summary", {
		timestamp: new Date(report.timestamp).toISOString(),
		bars: barCount,
		eligible: report.selection.eligible.length,
		signals: report.signals.length,
		suppressed: report.suppressed.length,
		...counts,
		equity: report.snapshot.equity,
		cash: report.snapshot.cash,
	});
};

export const logBacktestConfig = (
	config: ResolvedBacktestConfig,
	fingerprint: string,
	extra: Record<string, unknown> = {}
): void => {
	runtimeLogger.info("backtest_config", {
		configFingerprint: fingerprint,
		lookback: config.indicators.lookback,
		riskPerTrade: config.risk.riskPerTrade,
		maxConcurrentPositions: config.risk.maxConcurrentPositions,
		maxAggregateExposure: config.risk.maxAggregateExposure,
		shortingEnabled: config.signals.shortingEnabled,
		benchmark: config.regimeFilter?.benchmark ?? null,
		initialCash: config.account.initialCash,
		...extra,
	});
};
