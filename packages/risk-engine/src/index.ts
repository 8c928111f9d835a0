import {
	IndicatorState,
	Position,
	RiskConfig,
} from "@trendline/core";
import {
	DEFAULT_RISK_RULES,
	RiskDecision,
	RiskInput,
	RiskRule,
} from "./rules";
import { StopUpdate, refreshStops } from "./stops";

export class RiskManager {
	constructor(
		private readonly config: Readonly<RiskConfig>,
		private readonly rules: readonly RiskRule[] = DEFAULT_RISK_RULES
	) {}

	/**
	 * Runs the rule list in priority order. A degenerate stop distance surfaces
	 * as a thrown SizingError; caps and cash shortfalls come back as `reject`.
	 */
	size(input: RiskInput): RiskDecision {
		for (const rule of this.rules) {
			const outcome = rule(input, this.config);
			if (outcome.type !== "defer") {
				return outcome;
			}
		}
		return { type: "hold" };
	}

	refreshStops(
		position: Readonly<Position>,
		indicators: IndicatorState
	): StopUpdate | null {
		return refreshStops(position, indicators, this.config);
	}
}

export {
	DEFAULT_RISK_RULES,
	entryRule,
	exitSignalRule,
	forcedExitRule,
	stopTargetRule,
} from "./rules";
export type { RiskDecision, RiskInput, RiskRule, RuleOutcome } from "./rules";
export {
	calculateStopPrice,
	calculateTargetPrice,
	orderSideFor,
	sizePosition,
} from "./sizing";
export { refreshStops } from "./stops";
export type { StopUpdate } from "./stops";
