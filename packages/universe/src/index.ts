export {
	ELIGIBILITY_RULES,
	UniverseSelector,
	toUniverseFlags,
} from "./universeSelector";
export type {
	ExclusionReason,
	IndicatorView,
	UniverseSelection,
	UniverseSelectorOptions,
} from "./universeSelector";
