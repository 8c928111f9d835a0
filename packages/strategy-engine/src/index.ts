export {
	FLAT,
	SignalDetector,
	stateFromPosition,
	transition,
} from "./signalDetector";
export type {
	DetectorState,
	SignalDetectorOptions,
	Transition,
} from "./signalDetector";
export { classifyRegime, entriesAllowed } from "./regimeFilter";
export type { Regime } from "./regimeFilter";
