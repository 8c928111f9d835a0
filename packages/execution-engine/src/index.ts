export { PaperAccount } from "./paperAccount";
export type {
	ClosedTrade,
	PaperAccountSnapshot,
	TradeCounters,
} from "./paperAccount";
export {
	PortfolioTracker,
	REJECT_CLOSE_MISMATCH,
	REJECT_INVALID_FILL,
	REJECT_NO_POSITION,
	REJECT_POSITION_OPEN,
} from "./portfolioTracker";
export type { FillOutcome, PositionLevels } from "./portfolioTracker";
