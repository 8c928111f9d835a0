export { RollingWindow } from "./rollingWindow";
export { IncrementalSma, sma } from "./sma";
export { WilderAtr, calculateATRSeries, trueRange } from "./atr";
export type { AtrInput } from "./atr";
export { IndicatorEngine } from "./indicatorEngine";
