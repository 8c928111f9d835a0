export * from "./backtest/backtestRunner";
export * from "./backtest/backtestTypes";
export * from "./loop/strategyOrchestrator";
export * from "./fingerprints";
export { runtimeLogger } from "./runtimeShared";
