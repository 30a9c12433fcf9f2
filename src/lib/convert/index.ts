export {
  ConversionDispatcher,
  STRATEGY_TABLE,
  missingStrategies,
  pairKey,
} from "./dispatcher";
export type { DispatcherOptions } from "./dispatcher";
export type {
  ConversionOutput,
  ConversionRequest,
  ConversionStrategy,
  StrategyContext,
  StrategyName,
} from "./types";
