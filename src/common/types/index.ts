export type {
  OrderSide,
  PriceLevel,
  PriceQuote,
  OrderBook,
  FetchOutcome,
} from './market-data.type.js';
export type {
  SimpleRatio,
  VolumeRatio,
  SlippageAnalysis,
  RatioSnapshot,
  MonitoredPair,
} from './ratio.type.js';
