import type { OrderSide } from './market-data.type.js';

export interface SimpleRatio {
  pairName: string;
  symbolA: string;
  symbolB: string;
  priceA: number;
  priceB: number;
  ratio: number;
  timestamp: Date;
}

export interface VolumeRatio {
  pairName: string;
  symbolA: string;
  symbolB: string;
  volume: number;
  effectivePriceA: number;
  effectivePriceB: number;
  slippageA: number;
  slippageB: number;
  ratio: number;
  timestamp: Date;
}

export interface SlippageAnalysis {
  symbol: string;
  side: OrderSide;
  volume: number;
  midPrice: number;
  bestPrice: number;
  effectivePrice: number;
  slippagePct: number;
  depthConsumed: number;
  totalCost: number;
  timestamp: Date;
}

export interface RatioSnapshot {
  ratio: number;
  timestamp: Date;
}

export interface MonitoredPair {
  name: string;
  symbolA: string;
  symbolB: string;
  analysisVolume?: number;
}
