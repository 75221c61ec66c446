import { Schema } from 'mongoose';

export interface VolumeRatioRecord {
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

export const VolumeRatioSchema = new Schema<VolumeRatioRecord>(
  {
    pairName: { type: String, required: true },
    symbolA: { type: String, required: true },
    symbolB: { type: String, required: true },
    volume: { type: Number, required: true },
    effectivePriceA: { type: Number, required: true },
    effectivePriceB: { type: Number, required: true },
    slippageA: { type: Number, required: true },
    slippageB: { type: Number, required: true },
    ratio: { type: Number, required: true },
    timestamp: { type: Date, required: true },
  },
  {
    collection: 'volume_ratios',
    versionKey: false,
  },
);

VolumeRatioSchema.index({ pairName: 1, timestamp: -1 });
