import { Schema } from 'mongoose';

export interface RatioSnapshotRecord {
  pairName: string;
  symbolA: string;
  symbolB: string;
  priceA: number;
  priceB: number;
  ratio: number;
  timestamp: Date;
}

export const RatioSnapshotSchema = new Schema<RatioSnapshotRecord>(
  {
    pairName: { type: String, required: true },
    symbolA: { type: String, required: true },
    symbolB: { type: String, required: true },
    priceA: { type: Number, required: true },
    priceB: { type: Number, required: true },
    ratio: { type: Number, required: true },
    timestamp: { type: Date, required: true },
  },
  {
    collection: 'ratio_snapshots',
    versionKey: false,
  },
);

RatioSnapshotSchema.index({ pairName: 1, timestamp: -1 });
RatioSnapshotSchema.index({ timestamp: 1 });
