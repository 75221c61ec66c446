import { Schema } from 'mongoose';

export interface RatioAlertRecord {
  pairName: string;
  ratio: number;
  baselineRatio: number;
  changePct: number;
  threshold: number;
  windowSecs: number;
  /** Whether the notification channel accepted the alert */
  delivered: boolean;
  timestamp: Date;
}

export const RatioAlertSchema = new Schema<RatioAlertRecord>(
  {
    pairName: { type: String, required: true },
    ratio: { type: Number, required: true },
    baselineRatio: { type: Number, required: true },
    changePct: { type: Number, required: true },
    threshold: { type: Number, required: true },
    windowSecs: { type: Number, required: true },
    delivered: { type: Boolean, required: true },
    timestamp: { type: Date, required: true },
  },
  {
    collection: 'ratio_alerts',
    versionKey: false,
  },
);

RatioAlertSchema.index({ pairName: 1, timestamp: -1 });
RatioAlertSchema.index({ timestamp: -1 });
