export { RatioSnapshotSchema } from './ratio-snapshot.model.js';
export type { RatioSnapshotRecord } from './ratio-snapshot.model.js';
export { RatioAlertSchema } from './ratio-alert.model.js';
export type { RatioAlertRecord } from './ratio-alert.model.js';
export { VolumeRatioSchema } from './volume-ratio.model.js';
export type { VolumeRatioRecord } from './volume-ratio.model.js';
