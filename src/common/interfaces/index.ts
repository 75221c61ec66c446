export type { IMarketDataProvider } from './market-data-provider.interface.js';
export type { INotifier } from './notifier.interface.js';
