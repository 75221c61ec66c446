export const MARKET_DATA_PROVIDER_TOKEN = 'IMarketDataProvider';
