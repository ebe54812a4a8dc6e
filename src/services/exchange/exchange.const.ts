export const EXCHANGE_NAMES = ['binance', 'bitstamp', 'bybit', 'coinbase', 'kraken', 'okx'] as const;

export const DAILY_TIMEFRAME = '1d';
export const OHLCV_PAGE_LIMIT = 1000;
export const MAX_RETRIES_ON_FAILURE = 3;
