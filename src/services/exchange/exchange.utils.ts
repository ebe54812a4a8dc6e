import type { PriceBar } from '@models/priceBar.types';
import { error, warning } from '@services/logger';
import { startOfUTCDay } from '@utils/date/date.utils';
import { getRetryDelay } from '@utils/fetch/fetch.utils';
import { wait } from '@utils/process/process.utils';
import { NetworkError, type OHLCV } from 'ccxt';
import { MAX_RETRIES_ON_FAILURE } from './exchange.const';

export const retry = async <T>(
  fn: () => Promise<T>,
  currRetry = 1,
  maxRetries = MAX_RETRIES_ON_FAILURE,
): Promise<T> => {
  try {
    return await fn();
  } catch (err) {
    const isRetryableError = err instanceof NetworkError;
    if (err instanceof Error) error('exchange', `Call to exchange failed due to ${err.message}`);
    if (!isRetryableError || currRetry > maxRetries) throw err;
    await wait(getRetryDelay(currRetry));
    warning('exchange', `Retrying to fetch (attempt ${currRetry})`);
    return retry(fn, currRetry + 1, maxRetries);
  }
};

/** Missing prices stay undefined so that bar validation can reject them. */
export const mapOhlcvToBars = (ohlcvList: OHLCV[]): PriceBar[] =>
  ohlcvList.map(([timestamp, open, high, low, close, volume]) => ({
    date: startOfUTCDay(timestamp ?? 0),
    open,
    high,
    low,
    close: close ?? 0,
    volume,
  }));
