import { PriceSourceError } from '@errors/priceSource.error';
import * as processUtils from '@utils/process/process.utils';
import { ExchangeError, NetworkError } from 'ccxt';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CCXTPriceSource } from './ccxtPriceSource';

const { ExchangeMock, fetchOHLCV, loadMarkets } = vi.hoisted(() => {
  const fetchOHLCV = vi.fn();
  const loadMarkets = vi.fn();
  const ExchangeMock = vi.fn(function () {
    return { has: { fetchOHLCV: true }, options: {}, fetchOHLCV, loadMarkets };
  });
  return { ExchangeMock, fetchOHLCV, loadMarkets };
});

vi.mock('ccxt', async importOriginal => ({
  ...(await importOriginal<typeof import('ccxt')>()),
  default: { binance: ExchangeMock },
}));
vi.mock('@services/logger', () => ({ debug: vi.fn(), error: vi.fn(), warning: vi.fn() }));
vi.mock('@utils/process/process.utils', () => ({ wait: vi.fn() }));

const NOW = Date.UTC(2024, 0, 10, 12);
const day = (dayOfMonth: number) => Date.UTC(2024, 0, dayOfMonth);
const ohlcv = (dayOfMonth: number) => [day(dayOfMonth), 100, 110, 90, 100 + dayOfMonth, 1000];
const config = { exchange: 'binance', symbol: 'BTC/USDT', historyDays: 5 } as const;

describe('CCXTPriceSource', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create a rate limited client', () => {
    new CCXTPriceSource(config);
    expect(ExchangeMock).toHaveBeenCalledWith({ enableRateLimit: true });
  });

  it('should throw when the exchange cannot fetch candles', () => {
    ExchangeMock.mockImplementationOnce(function () {
      return { has: { fetchOHLCV: false }, options: {}, fetchOHLCV, loadMarkets };
    });
    expect(() => new CCXTPriceSource(config)).toThrow('[EXCHANGE] Missing fetchOHLCV feature in binance exchange');
  });

  it('should page forward from the first day of history and drop overlapping candles', async () => {
    fetchOHLCV.mockResolvedValueOnce([ohlcv(5), ohlcv(6), ohlcv(7)]).mockResolvedValueOnce([ohlcv(7), ohlcv(8), ohlcv(9), ohlcv(10)]);

    const bars = await new CCXTPriceSource(config).fetchDailyBars();

    expect(fetchOHLCV).toHaveBeenCalledTimes(2);
    expect(fetchOHLCV).toHaveBeenNthCalledWith(1, 'BTC/USDT', '1d', day(5), 1000);
    expect(fetchOHLCV).toHaveBeenNthCalledWith(2, 'BTC/USDT', '1d', day(8), 1000);
    expect(bars.map(({ date }) => date)).toEqual([day(5), day(6), day(7), day(8), day(9), day(10)]);
    expect(bars[0]).toEqual({ date: day(5), open: 100, high: 110, low: 90, close: 105, volume: 1000 });
  });

  it('should stop on an empty page', async () => {
    fetchOHLCV.mockResolvedValueOnce([ohlcv(5), ohlcv(6)]).mockResolvedValueOnce([]);

    const bars = await new CCXTPriceSource(config).fetchDailyBars();

    expect(fetchOHLCV).toHaveBeenCalledTimes(2);
    expect(bars).toHaveLength(2);
  });

  it('should stop when the exchange does not move forward', async () => {
    fetchOHLCV.mockResolvedValue([ohlcv(5), ohlcv(6)]);

    const bars = await new CCXTPriceSource(config).fetchDailyBars();

    expect(fetchOHLCV).toHaveBeenCalledTimes(2);
    expect(bars.map(({ date }) => date)).toEqual([day(5), day(6)]);
  });

  it('should retry network errors', async () => {
    fetchOHLCV
      .mockRejectedValueOnce(new NetworkError('timeout'))
      .mockResolvedValueOnce([ohlcv(5), ohlcv(6), ohlcv(7), ohlcv(8), ohlcv(9), ohlcv(10)]);

    const bars = await new CCXTPriceSource(config).fetchDailyBars();

    expect(processUtils.wait).toHaveBeenCalledTimes(1);
    expect(fetchOHLCV).toHaveBeenCalledTimes(2);
    expect(bars).toHaveLength(6);
  });

  it('should wrap exchange failures', async () => {
    loadMarkets.mockRejectedValue(new ExchangeError('bad symbol'));

    const fetching = new CCXTPriceSource(config).fetchDailyBars();

    await expect(fetching).rejects.toThrow(PriceSourceError);
    await expect(fetching).rejects.toThrow(
      '[EXCHANGE] Failed to fetch daily candles of BTC/USDT from binance (bad symbol)',
    );
  });

  it('should throw when no candle is returned', async () => {
    fetchOHLCV.mockResolvedValue([]);

    await expect(new CCXTPriceSource(config).fetchDailyBars()).rejects.toThrow(
      '[EXCHANGE] No daily candles returned for BTC/USDT by binance',
    );
  });
});
