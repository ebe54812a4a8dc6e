import { ONE_DAY } from '@constants/time.const';
import { PriceSourceError } from '@errors/priceSource.error';
import type { ExchangeName, SourceConfig } from '@models/configuration.types';
import type { PriceBar } from '@models/priceBar.types';
import { debug } from '@services/logger';
import { startOfUTCDay, toISOString } from '@utils/date/date.utils';
import { pluralize } from '@utils/string/string.utils';
import ccxt, { type Exchange as CCXT } from 'ccxt';
import { first, last, sortBy, uniqBy } from 'lodash-es';
import { DAILY_TIMEFRAME, OHLCV_PAGE_LIMIT } from './exchange.const';
import { mapOhlcvToBars, retry } from './exchange.utils';
import type { PriceSource } from './priceSource.types';

export class CCXTPriceSource implements PriceSource {
  protected client: CCXT;
  protected exchangeName: ExchangeName;
  protected symbol: string;
  protected historyDays: number;

  constructor({ exchange, symbol, historyDays }: SourceConfig) {
    this.client = new ccxt[exchange]({ enableRateLimit: true });
    if (!this.client.has['fetchOHLCV']) throw new PriceSourceError(`Missing fetchOHLCV feature in ${exchange} exchange`);
    this.client.options['maxRetriesOnFailure'] = 0; // retries go through retry()
    this.exchangeName = exchange;
    this.symbol = symbol;
    this.historyDays = historyDays;
  }

  public async fetchDailyBars(): Promise<PriceBar[]> {
    let pages: PriceBar[];
    try {
      await retry(() => this.client.loadMarkets());
      pages = await this.fetchPages();
    } catch (err) {
      throw new PriceSourceError(
        `Failed to fetch daily candles of ${this.symbol} from ${this.exchangeName} (${err instanceof Error ? err.message : err})`,
      );
    }

    const bars = uniqBy(sortBy(pages, 'date'), 'date');
    if (!bars.length) throw new PriceSourceError(`No daily candles returned for ${this.symbol} by ${this.exchangeName}`);

    debug(
      'exchange',
      `${bars.length} daily ${pluralize('candle', bars.length)} fetched from ${this.exchangeName}, from ${toISOString(first(bars)?.date)} to ${toISOString(last(bars)?.date)}`,
    );
    return bars;
  }

  /** Pages forward from the first day of history until the exchange runs dry or today is reached. */
  private async fetchPages(): Promise<PriceBar[]> {
    const now = Date.now();
    const bars: PriceBar[] = [];
    let since = startOfUTCDay(now - this.historyDays * ONE_DAY);

    while (since <= now) {
      const from = since;
      const page = mapOhlcvToBars(
        await retry(() => this.client.fetchOHLCV(this.symbol, DAILY_TIMEFRAME, from, OHLCV_PAGE_LIMIT)),
      );
      const lastBar = last(page);
      if (!lastBar || lastBar.date < from) break;

      bars.push(...page);
      since = lastBar.date + ONE_DAY;
    }

    return bars;
  }
}
