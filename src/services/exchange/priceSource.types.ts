import type { PriceBar } from '@models/priceBar.types';

export interface PriceSource {
  /** Daily bars ordered by date, one per UTC day. */
  fetchDailyBars(): Promise<PriceBar[]>;
}
