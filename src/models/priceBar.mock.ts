import { ONE_DAY } from '@constants/time.const';
import type { PriceBar } from './priceBar.types';
import type { EpochTimeStamp } from './utility.types';

export const FIRST_DAY: EpochTimeStamp = Date.UTC(2020, 0, 1);

export const dayOffset = (offset: number): EpochTimeStamp => FIRST_DAY + offset * ONE_DAY;

/** One bar per consecutive UTC day starting at FIRST_DAY. */
export const barsFromCloses = (closes: readonly number[]): PriceBar[] =>
  closes.map((close, i) => ({ date: dayOffset(i), open: close, high: close, low: close, close, volume: 100 }));
