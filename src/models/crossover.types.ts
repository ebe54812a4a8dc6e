import type { CROSSOVER_CATEGORIES } from '@constants/crossover.const';
import type { EmaKey } from './ema.types';
import type { EpochTimeStamp } from './utility.types';

export type CrossoverCategory = (typeof CROSSOVER_CATEGORIES)[number];

export type CrossoverEvent = Readonly<{
  category: CrossoverCategory;
  date: EpochTimeStamp;
  /** Close of the bar on which the crossover happened */
  price: number;
}>;

/** Binds one EMA pair to the two categories its difference can produce. */
export type CrossoverRule = Readonly<{
  pair: string;
  short: EmaKey;
  long: EmaKey;
  up: CrossoverCategory;
  down: CrossoverCategory;
}>;
