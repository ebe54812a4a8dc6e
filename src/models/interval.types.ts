import type { CrossoverCategory } from './crossover.types';
import type { EpochTimeStamp, Nullable } from './utility.types';

export type IntervalRecord = Readonly<{
  category: CrossoverCategory;
  previousDate: EpochTimeStamp;
  currentDate: EpochTimeStamp;
  daysBetween: number;
}>;

export type IntervalSummary = Readonly<{
  category: CrossoverCategory;
  avg: number;
  median: number;
  min: number;
  max: number;
  /** Number of interval records, not events */
  count: number;
  /** Sample standard deviation, null below two intervals */
  stddev: Nullable<number>;
}>;

export type IntervalBin = Readonly<{
  label: string;
  /** Inclusive lower bound */
  from: number;
  /** Exclusive upper bound, Infinity for the last bin */
  to: number;
}>;

export type IntervalDistribution = Readonly<{
  category: CrossoverCategory;
  binLabel: string;
  frequency: number;
}>;
