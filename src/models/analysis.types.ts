import type { CrossoverEvent } from './crossover.types';
import type { EmaSeries } from './ema.types';
import type { IntervalDistribution, IntervalRecord, IntervalSummary } from './interval.types';
import type { PriceBar } from './priceBar.types';

export type AnalysisInput = Readonly<{
  bars: readonly PriceBar[];
  binEdges: readonly number[];
}>;

export type AnalysisResult = Readonly<{
  bars: readonly PriceBar[];
  emas: EmaSeries;
  events: readonly CrossoverEvent[];
  intervals: readonly IntervalRecord[];
  summaries: readonly IntervalSummary[];
  distributions: readonly IntervalDistribution[];
}>;
