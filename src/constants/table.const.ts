export const TABLE_NAMES = {
  crossovers: 'crossover_summary',
  intervals: 'crossover_intervals',
  summary: 'crossover_interval_summary',
  distribution: 'crossover_interval_distribution',
  raw: 'raw_ohlcv_emas',
} as const;
