import type { Column } from '@models/table.types';

export const CROSSOVER_COLUMNS: readonly Column[] = [
  { name: 'date', type: 'DATE' },
  { name: 'category', type: 'STRING' },
  { name: 'category_num', type: 'INTEGER' },
  { name: 'category_label', type: 'STRING' },
  { name: 'price', type: 'FLOAT' },
];

export const INTERVAL_COLUMNS: readonly Column[] = [
  { name: 'category', type: 'STRING' },
  { name: 'category_num', type: 'INTEGER' },
  { name: 'previous_date', type: 'DATE' },
  { name: 'current_date', type: 'DATE' },
  { name: 'days_between', type: 'INTEGER' },
];

export const SUMMARY_COLUMNS: readonly Column[] = [
  { name: 'category', type: 'STRING' },
  { name: 'category_num', type: 'INTEGER' },
  { name: 'avg_days_between', type: 'FLOAT' },
  { name: 'median_days_between', type: 'FLOAT' },
  { name: 'min_days_between', type: 'INTEGER' },
  { name: 'max_days_between', type: 'INTEGER' },
  { name: 'interval_count', type: 'INTEGER' },
  { name: 'stddev_days', type: 'FLOAT' },
];

export const DISTRIBUTION_COLUMNS: readonly Column[] = [
  { name: 'category', type: 'STRING' },
  { name: 'category_num', type: 'INTEGER' },
  { name: 'bin_label', type: 'STRING' },
  { name: 'frequency', type: 'INTEGER' },
];

export const RAW_COLUMNS: readonly Column[] = [
  { name: 'date', type: 'DATE' },
  { name: 'open', type: 'FLOAT' },
  { name: 'high', type: 'FLOAT' },
  { name: 'low', type: 'FLOAT' },
  { name: 'close', type: 'FLOAT' },
  { name: 'volume', type: 'FLOAT' },
  { name: 'ema_20', type: 'FLOAT' },
  { name: 'ema_50', type: 'FLOAT' },
  { name: 'ema_200', type: 'FLOAT' },
];

/** Decimals kept for averaged statistics in the summary table */
export const SUMMARY_DECIMALS = 1;
