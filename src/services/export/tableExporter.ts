import { CATEGORY_LABELS, CATEGORY_NUMBERS } from '@constants/crossover.const';
import { TABLE_NAMES } from '@constants/table.const';
import type { AnalysisResult } from '@models/analysis.types';
import type { CrossoverEvent } from '@models/crossover.types';
import type { Cell, Column, Table } from '@models/table.types';
import { toCalendarDate } from '@utils/date/date.utils';
import { round } from '@utils/math/round.utils';
import { isNil, orderBy } from 'lodash-es';
import {
  CROSSOVER_COLUMNS,
  DISTRIBUTION_COLUMNS,
  INTERVAL_COLUMNS,
  RAW_COLUMNS,
  SUMMARY_COLUMNS,
  SUMMARY_DECIMALS,
} from './export.const';
import type { ExportOptions } from './export.types';

const table = (name: string, columns: readonly Column[], rows: readonly (readonly Cell[])[]): Table =>
  Object.freeze({ name, columns, rows });

/** Most recent first; events sharing a date keep their detection order. */
export const sortByMostRecent = (events: readonly CrossoverEvent[]) => orderBy(events, ['date'], ['desc']);

export const toTables = (
  { bars, emas, events, intervals, summaries, distributions }: AnalysisResult,
  { includeRawTable = false }: ExportOptions = {},
): Table[] => {
  const tables = [
    table(
      TABLE_NAMES.crossovers,
      CROSSOVER_COLUMNS,
      sortByMostRecent(events).map(({ date, category, price }) => [
        toCalendarDate(date),
        category,
        CATEGORY_NUMBERS[category],
        CATEGORY_LABELS[category],
        price,
      ]),
    ),
    table(
      TABLE_NAMES.intervals,
      INTERVAL_COLUMNS,
      intervals.map(({ category, previousDate, currentDate, daysBetween }) => [
        category,
        CATEGORY_NUMBERS[category],
        toCalendarDate(previousDate),
        toCalendarDate(currentDate),
        daysBetween,
      ]),
    ),
    table(
      TABLE_NAMES.summary,
      SUMMARY_COLUMNS,
      summaries.map(({ category, avg, median, min, max, count, stddev }) => [
        category,
        CATEGORY_NUMBERS[category],
        round(avg, SUMMARY_DECIMALS, 'halfEven'),
        median,
        min,
        max,
        count,
        isNil(stddev) ? null : round(stddev, SUMMARY_DECIMALS, 'halfEven'),
      ]),
    ),
    table(
      TABLE_NAMES.distribution,
      DISTRIBUTION_COLUMNS,
      distributions.map(({ category, binLabel, frequency }) => [
        category,
        CATEGORY_NUMBERS[category],
        binLabel,
        frequency,
      ]),
    ),
  ];

  if (!includeRawTable) return tables;

  return [
    ...tables,
    table(
      TABLE_NAMES.raw,
      RAW_COLUMNS,
      bars.map(({ date, open, high, low, close, volume }, i) => [
        toCalendarDate(date),
        open ?? null,
        high ?? null,
        low ?? null,
        close,
        volume ?? null,
        emas.ema20[i].value,
        emas.ema50[i].value,
        emas.ema200[i].value,
      ]),
    ),
  ];
};
