import { CATEGORY_LABELS } from '@constants/crossover.const';
import type { CrossoverEvent } from '@models/crossover.types';
import type { IntervalSummary } from '@models/interval.types';
import { SUMMARY_DECIMALS } from '@services/export/export.const';
import { sortByMostRecent } from '@services/export/tableExporter';
import { toCalendarDate } from '@utils/date/date.utils';
import { round } from '@utils/math/round.utils';
import { formatUsd, pluralize } from '@utils/string/string.utils';
import { isNil } from 'lodash-es';

export const NO_CROSSOVER_LINE = 'No crossovers found in the historical data.';

export const formatCrossoverReport = (events: readonly CrossoverEvent[]): string[] => {
  if (!events.length) return [NO_CROSSOVER_LINE];
  return sortByMostRecent(events).map(
    ({ date, category, price }) => `${toCalendarDate(date)} | ${CATEGORY_LABELS[category]} | Price: ${formatUsd(price)}`,
  );
};

export const formatIntervalReport = (summaries: readonly IntervalSummary[]): string[] =>
  summaries.map(
    ({ category, avg, median, min, max, count, stddev }) =>
      `${CATEGORY_LABELS[category]} | ${count} ${pluralize('interval', count)} | avg ${round(avg, SUMMARY_DECIMALS, 'halfEven')}d | median ${median}d | min ${min}d | max ${max}d | std ${isNil(stddev) ? 'n/a' : `${round(stddev, SUMMARY_DECIMALS, 'halfEven')}d`}`,
  );
