import { CROSSOVER_CATEGORIES } from '@constants/crossover.const';
import { ValidationError } from '@errors/validation.error';
import type { CrossoverCategory, CrossoverEvent } from '@models/crossover.types';
import type { IntervalBin, IntervalDistribution, IntervalRecord, IntervalSummary } from '@models/interval.types';
import { daysBetween } from '@utils/date/date.utils';
import { median, sampleStdev } from '@utils/math/math.utils';
import { filter, flatMap, isEmpty, max, mean, min, sortBy } from 'lodash-es';

const ofCategory = <T extends { category: CrossoverCategory }>(items: readonly T[], category: CrossoverCategory) =>
  filter(items, item => item.category === category);

/** Day gaps between consecutive events of the same category. */
export const computeIntervals = (events: readonly CrossoverEvent[]): IntervalRecord[] => {
  return flatMap(CROSSOVER_CATEGORIES, category =>
    sortBy(ofCategory(events, category), 'date').flatMap((event, i, sorted) =>
      i === 0
        ? []
        : [
            Object.freeze({
              category,
              previousDate: sorted[i - 1].date,
              currentDate: event.date,
              daysBetween: daysBetween(sorted[i - 1].date, event.date),
            }),
          ],
    ),
  );
};

/** Per category statistics over `daysBetween`; categories without intervals are left out. */
export const summarizeIntervals = (intervals: readonly IntervalRecord[]): IntervalSummary[] => {
  return flatMap(CROSSOVER_CATEGORIES, category => {
    const days = ofCategory(intervals, category).map(({ daysBetween }) => daysBetween);
    if (isEmpty(days)) return [];

    return [
      Object.freeze({
        category,
        avg: mean(days),
        median: median(days),
        min: min(days) ?? 0,
        max: max(days) ?? 0,
        count: days.length,
        stddev: days.length < 2 ? null : sampleStdev(days),
      }),
    ];
  });
};

/**
 * Turns ascending edges into left-closed bins: `[0, 50, 100]` gives
 * `0-49`, `50-99` and `100+`.
 */
export const buildBins = (edges: readonly number[]): IntervalBin[] => {
  if (isEmpty(edges)) throw new ValidationError('At least one bin edge is required');
  if (!edges.every(Number.isInteger)) throw new ValidationError(`Bin edges must be integers: ${edges.join(', ')}`);
  if (edges[0] !== 0) throw new ValidationError(`First bin edge must be 0, got ${edges[0]}`);
  if (edges.some((edge, i) => i > 0 && edge <= edges[i - 1]))
    throw new ValidationError(`Bin edges must be strictly ascending: ${edges.join(', ')}`);

  return edges.map((from, i) => {
    const to = i < edges.length - 1 ? edges[i + 1] : Infinity;
    return Object.freeze({ label: Number.isFinite(to) ? `${from}-${to - 1}` : `${from}+`, from, to });
  });
};

/** Histogram of `daysBetween`, one row per (category, bin) including empty bins. */
export const distributeIntervals = (
  intervals: readonly IntervalRecord[],
  edges: readonly number[],
): IntervalDistribution[] => {
  const bins = buildBins(edges);

  return flatMap(CROSSOVER_CATEGORIES, category =>
    bins.map(({ label, from, to }) =>
      Object.freeze({
        category,
        binLabel: label,
        frequency: filter(ofCategory(intervals, category), ({ daysBetween }) => daysBetween >= from && daysBetween < to).length,
      }),
    ),
  );
};
