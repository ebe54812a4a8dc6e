import { CROSSOVER_RULES } from '@constants/crossover.const';
import { ValidationError } from '@errors/validation.error';
import type { CrossoverEvent, CrossoverRule } from '@models/crossover.types';
import type { EmaLine, EmaSeries } from '@models/ema.types';
import type { PriceBar } from '@models/priceBar.types';
import { toISOString } from '@utils/date/date.utils';
import { flatMap } from 'lodash-es';

type Side = 'above' | 'below';

const checkAlignment = (bars: readonly PriceBar[], short: EmaLine, long: EmaLine, { pair }: CrossoverRule) => {
  if (short.length !== long.length || short.length !== bars.length)
    throw new ValidationError(
      `EMA ${pair} series are not aligned: ${short.length} short points, ${long.length} long points, ${bars.length} bars`,
    );

  bars.forEach(({ date }, i) => {
    if (short[i].date !== date || long[i].date !== date)
      throw new ValidationError(`EMA ${pair} series are not aligned at index ${i} (${toISOString(date)})`);
    if (!Number.isFinite(short[i].value) || !Number.isFinite(long[i].value))
      throw new ValidationError(`EMA ${pair} series hold a non finite value at index ${i} (${toISOString(date)})`);
  });
};

const sideOf = (diff: number): Side | null => {
  if (diff > 0) return 'above';
  if (diff < 0) return 'below';
  return null;
};

/**
 * Emits `rule.up` when the short EMA moves strictly above the long one and
 * `rule.down` when it moves strictly below.
 *
 * A difference of exactly zero keeps the side of the last non-zero
 * difference, so touching and leaving on the same side is not a crossover.
 * Leading zeros have no side: the first strict side is only recorded.
 */
export const detectCrossovers = (
  bars: readonly PriceBar[],
  short: EmaLine,
  long: EmaLine,
  rule: CrossoverRule,
): CrossoverEvent[] => {
  checkAlignment(bars, short, long, rule);

  const events: CrossoverEvent[] = [];
  let previousSide: Side | null = null;

  bars.forEach((bar, i) => {
    const side = sideOf(short[i].value - long[i].value);
    if (!side) return;

    if (previousSide && side !== previousSide)
      events.push(
        Object.freeze({ category: side === 'above' ? rule.up : rule.down, date: bar.date, price: bar.close }),
      );

    previousSide = side;
  });

  return events;
};

/** Runs the detector once per rule and concatenates the results in rule order. */
export const detectAllCrossovers = (
  bars: readonly PriceBar[],
  emas: EmaSeries,
  rules: readonly CrossoverRule[] = CROSSOVER_RULES,
): CrossoverEvent[] => flatMap(rules, rule => detectCrossovers(bars, emas[rule.short], emas[rule.long], rule));
