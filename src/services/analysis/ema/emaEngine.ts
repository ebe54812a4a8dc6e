import { EMA_PERIODS } from '@constants/ema.const';
import { EMA } from '@indicators/movingAverages/ema/ema.indicator';
import type { EmaKey, EmaLine, EmaSeries } from '@models/ema.types';
import type { PriceBar } from '@models/priceBar.types';
import { mapValues } from 'lodash-es';

/**
 * One EMA value per close, index-aligned with the input.
 * The seed (mean of the first `period` closes, or of all closes when fewer exist) is emitted
 * for every bar up to the seed index, so the line starts at the seed.
 */
export const computeEma = (closes: readonly number[], period: number): number[] => {
  const ema = new EMA({ period });
  const values = closes.map(close => {
    ema.onNewPrice(close);
    return ema.getResult() ?? close;
  });
  const seedIndex = Math.min(period, values.length) - 1;
  return values.map((value, i) => (i < seedIndex ? values[seedIndex] : value));
};

export const computeEmaLine = (bars: readonly PriceBar[], period: number): EmaLine => {
  const values = computeEma(
    bars.map(({ close }) => close),
    period,
  );
  return bars.map(({ date }, i) => ({ date, value: values[i] }));
};

export const computeEmaSeries = (bars: readonly PriceBar[]): EmaSeries =>
  mapValues(EMA_PERIODS, (period): EmaLine => computeEmaLine(bars, period)) satisfies Record<EmaKey, EmaLine>;
