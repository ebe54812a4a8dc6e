import { ValidationError } from '@errors/validation.error';
import type { PriceBar } from '@models/priceBar.types';
import { priceBarSchema } from '@models/schema/priceBar.schema';
import { toISOString } from '@utils/date/date.utils';
import { map } from 'lodash-es';
import { z } from 'zod';

/**
 * Checks a daily series before it reaches the EMA engine.
 * Returns the parsed bars, throws ValidationError on the first offending bar.
 */
export const validateBars = (bars: readonly unknown[]): PriceBar[] => {
  const parsed = map(bars, (bar, index) => {
    const result = priceBarSchema.safeParse(bar);
    if (!result.success) throw new ValidationError(`Bar #${index} is malformed: ${z.prettifyError(result.error)}`);
    return result.data;
  });

  parsed.forEach((bar, index) => {
    if (index === 0) return;
    const previous = parsed[index - 1];
    if (bar.date <= previous.date)
      throw new ValidationError(
        `Bar #${index} (${toISOString(bar.date)}) is not after bar #${index - 1} (${toISOString(previous.date)})`,
      );
  });

  return parsed;
};
