import type { z } from 'zod';
import type { priceBarSchema } from './schema/priceBar.schema';

export type PriceBar = z.infer<typeof priceBarSchema>;
