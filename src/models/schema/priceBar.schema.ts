import { z } from 'zod';

export const priceBarSchema = z.object({
  date: z.number().int().nonnegative(),
  open: z.number().min(0).optional(),
  high: z.number().min(0).optional(),
  low: z.number().min(0).optional(),
  close: z.number().positive(),
  volume: z.number().min(0).optional(),
});
