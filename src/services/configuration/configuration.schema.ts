import { DEFAULT_BIN_EDGES } from '@constants/distribution.const';
import { EXCHANGE_NAMES } from '@services/exchange/exchange.const';
import { z } from 'zod';

export const sourceSchema = z.object({
  exchange: z.enum(EXCHANGE_NAMES),
  symbol: z.string().default('BTC/USDT'),
  historyDays: z.number().int().positive().default(3650),
});

export const storageSchema = z.object({
  type: z.literal('sqlite'),
  database: z.string(),
  includeRawTable: z.boolean().default(true),
});

export const distributionSchema = z.object({
  binEdges: z
    .array(z.number().int().nonnegative())
    .min(1)
    .default([...DEFAULT_BIN_EDGES])
    .refine(edges => edges[0] === 0, { message: 'First bin edge must be 0' })
    .refine(edges => edges.every((edge, i) => i === 0 || edge > edges[i - 1]), {
      message: 'Bin edges must be strictly ascending',
    }),
});

export const configurationSchema = z.object({
  showReport: z.boolean().default(true),
  source: sourceSchema,
  storage: storageSchema,
  distribution: distributionSchema.default({ binEdges: [...DEFAULT_BIN_EDGES] }),
});
