import type { z } from 'zod';
import type { configurationSchema, sourceSchema } from '@services/configuration/configuration.schema';

export type SourceConfig = z.infer<typeof sourceSchema>;
export type Configuration = z.infer<typeof configurationSchema>;
export type ExchangeName = SourceConfig['exchange'];
