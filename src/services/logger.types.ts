import type { LogLevel } from '@models/logLevel.types';
import type { Tag } from '@models/tag.types';

export type LogInput = { tag: Tag; message: unknown; level: LogLevel };
