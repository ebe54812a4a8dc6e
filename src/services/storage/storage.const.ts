import type { ColumnType } from '@models/table.types';

export const SQLITE_COLUMN_TYPES: Record<ColumnType, string> = {
  DATE: 'TEXT',
  STRING: 'TEXT',
  INTEGER: 'INTEGER',
  FLOAT: 'REAL',
};
