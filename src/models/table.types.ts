import type { Nullable } from './utility.types';

export type ColumnType = 'DATE' | 'STRING' | 'INTEGER' | 'FLOAT';

export type Column = Readonly<{ name: string; type: ColumnType }>;

export type Cell = Nullable<string | number>;

export type Table = Readonly<{
  name: string;
  columns: readonly Column[];
  /** Cells ordered as `columns` */
  rows: readonly (readonly Cell[])[];
}>;
