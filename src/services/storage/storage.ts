import type { Table } from '@models/table.types';

export abstract class Storage {
  /**
   * Replaces the whole content of every given table and drops the obsolete ones,
   * all or nothing.
   */
  public abstract replaceTables(tables: readonly Table[], obsolete?: readonly string[]): void;
  public abstract close(): void;
}
