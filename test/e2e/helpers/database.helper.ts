import type BetterSqlite3 from 'better-sqlite3';

export const listTables = (db: BetterSqlite3.Database) =>
  db
    // eslint-disable-next-line quotes
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all()
    .map(({ name }) => name);

export const readTable = (db: BetterSqlite3.Database, table: string) =>
  db.prepare<[], Record<string, unknown>>(`SELECT * FROM "${table}"`).all();
