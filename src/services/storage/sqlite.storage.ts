import { StorageError } from '@errors/storage/storage.error';
import type { Table } from '@models/table.types';
import { debug } from '@services/logger';
import { pluralize } from '@utils/string/string.utils';
import Database from 'better-sqlite3';
import { each, map } from 'lodash-es';
import { Storage } from './storage';
import { SQLITE_COLUMN_TYPES } from './storage.const';

const quote = (identifier: string) => `"${identifier.replaceAll('"', '""')}"`;

export class SQLiteStorage extends Storage {
  db: Database.Database;

  constructor(database: string) {
    super();
    this.db = new Database(database);
    this.db.pragma('busy_timeout = 5000'); // Wait instead of erroring when the DB is locked
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
  }

  public replaceTables(tables: readonly Table[], obsolete: readonly string[] = []): void {
    const replaceAll = this.db.transaction((toReplace: readonly Table[], toDrop: readonly string[]) => {
      each(toReplace, table => this.replaceTable(table));
      each(toDrop, name => this.db.exec(`DROP TABLE IF EXISTS ${quote(name)}`));
    });

    try {
      replaceAll(tables, obsolete);
    } catch (err) {
      throw new StorageError(`Failed to replace tables, nothing was written (${err instanceof Error ? err.message : err})`);
    }
    debug('storage', `${tables.length} ${pluralize('table', tables.length)} replaced in database`);
    if (obsolete.length) debug('storage', `Obsolete tables dropped: ${obsolete.join(', ')}`);
  }

  private replaceTable({ name, columns, rows }: Table): void {
    const table = quote(name);
    const definition = map(columns, ({ name, type }) => `${quote(name)} ${SQLITE_COLUMN_TYPES[type]}`).join(', ');
    this.db.exec(`DROP TABLE IF EXISTS ${table}`);
    this.db.exec(`CREATE TABLE ${table} (${definition})`);

    const stmt = this.db.prepare(`INSERT INTO ${table} VALUES (${map(columns, () => '?').join(', ')})`);
    each(rows, row => {
      stmt.run(...row);
    });
    debug('storage', `${rows.length} ${pluralize('row', rows.length)} written in ${name}`);
  }

  public close(): void {
    this.db.close();
  }
}
