import Database from 'better-sqlite3';

import type {
  ClosableSqlDatabase,
  SqlDatabase,
  SqlPreparedStatement,
  SqlQueryResult,
  SqlRunResult,
  SqlTransactionOptions,
} from './index';

type SqliteParam = string | number | bigint | Buffer | null;

const toSqliteParam = (value: unknown): SqliteParam => {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }

  throw new TypeError(`Unsupported SQLite bind parameter of type ${typeof value}`);
};

/**
 * better-sqlite3 runs on one connection, so statements issued outside a transaction wait for the
 * open transaction to settle instead of joining it.
 */
type Exclusive = <T>(task: () => Promise<T>) => Promise<T>;

class SqlitePreparedStatement implements SqlPreparedStatement {
  private params: SqliteParam[] = [];

  public constructor(
    private readonly database: Database.Database,
    private readonly sql: string,
    private readonly exclusive: Exclusive,
  ) {}

  public bind(...params: unknown[]): SqlPreparedStatement {
    this.params = params.map(toSqliteParam);
    return this;
  }

  public first<T>(): Promise<T | null> {
    return this.exclusive(async () => {
      const row: unknown = this.database.prepare(this.sql).get(...this.params);
      return row === undefined ? null : (row as T);
    });
  }

  public all<T>(): Promise<SqlQueryResult<T>> {
    return this.exclusive(async () => {
      const startedAt = performance.now();
      const rows: unknown[] = this.database.prepare(this.sql).all(...this.params);
      return {
        success: true,
        results: rows.map((row) => row as T),
        meta: {
          rowsRead: rows.length,
          durationMs: performance.now() - startedAt,
        },
      };
    });
  }

  public run(): Promise<SqlRunResult> {
    return this.exclusive(async () => {
      const startedAt = performance.now();
      const info = this.database.prepare(this.sql).run(...this.params);
      return {
        success: true,
        meta: {
          rowsWritten: info.changes,
          durationMs: performance.now() - startedAt,
        },
      };
    });
  }
}

const runDirect: Exclusive = (task) => task();

const createTransactionHandle = (database: Database.Database): SqlDatabase => {
  const handle: SqlDatabase = {
    prepare: (sql) => new SqlitePreparedStatement(database, sql, runDirect),
    transaction: (fn) => fn(handle),
  };

  return handle;
};

export interface SqliteDatabaseInput {
  /**
   * A file path, or ":memory:" for a private in-memory database.
   */
  filename: string;
}

export const createSqliteDatabase = (input: SqliteDatabaseInput): ClosableSqlDatabase => {
  const database = new Database(input.filename);
  database.pragma('foreign_keys = ON');

  if (input.filename !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }

  let queue: Promise<void> = Promise.resolve();

  const exclusive: Exclusive = (task) => {
    const result = queue.then(task);
    queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  };

  const runTransaction = async <T>(
    fn: (tx: SqlDatabase) => Promise<T>,
    options: SqlTransactionOptions | undefined,
  ): Promise<T> => {
    database.exec(options?.readOnly === true ? 'BEGIN DEFERRED' : 'BEGIN IMMEDIATE');

    try {
      const result = await fn(createTransactionHandle(database));
      database.exec('COMMIT');
      return result;
    } catch (error: unknown) {
      if (database.inTransaction) {
        database.exec('ROLLBACK');
      }

      throw error;
    }
  };

  return {
    prepare: (sql) => new SqlitePreparedStatement(database, sql, exclusive),
    transaction: (fn, options) => exclusive(() => runTransaction(fn, options)),
    close: () =>
      exclusive(async () => {
        database.close();
      }),
  };
};

/**
 * Parses `sqlite:<path>` and `sqlite::memory:` connection strings.
 */
export const sqliteFilenameFromUrl = (databaseUrl: string): string | null => {
  if (!databaseUrl.startsWith('sqlite:')) {
    return null;
  }

  const filename = databaseUrl.slice('sqlite:'.length).replace(/^\/\//, '');
  return filename.length === 0 ? null : filename;
};
