import { logError, type ObservabilityContext } from '@activityhub/core-domain';
import pg from 'pg';
import type { PoolClient, QueryResult } from 'pg';

import type {
  ClosableSqlDatabase,
  SqlDatabase,
  SqlPreparedStatement,
  SqlQueryResult,
  SqlRunResult,
  SqlTransactionOptions,
} from './index';

type QueryFn = (text: string, values: unknown[]) => Promise<QueryResult>;

/**
 * Rewrites `?` placeholders to `$1..$n`. Statements in this package never carry a literal `?`.
 */
export const toPostgresPlaceholders = (sql: string): string => {
  let index = 0;

  return sql.replace(/\?/g, () => {
    index += 1;
    return `$${String(index)}`;
  });
};

class PostgresPreparedStatement implements SqlPreparedStatement {
  private params: unknown[] = [];

  private readonly text: string;

  public constructor(
    private readonly query: QueryFn,
    sql: string,
  ) {
    this.text = toPostgresPlaceholders(sql);
  }

  public bind(...params: unknown[]): SqlPreparedStatement {
    this.params = params.map((param) => (param === undefined ? null : param));
    return this;
  }

  public async first<T>(): Promise<T | null> {
    const result = await this.query(this.text, this.params);
    const row: unknown = result.rows[0];
    return row === undefined ? null : (row as T);
  }

  public async all<T>(): Promise<SqlQueryResult<T>> {
    const startedAt = performance.now();
    const result = await this.query(this.text, this.params);
    const rows: unknown[] = result.rows;
    return {
      success: true,
      results: rows.map((row) => row as T),
      meta: {
        rowsRead: rows.length,
        durationMs: performance.now() - startedAt,
      },
    };
  }

  public async run(): Promise<SqlRunResult> {
    const startedAt = performance.now();
    const result = await this.query(this.text, this.params);
    return {
      success: true,
      meta: {
        rowsWritten: result.rowCount ?? 0,
        durationMs: performance.now() - startedAt,
      },
    };
  }
}

const beginStatement = (options: SqlTransactionOptions | undefined): string => {
  return options?.readOnly === true ? 'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY' : 'BEGIN';
};

const createClientHandle = (client: PoolClient): SqlDatabase => {
  const query: QueryFn = (text, values) => client.query(text, values);
  const handle: SqlDatabase = {
    prepare: (sql) => new PostgresPreparedStatement(query, sql),
    transaction: (fn) => fn(handle),
  };

  return handle;
};

const errorDetail = (error: unknown): string => {
  return error instanceof Error ? error.message : 'Unknown error';
};

export interface PostgresDatabaseInput {
  databaseUrl: string;
  observabilityContext: ObservabilityContext;
  maxConnections?: number | undefined;
}

export const createPostgresDatabase = (input: PostgresDatabaseInput): ClosableSqlDatabase => {
  const pool = new pg.Pool({
    connectionString: input.databaseUrl,
    max: input.maxConnections ?? 10,
  });
  const query: QueryFn = (text, values) => pool.query(text, values);

  // Idle clients report backend failures here; without a listener they crash the process.
  pool.on('error', (error) => {
    logError(input.observabilityContext, 'database_pool_error', {
      detail: error.message,
    });
  });

  /**
   * Resolves to the rollback failure, if any, so the caller can discard the client.
   */
  const rollback = async (client: PoolClient): Promise<Error | undefined> => {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (rollbackError: unknown) {
      logError(input.observabilityContext, 'database_rollback_failed', {
        detail: errorDetail(rollbackError),
      });
      return rollbackError instanceof Error ? rollbackError : new Error(errorDetail(rollbackError));
    }
  };

  return {
    prepare: (sql) => new PostgresPreparedStatement(query, sql),
    transaction: async (fn, options) => {
      const client = await pool.connect();
      let releaseError: Error | undefined;

      try {
        await client.query(beginStatement(options));

        try {
          const result = await fn(createClientHandle(client));
          await client.query('COMMIT');
          return result;
        } catch (error: unknown) {
          releaseError = await rollback(client);
          throw error;
        }
      } finally {
        client.release(releaseError);
      }
    },
    close: () => pool.end(),
  };
};

export const isPostgresUrl = (databaseUrl: string): boolean => {
  return databaseUrl.startsWith('postgres://') || databaseUrl.startsWith('postgresql://');
};
